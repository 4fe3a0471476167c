// ============================================
// Game Constants & Configuration
// Static tuning values shared by every system
// ============================================

export const GAME_CONFIG = {
  // Viewport (world units, origin at the center)
  VIEWPORT_WIDTH: 800,
  VIEWPORT_HEIGHT: 600,

  // Off-screen reaping: extra distance past the outer bound before an entity is removed
  DESPAWN_MARGIN: 12,

  // Player
  PLAYER_MAX_HEALTH: 10,
  PLAYER_INVULN_DURATION: 1.0, // Seconds of immunity after taking a hit

  // Frame loop
  TICK_RATE: 60, // Frames per second
  MAX_FRAME_TIME_MS: 250, // Upper bound for a single frame delta
  SLOW_FRAME_MS: 10, // Frames slower than this log a per-system breakdown
} as const;

export type GameConfig = typeof GAME_CONFIG;
