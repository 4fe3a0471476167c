// ============================================
// Shared Types & Enums
// Game-wide value types used by the ECS and the simulation
// ============================================

// Plain 2D vector (world units)
export interface Vec2 {
  x: number;
  y: number;
}

/**
 * Viewport size in world units.
 * Created once from configuration and passed into every system call.
 */
export interface WindowSize {
  readonly width: number;
  readonly height: number;
}

// Ownership of actors and the bullets they fire
export enum Faction {
  PLAYER = 'player',
  ENEMY = 'enemy',
}

// Top-level game states. Gameplay systems only run while PLAYING.
export enum GameState {
  PLAYING = 'playing',
  PAUSED = 'paused',
  GAME_OVER = 'game_over',
}

// Audio cues the simulation can trigger (asset paths)
export enum SoundCue {
  PLAYER_HIT = 'sounds/player_hit.wav',
}
