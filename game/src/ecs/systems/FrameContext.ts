// ============================================
// Frame Context
// Collaborators passed to every system call
// ============================================

import type { WindowSize } from '#shared';
import type { AudioTrigger } from '../../audio';
import type { GameStateController } from '../../GameStateMachine';

/**
 * FrameContext - everything a system may touch besides the World.
 *
 * The viewport is passed explicitly on every call instead of living in
 * the World as a resource, so a system's inputs are visible at the call site.
 */
export interface FrameContext {
  // Viewport size in world units (read-only, fixed at startup)
  viewport: WindowSize;

  // Fire-and-forget sound playback
  audio: AudioTrigger;

  // Current game state + terminal transition request
  gameState: GameStateController;
}
