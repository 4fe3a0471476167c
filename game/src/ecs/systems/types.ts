// ============================================
// ECS System Types
// ============================================

import type { GameState, World } from '#shared';
import type { FrameContext } from './FrameContext';

/**
 * Base System interface
 * All game systems implement this interface
 */
export interface System {
  /** System name for debugging/logging */
  readonly name: string;

  /**
   * Only run while the game is in this state. Unset = run every frame.
   */
  readonly runIn?: GameState;

  /**
   * Called every frame
   * @param world The ECS World containing all entities and components
   * @param deltaTime Time since last frame in seconds
   * @param ctx Viewport and external collaborators
   */
  update(world: World, deltaTime: number, ctx: FrameContext): void;
}

/**
 * System priority - determines update order
 * Lower numbers run first
 *
 * 1. Movement (host-supplied: input, AI, bullet flight)
 * 2. Player bounds (clamp is the last word on the player's position)
 * 3. Enemy bullets vs player (must precede the player bullet pass)
 * 4. Player bullets vs enemies
 * 5. Enemy death
 * 6. Off-screen reaping and starfield wrap (independent of collisions)
 */
export const SystemPriority = {
  // Reserved for the host's movement/firing systems
  MOVEMENT: 100,

  PLAYER_BOUNDS: 200,

  // Damage resolution - order between these two is fixed
  ENEMY_BULLET_COLLISION: 300,
  PLAYER_BULLET_COLLISION: 310,

  ENEMY_DEATH: 400,

  // Housekeeping
  DESPAWN_OUTSIDE: 500,
  STARFIELD_WRAP: 510,
} as const;
