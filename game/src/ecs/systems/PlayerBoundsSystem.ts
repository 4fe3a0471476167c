// ============================================
// Player Bounds System
// Keeps the player ship fully inside the viewport
// ============================================

import { Components, GameState, Tags, clamp, innerBound, type World } from '#shared';
import type { System } from './types';
import type { FrameContext } from './FrameContext';

/**
 * PlayerBoundsSystem - clamps player transforms to the inner bounds
 *
 * Each axis is clamped independently to [-bound, +bound], where bound is
 * innerBound(viewport, sprite extent). Must run after movement so the clamp
 * is final for the frame.
 */
export class PlayerBoundsSystem implements System {
  readonly name = 'PlayerBoundsSystem';
  readonly runIn = GameState.PLAYING;

  update(world: World, _deltaTime: number, { viewport }: FrameContext): void {
    for (const entity of world.queryTagged(Tags.Player, Components.SpriteSize, Components.Transform)) {
      const sprite = world.getComponent(entity, Components.SpriteSize);
      const transform = world.getComponent(entity, Components.Transform);
      if (!sprite || !transform) continue;

      const width = innerBound(viewport.width, sprite.width);
      const height = innerBound(viewport.height, sprite.height);
      transform.x = clamp(transform.x, -width, width);
      transform.y = clamp(transform.y, -height, height);
    }
  }
}
