// ============================================
// Starfield Wrap System
// Scrolling background: stars leaving the bottom reappear at the top
// ============================================

import { Components, Tags, outerBound, type World } from '#shared';
import type { System } from './types';
import type { FrameContext } from './FrameContext';

/**
 * StarfieldWrapSystem - teleports stars below the bottom edge to the top edge
 *
 * Only the bottom edge is checked; x is never touched.
 */
export class StarfieldWrapSystem implements System {
  readonly name = 'StarfieldWrapSystem';

  update(world: World, _deltaTime: number, { viewport }: FrameContext): void {
    world.forEachWithTag(Tags.Star, (entity) => {
      const sprite = world.getComponent(entity, Components.Sprite);
      const transform = world.getComponent(entity, Components.Transform);
      if (!sprite || !transform) return;

      const height = outerBound(viewport.height, sprite.height * transform.scale.y);
      if (transform.y < -height) {
        transform.y = height;
      }
    });
  }
}
