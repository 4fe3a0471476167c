// ============================================
// Despawn Outside System
// Reaps entities that have left the screen
// ============================================

import {
  Components,
  GAME_CONFIG,
  Tags,
  outerBound,
  type EntityId,
  type Vec2,
  type WindowSize,
  type World,
} from '#shared';
import type { System } from './types';
import type { FrameContext } from './FrameContext';
import { destroyEntity } from '../factories';
import { logEntityDespawned } from '../../logger';

/**
 * DespawnOutsideSystem - destroys DespawnOutside-tagged entities past the edge
 *
 * Two extents are checked independently: SpriteSize (sprite sheets, already
 * scaled) and Sprite x Transform.scale (plain sprites). An entity carrying
 * both is removed when either extent puts it further than
 * outerBound + DESPAWN_MARGIN from the center on either axis. Entities with
 * neither are left alone.
 */
export class DespawnOutsideSystem implements System {
  readonly name = 'DespawnOutsideSystem';

  update(world: World, _deltaTime: number, { viewport }: FrameContext): void {
    const toRemove: EntityId[] = [];

    world.forEachWithTag(Tags.DespawnOutside, (entity) => {
      const transform = world.getComponent(entity, Components.Transform);
      if (!transform) return;

      const sheet = world.getComponent(entity, Components.SpriteSize);
      const sprite = world.getComponent(entity, Components.Sprite);
      const extents: Extent[] = [];
      if (sheet) extents.push(sheet);
      if (sprite) {
        extents.push({ width: sprite.width * transform.scale.x, height: sprite.height * transform.scale.y });
      }

      if (extents.some((extent) => isOutside(transform, extent, viewport))) {
        toRemove.push(entity);
      }
    });

    for (const entity of toRemove) {
      const transform = world.getComponent(entity, Components.Transform);
      if (transform) {
        logEntityDespawned(entity, transform);
      }
      destroyEntity(world, entity);
    }
  }
}

interface Extent {
  width: number;
  height: number;
}

function isOutside(position: Vec2, extent: Extent, viewport: WindowSize): boolean {
  const width = outerBound(viewport.width, extent.width) + GAME_CONFIG.DESPAWN_MARGIN;
  const height = outerBound(viewport.height, extent.height) + GAME_CONFIG.DESPAWN_MARGIN;
  return position.x > width || position.x < -width || position.y > height || position.y < -height;
}
