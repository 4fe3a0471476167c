// ============================================
// Player Bullet Collision System
// Player-fired bullets vs enemies
// ============================================

import { Components, Faction, GameState, Tags, circlesOverlap, type EntityId, type World } from '#shared';
import type { System } from './types';
import {
  applyDamage,
  destroyEntity,
  getBullet,
  getBulletsOfFaction,
  getHealth,
  getHitbox,
  getTransform,
} from '../factories';

/**
 * PlayerBulletCollisionSystem - resolves player bullet hits on enemies
 *
 * Every overlapping (enemy, bullet) pair deals damage: enemies have no
 * invulnerability, several bullets stack within a frame, and a bullet
 * touching several enemies damages each of them. Bullets are destroyed
 * after all pairs have been resolved.
 */
export class PlayerBulletCollisionSystem implements System {
  readonly name = 'PlayerBulletCollisionSystem';
  readonly runIn = GameState.PLAYING;

  update(world: World): void {
    const bullets = getBulletsOfFaction(world, Faction.PLAYER);
    if (bullets.length === 0) return;

    const toRemove = new Set<EntityId>();

    for (const enemy of world.queryTagged(Tags.Enemy, Components.Health, Components.Hitbox, Components.Transform)) {
      const health = getHealth(world, enemy);
      const enemyHitbox = getHitbox(world, enemy);
      const enemyTransform = getTransform(world, enemy);
      if (!health || !enemyHitbox || !enemyTransform) continue;

      for (const bullet of bullets) {
        const bulletComp = getBullet(world, bullet);
        const hitbox = getHitbox(world, bullet);
        const transform = getTransform(world, bullet);
        if (!bulletComp || !hitbox || !transform) continue;

        if (circlesOverlap(enemyTransform, enemyHitbox.radius, transform, hitbox.radius)) {
          toRemove.add(bullet);
          applyDamage(health, bulletComp.damage);
        }
      }
    }

    for (const bullet of toRemove) {
      destroyEntity(world, bullet);
    }
  }
}
