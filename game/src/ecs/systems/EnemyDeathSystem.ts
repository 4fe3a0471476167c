// ============================================
// Enemy Death System
// Removes enemies whose health has run out
// ============================================

import { Components, GameState, Tags, type World } from '#shared';
import type { System } from './types';
import { destroyEntity, getHealth, isDead } from '../factories';
import { logEnemyKilled } from '../../logger';

export class EnemyDeathSystem implements System {
  readonly name = 'EnemyDeathSystem';
  readonly runIn = GameState.PLAYING;

  update(world: World): void {
    for (const enemy of world.queryTagged(Tags.Enemy, Components.Health)) {
      const health = getHealth(world, enemy);
      if (health && isDead(health)) {
        destroyEntity(world, enemy);
        logEnemyKilled(enemy);
      }
    }
  }
}
