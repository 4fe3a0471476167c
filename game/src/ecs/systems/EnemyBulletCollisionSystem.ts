// ============================================
// Enemy Bullet Collision System
// Enemy-fired bullets vs the player
// ============================================

import { Faction, GameState, SoundCue, circlesOverlap, type World } from '#shared';
import type { System } from './types';
import type { FrameContext } from './FrameContext';
import {
  applyDamage,
  destroyEntity,
  getAllPlayerEntities,
  getBullet,
  getBulletsOfFaction,
  getHitbox,
  getTransform,
  isDead,
  isVulnerable,
  requireHealth,
  requireHitbox,
  requireInvulnTimer,
  requireTransform,
  resetInvuln,
  tickInvuln,
} from '../factories';
import { InvariantViolationError } from '../errors';
import { triggerCue } from '../../audio';
import { logGameOver, logPlayerHit } from '../../logger';

/**
 * EnemyBulletCollisionSystem - resolves enemy bullet hits on the player
 *
 * Handles:
 * - Ticking the player's invulnerability window
 * - Consuming every enemy bullet that touches the player
 * - At most one damaging hit per frame (hit sound, damage, timer reset)
 * - Requesting GAME_OVER when the player's health reaches 0
 *
 * Vulnerability is sampled once per frame after the tick, so the timer
 * reset from the first hit can't be bypassed by bullet iteration order.
 */
export class EnemyBulletCollisionSystem implements System {
  readonly name = 'EnemyBulletCollisionSystem';
  readonly runIn = GameState.PLAYING;

  update(world: World, deltaTime: number, ctx: FrameContext): void {
    const players = getAllPlayerEntities(world);
    if (players.length !== 1) {
      throw new InvariantViolationError(`expected a single player, found ${players.length}`, {
        players,
      });
    }
    const [player] = players;

    const health = requireHealth(world, player);
    const playerHitbox = requireHitbox(world, player);
    const invuln = requireInvulnTimer(world, player);
    const playerTransform = requireTransform(world, player);

    tickInvuln(invuln, deltaTime);
    const vulnerable = isVulnerable(invuln);
    let landed = false;

    for (const bullet of getBulletsOfFaction(world, Faction.ENEMY)) {
      const bulletComp = getBullet(world, bullet);
      const hitbox = getHitbox(world, bullet);
      const transform = getTransform(world, bullet);
      if (!bulletComp || !hitbox || !transform) continue;

      if (!circlesOverlap(playerTransform, playerHitbox.radius, transform, hitbox.radius)) continue;

      // Bullets are consumed on contact even while the player is invulnerable
      destroyEntity(world, bullet);

      if (!vulnerable || landed) continue;
      landed = true;

      triggerCue(ctx.audio, SoundCue.PLAYER_HIT);

      applyDamage(health, bulletComp.damage);
      logPlayerHit(player, bulletComp.damage, health.current);
      if (isDead(health)) {
        logGameOver(player);
        ctx.gameState.requestTerminalState();
      }

      resetInvuln(invuln);
    }
  }
}

