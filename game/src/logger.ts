import pino from 'pino';
import type { EntityId, GameState } from '#shared';
import { loadLogConfig } from './config';

// ============================================
// Logger Configuration
// ============================================

const { logDir: LOG_DIR, logLevel: LOG_LEVEL } = loadLogConfig(process.env);
const IS_DEV = process.env.NODE_ENV !== 'production';

/**
 * Create a logger with console + rotating file output
 * pino-roll is used as a Pino transport for file rotation
 * @param filename - Log file name (e.g., 'game.log')
 * @param component - Component name for filtering (e.g., 'game', 'perf')
 */
function createLogger(filename: string, component: string) {
  const targets: pino.TransportTargetOptions[] = [];

  // Console stream with pretty printing (development only)
  if (IS_DEV) {
    targets.push({
      level: LOG_LEVEL,
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss.l',
        ignore: 'pid,hostname',
      },
    });
  }

  // Rotating file stream with JSON (always enabled)
  targets.push({
    level: 'info',
    target: 'pino-roll',
    options: {
      file: `${LOG_DIR}/${filename}`,
      size: '10m',
      limit: { count: 5 },
      mkdir: true,
    },
  });

  return pino(
    {
      level: LOG_LEVEL,
      base: { component },
    },
    pino.transport({ targets })
  );
}

// ============================================
// Logger Instances
// ============================================

// Game events (hits, kills, state transitions)
export const logger = createLogger('game.log', 'game');

// Frame timing
export const perfLogger = createLogger('performance.log', 'perf');

// ============================================
// Convenience Methods for Game Events
// ============================================

/**
 * Log a damaging hit on the player
 */
export function logPlayerHit(playerEntity: EntityId, damage: number, healthLeft: number) {
  logger.info(
    { playerEntity, damage, healthLeft, event: 'player_hit' },
    `Player hit for ${damage} (${healthLeft} left)`
  );
}

/**
 * Log the player's death
 */
export function logGameOver(playerEntity: EntityId) {
  logger.info({ playerEntity, event: 'game_over' }, 'Player destroyed, game over');
}

export function logEnemyKilled(enemyEntity: EntityId) {
  logger.info({ enemyEntity, event: 'enemy_killed' }, 'Enemy destroyed');
}

/**
 * Log an entity reaped for leaving the screen (debug - very frequent)
 */
export function logEntityDespawned(entity: EntityId, position: { x: number; y: number }) {
  logger.debug(
    { entity, position, event: 'entity_despawned' },
    `Entity ${entity} left the screen at (${position.x.toFixed(1)}, ${position.y.toFixed(1)})`
  );
}

export function logStateChange(from: GameState, to: GameState) {
  logger.info({ from, to, event: 'state_changed' }, `Game state ${from} -> ${to}`);
}

export function logGameStarted(tickRate: number, viewport: { width: number; height: number }) {
  logger.info(
    { tickRate, viewport, event: 'game_started' },
    `Game loop running at ${tickRate} fps (${viewport.width}x${viewport.height})`
  );
}

export function logGameStopped(frames: number) {
  logger.info({ frames, event: 'game_stopped' }, `Game loop stopped after ${frames} frames`);
}
