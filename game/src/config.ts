// ============================================
// Runtime Configuration
// Environment overrides on top of GAME_CONFIG defaults
// ============================================

import { GAME_CONFIG, type WindowSize } from '#shared';

export interface LogConfig {
  logLevel: string;
  logDir: string;
}

export interface RuntimeConfig extends LogConfig {
  viewport: WindowSize;
  tickRate: number;
}

type Env = Readonly<Record<string, string | undefined>>;

/**
 * Read a non-negative number from the environment, or fall back.
 * Throws on anything that isn't a finite number >= 0.
 */
function readNumber(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;

  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0) {
    throw new Error(`InvalidConfig: ${key} must be a non-negative number, got "${raw}"`);
  }
  return value;
}

/**
 * Logger settings only. Reads no simulation keys and never throws.
 *
 * LOG_LEVEL - pino level (default 'info')
 * LOG_DIR - directory for rotated log files (default 'logs')
 */
export function loadLogConfig(env: Env): LogConfig {
  return {
    logLevel: env.LOG_LEVEL || 'info',
    logDir: env.LOG_DIR || 'logs',
  };
}

/**
 * Build the runtime config from environment variables.
 *
 * VIEWPORT_WIDTH / VIEWPORT_HEIGHT - world units (default 800x600)
 * TICK_RATE - frames per second, must be > 0 (default 60)
 * plus the LOG_* keys of loadLogConfig
 */
export function loadRuntimeConfig(env: Env): RuntimeConfig {
  const tickRate = readNumber(env, 'TICK_RATE', GAME_CONFIG.TICK_RATE);
  if (tickRate === 0) {
    throw new Error('InvalidConfig: TICK_RATE must be greater than 0');
  }

  return {
    viewport: {
      width: readNumber(env, 'VIEWPORT_WIDTH', GAME_CONFIG.VIEWPORT_WIDTH),
      height: readNumber(env, 'VIEWPORT_HEIGHT', GAME_CONFIG.VIEWPORT_HEIGHT),
    },
    tickRate,
    ...loadLogConfig(env),
  };
}
