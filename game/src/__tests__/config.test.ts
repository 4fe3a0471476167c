// ============================================
// Runtime Config Tests
// ============================================

import { describe, it, expect } from 'vitest';
import { loadLogConfig, loadRuntimeConfig } from '../config';

describe('loadRuntimeConfig', () => {
  it('falls back to defaults', () => {
    expect(loadRuntimeConfig({})).toEqual({
      viewport: { width: 800, height: 600 },
      tickRate: 60,
      logLevel: 'info',
      logDir: 'logs',
    });
  });

  it('reads overrides from the environment', () => {
    const config = loadRuntimeConfig({
      VIEWPORT_WIDTH: '1280',
      VIEWPORT_HEIGHT: '720',
      TICK_RATE: '30',
      LOG_LEVEL: 'debug',
      LOG_DIR: '/tmp/starfall-logs',
    });

    expect(config).toEqual({
      viewport: { width: 1280, height: 720 },
      tickRate: 30,
      logLevel: 'debug',
      logDir: '/tmp/starfall-logs',
    });
  });

  it('treats blank values as unset', () => {
    expect(loadRuntimeConfig({ VIEWPORT_WIDTH: '  ' }).viewport.width).toBe(800);
  });

  it('rejects non-numeric values', () => {
    expect(() => loadRuntimeConfig({ VIEWPORT_HEIGHT: 'tall' })).toThrow(
      'InvalidConfig: VIEWPORT_HEIGHT must be a non-negative number, got "tall"'
    );
  });

  it('rejects negative values', () => {
    expect(() => loadRuntimeConfig({ VIEWPORT_WIDTH: '-1' })).toThrow(
      'InvalidConfig: VIEWPORT_WIDTH must be a non-negative number, got "-1"'
    );
  });

  it('rejects a zero tick rate', () => {
    expect(() => loadRuntimeConfig({ TICK_RATE: '0' })).toThrow(
      'InvalidConfig: TICK_RATE must be greater than 0'
    );
  });
});

describe('loadLogConfig', () => {
  it('reads only the log keys', () => {
    expect(
      loadLogConfig({ VIEWPORT_WIDTH: 'wide', TICK_RATE: '0', LOG_LEVEL: 'warn', LOG_DIR: '/tmp/starfall-logs' })
    ).toEqual({ logLevel: 'warn', logDir: '/tmp/starfall-logs' });
  });

  it('falls back to defaults', () => {
    expect(loadLogConfig({})).toEqual({ logLevel: 'info', logDir: 'logs' });
  });
});
