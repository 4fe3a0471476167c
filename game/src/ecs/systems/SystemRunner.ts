// ============================================
// ECS System Runner
// Manages and executes all game systems in priority order
// ============================================

import { GAME_CONFIG, type World } from '#shared';
import type { System } from './types';
import type { FrameContext } from './FrameContext';
import { InvariantViolationError } from '../errors';
import { logger, perfLogger } from '../../logger';

/**
 * Registered system with its priority
 */
interface RegisteredSystem {
  system: System;
  priority: number;
}

/**
 * SystemRunner - Manages and executes all game systems
 *
 * Systems are executed in priority order (lower numbers first);
 * equal priorities run in registration order.
 */
export class SystemRunner {
  private systems: RegisteredSystem[] = [];

  /**
   * Register a system with a priority
   * @param system The system to register
   * @param priority Lower numbers run first
   */
  register(system: System, priority: number): void {
    this.systems.push({ system, priority });
    // Keep sorted by priority (Array.prototype.sort is stable)
    this.systems.sort((a, b) => a.priority - b.priority);
  }

  /**
   * Run all systems in priority order
   * Skips systems gated to a different game state, logs failures (rethrowing
   * InvariantViolationError), and logs a breakdown when the frame is slow
   */
  update(world: World, deltaTime: number, ctx: FrameContext): void {
    const frameStart = performance.now();
    const timings: { name: string; ms: number }[] = [];

    // State is sampled once: a transition requested mid-frame takes effect next frame
    const state = ctx.gameState.current;

    for (const { system } of this.systems) {
      if (system.runIn !== undefined && system.runIn !== state) continue;

      const systemStart = performance.now();
      try {
        system.update(world, deltaTime, ctx);
      } catch (error) {
        logger.error({
          event: 'system_error',
          system: system.name,
          error: error instanceof Error ? error.message : String(error),
          stack: error instanceof Error ? error.stack : undefined,
        }, `System ${system.name} threw an error`);
        // Broken invariants are fatal; anything else only loses this system's pass
        if (error instanceof InvariantViolationError) throw error;
      }
      timings.push({ name: system.name, ms: performance.now() - systemStart });
    }

    const totalMs = performance.now() - frameStart;

    if (totalMs > GAME_CONFIG.SLOW_FRAME_MS) {
      // Slowest first
      const sorted = [...timings].sort((a, b) => b.ms - a.ms);
      const breakdown = sorted
        .filter(t => t.ms > 0.5)
        .map(t => `${t.name}:${t.ms.toFixed(1)}`)
        .join(' ');

      perfLogger.info({
        event: 'slow_frame_breakdown',
        totalMs: totalMs.toFixed(1),
        breakdown: sorted.filter(t => t.ms > 0.5).map(t => ({ name: t.name, ms: parseFloat(t.ms.toFixed(2)) })),
      }, `Slow frame ${totalMs.toFixed(1)}ms: ${breakdown}`);
    }
  }

  /**
   * Get list of registered systems (for debugging)
   */
  getSystemNames(): string[] {
    return this.systems.map(s => `${s.system.name} (priority: ${s.priority})`);
  }
}
