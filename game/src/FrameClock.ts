// ============================================
// Frame Clock
// Wall time between frames, in seconds
// ============================================

import { GAME_CONFIG } from '#shared';

/**
 * FrameClock - measures the delta between consecutive ticks.
 *
 * The first tick returns 0. Deltas are clamped to MAX_FRAME_TIME_MS so a
 * stalled process doesn't hand the simulation one enormous step.
 */
export class FrameClock {
  private last: number | null = null;

  /**
   * @param now - Millisecond time source (injectable for tests)
   * @param maxFrameMs - Upper bound for a single delta
   */
  constructor(
    private readonly now: () => number = () => performance.now(),
    private readonly maxFrameMs: number = GAME_CONFIG.MAX_FRAME_TIME_MS
  ) {}

  /**
   * Advance the clock.
   * @returns Seconds since the previous tick
   */
  tick(): number {
    const current = this.now();
    const previous = this.last;
    this.last = current;

    if (previous === null) return 0;

    const elapsedMs = Math.min(Math.max(0, current - previous), this.maxFrameMs);
    return elapsedMs / 1000;
  }

  /**
   * Forget the previous tick (next tick returns 0). Used when the loop restarts.
   */
  reset(): void {
    this.last = null;
  }
}
