// ============================================
// Game
// Owns the world and drives one frame at a time
// ============================================

import { GAME_CONFIG, GameState, type World, type WindowSize } from '#shared';
import { createWorld } from './ecs/factories';
import {
  SystemRunner,
  SystemPriority,
  PlayerBoundsSystem,
  EnemyBulletCollisionSystem,
  PlayerBulletCollisionSystem,
  EnemyDeathSystem,
  DespawnOutsideSystem,
  StarfieldWrapSystem,
  type System,
  type FrameContext,
} from './ecs/systems';
import { GameStateMachine } from './GameStateMachine';
import { FrameClock } from './FrameClock';
import { silentAudio, type AudioTrigger } from './audio';
import { logGameStarted, logGameStopped } from './logger';

export interface GameOptions {
  viewport?: WindowSize;
  tickRate?: number;
  audio?: AudioTrigger;
  world?: World;
  state?: GameStateMachine;
  clock?: FrameClock;
  /**
   * Receives an error that ended the start() loop. Without it the error is
   * rethrown from the timer callback and reaches the process as uncaught.
   */
  onFatal?: (error: unknown) => void;
}

/**
 * Game - explicit per-frame update loop.
 *
 * Holds the World and calls every registered system in SystemPriority
 * order, passing the viewport, audio and game state explicitly. Hosts add
 * their movement/firing systems with addSystem(system, SystemPriority.MOVEMENT).
 */
export class Game {
  readonly world: World;
  readonly state: GameStateMachine;
  readonly viewport: WindowSize;
  readonly tickRate: number;

  private readonly runner = new SystemRunner();
  private readonly ctx: FrameContext;
  private readonly clock: FrameClock;
  private readonly onFatal?: (error: unknown) => void;
  private interval: ReturnType<typeof setInterval> | null = null;
  private frames = 0;

  constructor(options: GameOptions = {}) {
    this.world = options.world ?? createWorld();
    this.state = options.state ?? new GameStateMachine(GameState.PLAYING);
    this.viewport = options.viewport ?? {
      width: GAME_CONFIG.VIEWPORT_WIDTH,
      height: GAME_CONFIG.VIEWPORT_HEIGHT,
    };
    this.tickRate = options.tickRate ?? GAME_CONFIG.TICK_RATE;
    this.clock = options.clock ?? new FrameClock();
    this.onFatal = options.onFatal;
    this.ctx = {
      viewport: this.viewport,
      audio: options.audio ?? silentAudio,
      gameState: this.state,
    };

    this.runner.register(new PlayerBoundsSystem(), SystemPriority.PLAYER_BOUNDS);
    this.runner.register(new EnemyBulletCollisionSystem(), SystemPriority.ENEMY_BULLET_COLLISION);
    this.runner.register(new PlayerBulletCollisionSystem(), SystemPriority.PLAYER_BULLET_COLLISION);
    this.runner.register(new EnemyDeathSystem(), SystemPriority.ENEMY_DEATH);
    this.runner.register(new DespawnOutsideSystem(), SystemPriority.DESPAWN_OUTSIDE);
    this.runner.register(new StarfieldWrapSystem(), SystemPriority.STARFIELD_WRAP);
  }

  /**
   * Register a host system (movement, firing, spawning)
   */
  addSystem(system: System, priority: number): void {
    this.runner.register(system, priority);
  }

  /**
   * Run one frame
   * @param deltaTime Seconds since the previous frame
   */
  step(deltaTime: number): void {
    this.runner.update(this.world, deltaTime, this.ctx);
    this.frames++;
  }

  get frameCount(): number {
    return this.frames;
  }

  get running(): boolean {
    return this.interval !== null;
  }

  /**
   * Drive frames from a timer at tickRate. No-op if already running.
   * A fatal error from a frame stops the loop and goes to onFatal, or is
   * rethrown when no handler was given.
   */
  start(): void {
    if (this.interval) return;

    this.clock.reset();
    this.clock.tick();
    this.interval = setInterval(() => {
      try {
        this.step(this.clock.tick());
      } catch (error) {
        this.stop();
        if (!this.onFatal) throw error;
        this.onFatal(error);
      }
    }, 1000 / this.tickRate);
    logGameStarted(this.tickRate, this.viewport);
  }

  stop(): void {
    if (!this.interval) return;

    clearInterval(this.interval);
    this.interval = null;
    logGameStopped(this.frames);
  }

  getSystemNames(): string[] {
    return this.runner.getSystemNames();
  }
}
