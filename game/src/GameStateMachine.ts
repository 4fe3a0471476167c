// ============================================
// Game State Machine
// Holds the top-level game state consumed by the frame loop
// ============================================

import { GameState } from '#shared';
import { logStateChange } from './logger';

type StateListener = (from: GameState, to: GameState) => void;

/**
 * The only part of game state the collision core writes to.
 * Requesting the terminal state more than once is a no-op.
 */
export interface GameStateController {
  readonly current: GameState;
  requestTerminalState(): void;
}

/**
 * GameStateMachine - current state plus change notifications.
 *
 * Screens and menus (pause, title, game-over UI) live in the host; they
 * subscribe with onChange() and drive transitions with set().
 */
export class GameStateMachine implements GameStateController {
  private state: GameState;
  private listeners = new Set<StateListener>();

  constructor(initial: GameState = GameState.PLAYING) {
    this.state = initial;
  }

  get current(): GameState {
    return this.state;
  }

  /**
   * Move to a new state.
   * @returns false if already in that state (listeners are not called)
   */
  set(next: GameState): boolean {
    if (next === this.state) return false;

    const previous = this.state;
    this.state = next;
    logStateChange(previous, next);

    for (const listener of this.listeners) {
      listener(previous, next);
    }
    return true;
  }

  /**
   * Request GAME_OVER. Safe to call for every lethal hit in a frame.
   */
  requestTerminalState(): void {
    this.set(GameState.GAME_OVER);
  }

  /**
   * Subscribe to state changes
   * @returns unsubscribe function
   */
  onChange(listener: StateListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}
