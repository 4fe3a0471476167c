// ============================================
// Test Utilities for ECS System Tests
// ============================================

import { vi, type Mock } from 'vitest';
import { Faction, GameState, type SoundCue, type World, type WindowSize } from '#shared';
import { createWorld, createPlayer, createEnemy, createBullet, createStar } from '../../factories';
import { GameStateMachine } from '../../../GameStateMachine';
import type { FrameContext } from '../FrameContext';

// ============================================
// Test Constants
// ============================================

export const VIEWPORT: WindowSize = { width: 800, height: 600 };

// 64x64 ship frames: inner bound 368 x 268, outer bound 432 x 332
export const SHIP_FRAME = { width: 64, height: 64 };

export const PLAYER_RADIUS = 10;
export const BULLET_RADIUS = 2;
export const FRAME_DT = 0.016;

export interface TestContext extends FrameContext {
  audio: { play: Mock<(cue: SoundCue) => void> };
  gameState: GameStateMachine;
}

// ============================================
// World Setup
// ============================================

export function createTestWorld(): World {
  return createWorld();
}

/**
 * Frame context with a recording audio trigger and a real state machine.
 */
export function createTestContext(
  options: { viewport?: WindowSize; state?: GameState } = {}
): TestContext {
  const { viewport = VIEWPORT, state = GameState.PLAYING } = options;
  return {
    viewport,
    audio: { play: vi.fn<(cue: SoundCue) => void>() },
    gameState: new GameStateMachine(state),
  };
}

// ============================================
// Entity Factories
// ============================================

/**
 * Create a test player (64x64 frame, radius 10, full health, vulnerable).
 */
export function createTestPlayer(
  world: World,
  options: { x?: number; y?: number; health?: number; invulnDuration?: number } = {}
): number {
  const { x = 0, y = 0, health = 10, invulnDuration = 1.0 } = options;
  return createPlayer(world, {
    position: { x, y },
    radius: PLAYER_RADIUS,
    frame: SHIP_FRAME,
    maxHealth: health,
    invulnDuration,
  });
}

export function createTestEnemy(
  world: World,
  options: { x?: number; y?: number; health?: number; radius?: number } = {}
): number {
  const { x = 0, y = 100, health = 10, radius = 12 } = options;
  return createEnemy(world, {
    position: { x, y },
    radius,
    frame: SHIP_FRAME,
    health,
  });
}

/**
 * Create a test bullet (8x16 sprite, radius 2).
 */
export function createTestBullet(
  world: World,
  options: { faction: Faction; x?: number; y?: number; damage?: number }
): number {
  const { faction, x = 0, y = 0, damage = 1 } = options;
  return createBullet(world, {
    faction,
    position: { x, y },
    radius: BULLET_RADIUS,
    damage,
    sprite: { width: 8, height: 16 },
  });
}

export function createEnemyBullet(
  world: World,
  options: { x?: number; y?: number; damage?: number } = {}
): number {
  return createTestBullet(world, { faction: Faction.ENEMY, ...options });
}

export function createPlayerBullet(
  world: World,
  options: { x?: number; y?: number; damage?: number } = {}
): number {
  return createTestBullet(world, { faction: Faction.PLAYER, ...options });
}

export function createTestStar(
  world: World,
  options: { x?: number; y?: number; height?: number; scale?: number } = {}
): number {
  const { x = 0, y = 0, height = 64, scale = 1 } = options;
  return createStar(world, {
    position: { x, y },
    sprite: { width: 4, height },
    scale,
  });
}
