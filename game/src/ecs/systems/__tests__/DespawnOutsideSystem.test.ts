// ============================================
// DespawnOutsideSystem Unit Tests
// ============================================

import { describe, it, expect, beforeEach } from 'vitest';
import { Components, Faction, Tags, type World } from '#shared';
import { DespawnOutsideSystem } from '../DespawnOutsideSystem';
import { createBullet, requireTransform } from '../../factories';
import {
  createTestWorld,
  createTestContext,
  createTestEnemy,
  createTestPlayer,
  createTestStar,
  FRAME_DT,
  type TestContext,
} from './testUtils';

describe('DespawnOutsideSystem', () => {
  let world: World;
  let ctx: TestContext;
  let system: DespawnOutsideSystem;

  beforeEach(() => {
    world = createTestWorld();
    ctx = createTestContext();
    system = new DespawnOutsideSystem();
  });

  describe('sprite-sheet extent', () => {
    // 800x600 viewport, 64x64 frame: (800 + 64) / 2 + 12 = 444, (600 + 64) / 2 + 12 = 344
    const survivors: Array<[number, number]> = [
      [444, 0],
      [-444, 0],
      [0, 344],
      [0, -344],
    ];
    const reaped: Array<[number, number]> = [
      [444.1, 0],
      [-444.1, 0],
      [0, 344.1],
      [0, -344.1],
    ];

    it.each(survivors)('keeps an entity on the margin at (%d, %d)', (x, y) => {
      const enemy = createTestEnemy(world, { x, y });
      system.update(world, FRAME_DT, ctx);
      expect(world.hasEntity(enemy)).toBe(true);
    });

    it.each(reaped)('destroys an entity past the margin at (%d, %d)', (x, y) => {
      const enemy = createTestEnemy(world, { x, y });
      system.update(world, FRAME_DT, ctx);
      expect(world.hasEntity(enemy)).toBe(false);
    });
  });

  describe('plain-sprite extent', () => {
    it('scales the sprite by the transform', () => {
      // 8x16 sprite at scale 2 -> 16x32: y bound (600 + 32) / 2 + 12 = 328
      const inside = createBullet(world, {
        faction: Faction.ENEMY,
        position: { x: 0, y: 328 },
        radius: 2,
        damage: 1,
        sprite: { width: 8, height: 16 },
        scale: 2,
      });
      const outside = createBullet(world, {
        faction: Faction.ENEMY,
        position: { x: 0, y: 328.5 },
        radius: 2,
        damage: 1,
        sprite: { width: 8, height: 16 },
        scale: 2,
      });

      system.update(world, FRAME_DT, ctx);

      expect(world.hasEntity(inside)).toBe(true);
      expect(world.hasEntity(outside)).toBe(false);
    });

    it('applies non-uniform scale per axis', () => {
      // 8x16 sprite at scale (1, 3) -> 8x48: y bound (600 + 48) / 2 + 12 = 336
      const bullet = createBullet(world, {
        faction: Faction.PLAYER,
        position: { x: 0, y: -336 },
        radius: 2,
        damage: 1,
        sprite: { width: 8, height: 16 },
        scale: { x: 1, y: 3 },
      });

      system.update(world, FRAME_DT, ctx);
      expect(world.hasEntity(bullet)).toBe(true);

      requireTransform(world, bullet).y = -336.5;
      system.update(world, FRAME_DT, ctx);
      expect(world.hasEntity(bullet)).toBe(false);
    });
  });

  describe('entities with both extents', () => {
    function createDualEntity(x: number, sprite: { width: number; height: number }): number {
      const entity = world.createEntity();
      world.addComponent(entity, Components.Transform, { x, y: 0, scale: { x: 1, y: 1 } });
      world.addComponent(entity, Components.SpriteSize, { width: 64, height: 64 });
      world.addComponent(entity, Components.Sprite, sprite);
      world.addTag(entity, Tags.DespawnOutside);
      return entity;
    }

    it('reaps when the smaller plain-sprite extent is exceeded', () => {
      // sheet bound 444, 8px sprite bound (800 + 8) / 2 + 12 = 416
      const entity = createDualEntity(430, { width: 8, height: 16 });

      system.update(world, FRAME_DT, ctx);

      expect(world.hasEntity(entity)).toBe(false);
    });

    it('reaps when the smaller sheet extent is exceeded', () => {
      // 200px sprite bound (800 + 200) / 2 + 12 = 512, sheet bound 444
      const entity = createDualEntity(450, { width: 200, height: 200 });

      system.update(world, FRAME_DT, ctx);

      expect(world.hasEntity(entity)).toBe(false);
    });

    it('keeps an entity inside both bounds', () => {
      const entity = createDualEntity(400, { width: 8, height: 16 });

      system.update(world, FRAME_DT, ctx);

      expect(world.hasEntity(entity)).toBe(true);
    });
  });

  describe('opt-in', () => {
    it('never reaps untagged entities', () => {
      const player = createTestPlayer(world, { x: 5000, y: 5000 });
      const star = createTestStar(world, { x: 5000, y: 5000 });

      system.update(world, FRAME_DT, ctx);

      expect(world.hasEntity(player)).toBe(true);
      expect(world.hasEntity(star)).toBe(true);
    });

    it('skips tagged entities without a size', () => {
      const entity = world.createEntity();
      world.addComponent(entity, Components.Transform, { x: 5000, y: 0, scale: { x: 1, y: 1 } });
      world.addTag(entity, Tags.DespawnOutside);

      system.update(world, FRAME_DT, ctx);

      expect(world.hasEntity(entity)).toBe(true);
    });
  });

  it('tolerates entities destroyed earlier in the frame', () => {
    const enemy = createTestEnemy(world, { x: 1000, y: 0 });
    world.destroyEntity(enemy);

    expect(() => system.update(world, FRAME_DT, ctx)).not.toThrow();
    expect(world.entityCount).toBe(0);
  });
});
