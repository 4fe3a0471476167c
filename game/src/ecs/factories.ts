// ============================================
// ECS Factories
// Entity creation, component access and combat helpers
// ============================================

import {
  World,
  Components,
  Tags,
  Faction,
  GAME_CONFIG,
  spriteSize,
  type EntityId,
  type Vec2,
  type TransformComponent,
  type HitboxComponent,
  type HealthComponent,
  type InvulnTimerComponent,
  type BulletComponent,
  type FactionComponent,
} from '#shared';

// ============================================
// World Setup
// ============================================

/**
 * Create a new ECS World. Every component store is built in.
 */
export function createWorld(): World {
  return new World();
}

// ============================================
// Validation
// ============================================

function assertNonNegative(value: number, what: string): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new Error(`InvalidComponent: ${what} must be a non-negative number, got ${value}`);
  }
}

function createTransform(position: Vec2, scale: number | Vec2 = 1): TransformComponent {
  const s = typeof scale === 'number' ? { x: scale, y: scale } : { x: scale.x, y: scale.y };
  return { x: position.x, y: position.y, scale: s };
}

// ============================================
// Entity Factories
// ============================================

/**
 * Create the player ship.
 * Spawns vulnerable (timer already elapsed) at full health.
 * Extent is sprite-sheet based: frame size x scale.
 */
export function createPlayer(
  world: World,
  options: {
    position?: Vec2;
    radius: number;
    frame: { width: number; height: number };
    scale?: number;
    maxHealth?: number;
    invulnDuration?: number;
  }
): EntityId {
  const {
    position = { x: 0, y: 0 },
    radius,
    frame,
    scale = 1,
    maxHealth = GAME_CONFIG.PLAYER_MAX_HEALTH,
    invulnDuration = GAME_CONFIG.PLAYER_INVULN_DURATION,
  } = options;
  assertNonNegative(radius, 'Hitbox radius');
  assertNonNegative(maxHealth, 'Health max');
  assertNonNegative(invulnDuration, 'InvulnTimer duration');

  const entity = world.createEntity();
  world.addComponent(entity, Components.Transform, createTransform(position));
  world.addComponent(entity, Components.Hitbox, { radius });
  world.addComponent(entity, Components.SpriteSize, spriteSize(frame.width, frame.height, scale));
  world.addComponent(entity, Components.Faction, { faction: Faction.PLAYER });
  world.addComponent(entity, Components.Health, { current: maxHealth, max: maxHealth });
  world.addComponent(entity, Components.InvulnTimer, { duration: invulnDuration, remaining: 0 });
  world.addComponent(entity, Components.Velocity, { x: 0, y: 0 });
  world.addTag(entity, Tags.Player);
  return entity;
}

/**
 * Create an enemy ship (sprite-sheet extent).
 * Enemies that fly in from off-screen should opt in to despawnOutside.
 */
export function createEnemy(
  world: World,
  options: {
    position: Vec2;
    radius: number;
    frame: { width: number; height: number };
    scale?: number;
    health: number;
    velocity?: Vec2;
    despawnOutside?: boolean;
  }
): EntityId {
  const { position, radius, frame, scale = 1, health, velocity, despawnOutside = true } = options;
  assertNonNegative(radius, 'Hitbox radius');
  assertNonNegative(health, 'Health max');

  const entity = world.createEntity();
  world.addComponent(entity, Components.Transform, createTransform(position));
  world.addComponent(entity, Components.Hitbox, { radius });
  world.addComponent(entity, Components.SpriteSize, spriteSize(frame.width, frame.height, scale));
  world.addComponent(entity, Components.Faction, { faction: Faction.ENEMY });
  world.addComponent(entity, Components.Health, { current: health, max: health });
  if (velocity) {
    world.addComponent(entity, Components.Velocity, { x: velocity.x, y: velocity.y });
  }
  world.addTag(entity, Tags.Enemy);
  if (despawnOutside) {
    world.addTag(entity, Tags.DespawnOutside);
  }
  return entity;
}

/**
 * Create a bullet fired by either faction.
 * Bullets are plain sprites scaled by their transform and are always reaped off-screen.
 */
export function createBullet(
  world: World,
  options: {
    faction: Faction;
    position: Vec2;
    radius: number;
    damage: number;
    sprite: { width: number; height: number };
    scale?: number | Vec2;
    velocity?: Vec2;
  }
): EntityId {
  const { faction, position, radius, damage, sprite, scale = 1, velocity } = options;
  assertNonNegative(radius, 'Hitbox radius');
  assertNonNegative(damage, 'Bullet damage');

  const entity = world.createEntity();
  world.addComponent(entity, Components.Transform, createTransform(position, scale));
  world.addComponent(entity, Components.Hitbox, { radius });
  world.addComponent(entity, Components.Sprite, { width: sprite.width, height: sprite.height });
  world.addComponent(entity, Components.Faction, { faction });
  world.addComponent(entity, Components.Bullet, { damage });
  if (velocity) {
    world.addComponent(entity, Components.Velocity, { x: velocity.x, y: velocity.y });
  }
  world.addTag(entity, Tags.Bullet);
  world.addTag(entity, Tags.DespawnOutside);
  return entity;
}

/**
 * Create a background star (plain sprite, wraps instead of despawning).
 */
export function createStar(
  world: World,
  options: {
    position: Vec2;
    sprite: { width: number; height: number };
    scale?: number;
    velocity?: Vec2;
  }
): EntityId {
  const { position, sprite, scale = 1, velocity } = options;

  const entity = world.createEntity();
  world.addComponent(entity, Components.Transform, createTransform(position, scale));
  world.addComponent(entity, Components.Sprite, { width: sprite.width, height: sprite.height });
  if (velocity) {
    world.addComponent(entity, Components.Velocity, { x: velocity.x, y: velocity.y });
  }
  world.addTag(entity, Tags.Star);
  return entity;
}

/**
 * Destroy an entity. Safe to call on an already-destroyed handle.
 * @returns true if the entity was still alive
 */
export function destroyEntity(world: World, entity: EntityId): boolean {
  return world.destroyEntity(entity);
}

// ============================================
// Query Helpers
// ============================================

export function getAllPlayerEntities(world: World): EntityId[] {
  return world.getEntitiesWithTag(Tags.Player);
}

/**
 * Bullets of one faction that can collide (have Bullet, Hitbox, Transform).
 * Returns a snapshot safe to destroy from while iterating.
 */
export function getBulletsOfFaction(world: World, faction: Faction): EntityId[] {
  return world
    .queryTagged(Tags.Bullet, Components.Bullet, Components.Hitbox, Components.Transform, Components.Faction)
    .filter((entity) => getFaction(world, entity)?.faction === faction);
}

// ============================================
// Component Access
// ============================================

export function getTransform(world: World, entity: EntityId): TransformComponent | undefined {
  return world.getComponent(entity, Components.Transform);
}

export function getHitbox(world: World, entity: EntityId): HitboxComponent | undefined {
  return world.getComponent(entity, Components.Hitbox);
}

export function getHealth(world: World, entity: EntityId): HealthComponent | undefined {
  return world.getComponent(entity, Components.Health);
}

export function getBullet(world: World, entity: EntityId): BulletComponent | undefined {
  return world.getComponent(entity, Components.Bullet);
}

export function getFaction(world: World, entity: EntityId): FactionComponent | undefined {
  return world.getComponent(entity, Components.Faction);
}

/**
 * Get an entity's transform.
 * Throws if component is missing (invariant violation).
 */
export function requireTransform(world: World, entity: EntityId): TransformComponent {
  const comp = world.getComponent(entity, Components.Transform);
  if (!comp) {
    throw new Error(`EntityMissingComponent: Transform missing on entity ${entity}`);
  }
  return comp;
}

export function requireHitbox(world: World, entity: EntityId): HitboxComponent {
  const comp = world.getComponent(entity, Components.Hitbox);
  if (!comp) {
    throw new Error(`EntityMissingComponent: Hitbox missing on entity ${entity}`);
  }
  return comp;
}

export function requireHealth(world: World, entity: EntityId): HealthComponent {
  const comp = world.getComponent(entity, Components.Health);
  if (!comp) {
    throw new Error(`EntityMissingComponent: Health missing on entity ${entity}`);
  }
  return comp;
}

export function requireInvulnTimer(world: World, entity: EntityId): InvulnTimerComponent {
  const comp = world.getComponent(entity, Components.InvulnTimer);
  if (!comp) {
    throw new Error(`EntityMissingComponent: InvulnTimer missing on entity ${entity}`);
  }
  return comp;
}

// ============================================
// Health & Invulnerability
// ============================================

/**
 * Subtract damage, saturating at 0.
 * Negative amounts deal nothing.
 * @returns Damage actually dealt
 */
export function applyDamage(health: HealthComponent, amount: number): number {
  const dealt = Math.min(health.current, Math.max(0, amount));
  health.current -= dealt;
  return dealt;
}

export function isDead(health: HealthComponent): boolean {
  return health.current === 0;
}

/**
 * Count the invulnerability window down by dt seconds (never below 0)
 */
export function tickInvuln(timer: InvulnTimerComponent, dt: number): void {
  timer.remaining = Math.max(0, timer.remaining - dt);
}

export function isVulnerable(timer: InvulnTimerComponent): boolean {
  return timer.remaining <= 0;
}

/**
 * Restart the full invulnerability window
 */
export function resetInvuln(timer: InvulnTimerComponent): void {
  timer.remaining = timer.duration;
}
