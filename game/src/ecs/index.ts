// ============================================
// ECS - Entity Component System
// ============================================

// Core types, classes, and components from shared package
export { World, ComponentStore, Components, Tags } from '#shared';
export type {
  EntityId,
  ComponentType,
  Tag,
  TransformComponent,
  VelocityComponent,
  HitboxComponent,
  SpriteSizeComponent,
  SpriteComponent,
  FactionComponent,
  BulletComponent,
  HealthComponent,
  InvulnTimerComponent,
} from '#shared';

// Factories and World Setup
export {
  createWorld,
  createPlayer,
  createEnemy,
  createBullet,
  createStar,
  destroyEntity,
  // Query helpers
  getAllPlayerEntities,
  getBulletsOfFaction,
  // Component access
  getTransform,
  getHitbox,
  getHealth,
  getBullet,
  getFaction,
  requireTransform,
  requireHitbox,
  requireHealth,
  requireInvulnTimer,
  // Health & invulnerability
  applyDamage,
  isDead,
  tickInvuln,
  isVulnerable,
  resetInvuln,
} from './factories';

export { InvariantViolationError } from './errors';

// Systems
export * from './systems';
