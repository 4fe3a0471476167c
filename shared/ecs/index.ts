// ============================================
// ECS Package Exports
// ============================================

// Core ECS classes
export { World } from './World';
export { ComponentStore } from './Component';

// Types and constants
export { Components, Tags } from './types';
export type { EntityId, ComponentType, Tag } from './types';

// Component interfaces
export type {
  ComponentMap,
  // Spatial components
  TransformComponent,
  VelocityComponent,
  HitboxComponent,
  SpriteSizeComponent,
  SpriteComponent,
  // Combat components
  FactionComponent,
  BulletComponent,
  HealthComponent,
  InvulnTimerComponent,
} from './components';
