// ============================================
// ECS Systems - Index
// ============================================

// Types
export type { System } from './types';
export type { FrameContext } from './FrameContext';
export { SystemPriority } from './types';

// Runner
export { SystemRunner } from './SystemRunner';

// Bounds Systems
export { PlayerBoundsSystem } from './PlayerBoundsSystem';
export { DespawnOutsideSystem } from './DespawnOutsideSystem';
export { StarfieldWrapSystem } from './StarfieldWrapSystem';

// Collision Systems
export { EnemyBulletCollisionSystem } from './EnemyBulletCollisionSystem';
export { PlayerBulletCollisionSystem } from './PlayerBulletCollisionSystem';

// Lifecycle Systems
export { EnemyDeathSystem } from './EnemyDeathSystem';
