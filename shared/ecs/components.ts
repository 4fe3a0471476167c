// ============================================
// ECS Component Interfaces
// All component data shapes for the ECS
// ============================================

import type { Faction } from '../types';

// ============================================
// Spatial Components
// ============================================

/**
 * Transform - where an entity is and how it is scaled.
 * Centered coordinates: (0, 0) is the middle of the viewport, +y is up.
 */
export interface TransformComponent {
  x: number;
  y: number;
  scale: { x: number; y: number };
}

/**
 * Velocity - world units per second.
 * Read by the host's movement system, never by the collision core.
 */
export interface VelocityComponent {
  x: number;
  y: number;
}

/**
 * Hitbox - circular collision boundary centered on the transform.
 * radius >= 0 (enforced by the factories)
 */
export interface HitboxComponent {
  radius: number;
}

/**
 * SpriteSize - rendered extent of a sprite-sheet entity.
 * Already multiplied by the sprite's scale when created.
 */
export interface SpriteSizeComponent {
  width: number;
  height: number;
}

/**
 * Sprite - raw size of a plain sprite.
 * Multiplied by the transform's scale wherever screen bounds are computed.
 */
export interface SpriteComponent {
  width: number;
  height: number;
}

// ============================================
// Combat Components
// ============================================

/**
 * Faction - who owns an actor or fired a bullet.
 * Decides which damage pass a bullet takes part in.
 */
export interface FactionComponent {
  faction: Faction;
}

/**
 * Bullet - projectile payload. Single hit, no penetration.
 */
export interface BulletComponent {
  damage: number; // >= 0
}

/**
 * Health - current is always within [0, max].
 * Only applyDamage() writes to current.
 */
export interface HealthComponent {
  current: number;
  max: number;
}

/**
 * InvulnTimer - countdown after a landed hit.
 * The owner is vulnerable once remaining reaches 0.
 */
export interface InvulnTimerComponent {
  duration: number; // Seconds, restored on every landed hit
  remaining: number; // Seconds left, 0 = vulnerable
}

// ============================================
// Component Registry
// ============================================

/**
 * Maps every component type key to its data shape.
 * World keeps one ComponentStore per key.
 */
export interface ComponentMap {
  Transform: TransformComponent;
  Velocity: VelocityComponent;
  Hitbox: HitboxComponent;
  SpriteSize: SpriteSizeComponent;
  Sprite: SpriteComponent;
  Faction: FactionComponent;
  Bullet: BulletComponent;
  Health: HealthComponent;
  InvulnTimer: InvulnTimerComponent;
}
