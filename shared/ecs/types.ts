// ============================================
// ECS Core Types
// ============================================

import type { ComponentMap } from './components';

/**
 * Entity ID - just a number.
 * Entities have no data themselves, they're just IDs that
 * components are attached to. IDs are never reused by a World.
 */
export type EntityId = number;

/**
 * Component type identifier - key into ComponentMap.
 */
export type ComponentType = keyof ComponentMap;

/**
 * Standard component types used throughout the ECS.
 * Using const object for type safety while keeping string values.
 */
export const Components = {
  // Spatial
  Transform: 'Transform',
  Velocity: 'Velocity',
  Hitbox: 'Hitbox',
  SpriteSize: 'SpriteSize',
  Sprite: 'Sprite',

  // Combat
  Faction: 'Faction',
  Bullet: 'Bullet',
  Health: 'Health',
  InvulnTimer: 'InvulnTimer',
} as const satisfies { [K in ComponentType]: K };

/**
 * Entity tags for quick type identification.
 * Tags are lightweight - just a Set<string> per entity.
 */
export const Tags = {
  Player: 'player',
  Enemy: 'enemy',
  Bullet: 'bullet',
  Star: 'star',

  // Opt-in marker for the off-screen reaper
  DespawnOutside: 'despawn_outside',
} as const;

export type Tag = (typeof Tags)[keyof typeof Tags];
