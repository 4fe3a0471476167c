// ============================================
// Shared Math Helpers
// Pure geometry used by bounds, reaping, wrapping and collision
// ============================================

import type { Vec2 } from './types';

/**
 * Half-range within which an entity of the given extent stays fully on-screen.
 * Coordinates are centered, so the entity is contained while |pos| <= innerBound.
 */
export function innerBound(dimension: number, extent: number): number {
  return (dimension - extent) / 2;
}

/**
 * Half-range at which an entity of the given extent has fully left the viewport.
 */
export function outerBound(dimension: number, extent: number): number {
  return (dimension + extent) / 2;
}

/**
 * Squared 2D distance between two points
 */
export function distanceSquared(a: Vec2, b: Vec2): number {
  const dx = a.x - b.x;
  const dy = a.y - b.y;
  return dx * dx + dy * dy;
}

/**
 * 2D distance between two points
 */
export function distance(a: Vec2, b: Vec2): number {
  return Math.sqrt(distanceSquared(a, b));
}

/**
 * Circle-circle overlap test.
 * Touching circles (distance exactly ra + rb) do not overlap.
 */
export function circlesOverlap(a: Vec2, ra: number, b: Vec2, rb: number): boolean {
  const radiusSum = ra + rb;
  return distanceSquared(a, b) < radiusSum * radiusSum;
}

/**
 * Clamp a value to [min, max]. Out-of-range values snap to the nearest edge.
 */
export function clamp(value: number, min: number, max: number): number {
  return Math.max(Math.min(value, max), min);
}

/**
 * Rendered extent of a sprite-sheet frame, pre-multiplied by its scale.
 */
export function spriteSize(
  width: number,
  height: number,
  scale: number
): { width: number; height: number } {
  return {
    width: width * scale,
    height: height * scale,
  };
}
