// ============================================
// Component Store
// ============================================

import type { EntityId } from './types';

/**
 * ComponentStore - a typed Map wrapper for storing component data.
 * Each component type gets its own store: Map<EntityId, ComponentData>
 *
 * Generic parameter T is the component data shape (e.g., TransformComponent).
 */
export class ComponentStore<T> {
  private data = new Map<EntityId, T>();

  /**
   * Set component data for an entity.
   * Overwrites existing data if present.
   */
  set(entity: EntityId, value: T): void {
    this.data.set(entity, value);
  }

  get(entity: EntityId): T | undefined {
    return this.data.get(entity);
  }

  has(entity: EntityId): boolean {
    return this.data.has(entity);
  }

  /**
   * Remove component from entity. No-op when absent.
   */
  delete(entity: EntityId): void {
    this.data.delete(entity);
  }

  /**
   * Iterate over all (entityId, data) pairs in insertion order.
   */
  entries(): IterableIterator<[EntityId, T]> {
    return this.data.entries();
  }

  /**
   * Number of entities with this component.
   */
  get size(): number {
    return this.data.size;
  }

  clear(): void {
    this.data.clear();
  }
}
