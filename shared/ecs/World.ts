// ============================================
// ECS World
// ============================================

import { ComponentStore } from './Component';
import type { ComponentMap } from './components';
import type { EntityId, ComponentType, Tag } from './types';

type ComponentStores = { readonly [K in ComponentType]: ComponentStore<ComponentMap[K]> };

/**
 * World - the central ECS container.
 *
 * Manages:
 * - Entity lifecycle (create, destroy)
 * - Component storage (add, get, remove), one store per ComponentMap key
 * - Queries (find entities with specific components)
 * - Tags (lightweight entity classification)
 *
 * All changes are applied in place and are visible to the next reader
 * immediately; there is no deferred command buffer.
 */
export class World {
  private nextEntityId = 1;
  private entities = new Set<EntityId>();
  private entityTags = new Map<EntityId, Set<Tag>>();

  private readonly stores: ComponentStores = {
    Transform: new ComponentStore(),
    Velocity: new ComponentStore(),
    Hitbox: new ComponentStore(),
    SpriteSize: new ComponentStore(),
    Sprite: new ComponentStore(),
    Faction: new ComponentStore(),
    Bullet: new ComponentStore(),
    Health: new ComponentStore(),
    InvulnTimer: new ComponentStore(),
  };

  // ============================================
  // Entity Lifecycle
  // ============================================

  /**
   * Create a new entity.
   * Returns the entity ID (just a number).
   */
  createEntity(): EntityId {
    const id = this.nextEntityId++;
    this.entities.add(id);
    return id;
  }

  /**
   * Destroy an entity and all its components.
   * Destroying an entity that no longer exists is a no-op, so two systems
   * may both remove the same bullet within one frame.
   * Returns true if the entity existed.
   */
  destroyEntity(id: EntityId): boolean {
    if (!this.entities.has(id)) return false;

    this.entities.delete(id);

    for (const store of Object.values(this.stores)) {
      store.delete(id);
    }

    this.entityTags.delete(id);
    return true;
  }

  hasEntity(id: EntityId): boolean {
    return this.entities.has(id);
  }

  getAllEntities(): EntityId[] {
    return Array.from(this.entities);
  }

  get entityCount(): number {
    return this.entities.size;
  }

  // ============================================
  // Component Management
  // ============================================

  /**
   * Get the store for a component type.
   */
  getStore<K extends ComponentType>(type: K): ComponentStore<ComponentMap[K]> {
    return this.stores[type];
  }

  /**
   * Add a component to an entity.
   * Throws if the entity doesn't exist (components on dead handles would leak).
   */
  addComponent<K extends ComponentType>(entity: EntityId, type: K, data: ComponentMap[K]): void {
    if (!this.entities.has(entity)) {
      throw new Error(`EntityNotFound: cannot add ${type} to entity ${entity}`);
    }
    this.stores[type].set(entity, data);
  }

  /**
   * Get a component from an entity.
   * Returns undefined if entity doesn't have the component.
   */
  getComponent<K extends ComponentType>(entity: EntityId, type: K): ComponentMap[K] | undefined {
    return this.stores[type].get(entity);
  }

  hasComponent(entity: EntityId, type: ComponentType): boolean {
    return this.stores[type].has(entity);
  }

  removeComponent(entity: EntityId, type: ComponentType): void {
    this.stores[type].delete(entity);
  }

  // ============================================
  // Queries
  // ============================================

  /**
   * Query: get all entities with ALL specified components.
   *
   * Example: world.query('Transform', 'Hitbox')
   * Returns entities that have BOTH Transform AND Hitbox, in creation order.
   */
  query(...types: ComponentType[]): EntityId[] {
    const result: EntityId[] = [];

    for (const entity of this.entities) {
      if (types.every((type) => this.hasComponent(entity, type))) {
        result.push(entity);
      }
    }

    return result;
  }

  /**
   * Query: entities carrying a tag AND all specified components.
   * Returns a snapshot, so callers may destroy entities while iterating it.
   */
  queryTagged(tag: Tag, ...types: ComponentType[]): EntityId[] {
    const result: EntityId[] = [];

    for (const [entity, tags] of this.entityTags) {
      if (tags.has(tag) && types.every((type) => this.hasComponent(entity, type))) {
        result.push(entity);
      }
    }

    return result;
  }

  // ============================================
  // Tags (lightweight entity classification)
  // ============================================

  addTag(entity: EntityId, tag: Tag): void {
    if (!this.entities.has(entity)) {
      throw new Error(`EntityNotFound: cannot tag entity ${entity} with ${tag}`);
    }
    let tags = this.entityTags.get(entity);
    if (!tags) {
      tags = new Set();
      this.entityTags.set(entity, tags);
    }
    tags.add(tag);
  }

  removeTag(entity: EntityId, tag: Tag): void {
    this.entityTags.get(entity)?.delete(tag);
  }

  hasTag(entity: EntityId, tag: Tag): boolean {
    return this.entityTags.get(entity)?.has(tag) ?? false;
  }

  /**
   * Get all entities with a specific tag.
   */
  getEntitiesWithTag(tag: Tag): EntityId[] {
    const result: EntityId[] = [];
    for (const [entity, tags] of this.entityTags) {
      if (tags.has(tag)) {
        result.push(entity);
      }
    }
    return result;
  }

  /**
   * Iterate entities with tag via callback (avoids allocation).
   * The callback must not destroy entities; use getEntitiesWithTag for that.
   */
  forEachWithTag(tag: Tag, callback: (entity: EntityId) => void): void {
    for (const [entity, tags] of this.entityTags) {
      if (tags.has(tag)) {
        callback(entity);
      }
    }
  }

  // ============================================
  // Utilities
  // ============================================

  /**
   * Clear all entities and components.
   * Entity IDs keep counting up so stale handles never alias new entities.
   */
  clear(): void {
    this.entities.clear();
    this.entityTags.clear();
    for (const store of Object.values(this.stores)) {
      store.clear();
    }
  }

  /**
   * Debug: get stats about the world.
   */
  getStats(): {
    entities: number;
    stores: Record<ComponentType, number>;
  } {
    const stores: Record<ComponentType, number> = {
      Transform: this.stores.Transform.size,
      Velocity: this.stores.Velocity.size,
      Hitbox: this.stores.Hitbox.size,
      SpriteSize: this.stores.SpriteSize.size,
      Sprite: this.stores.Sprite.size,
      Faction: this.stores.Faction.size,
      Bullet: this.stores.Bullet.size,
      Health: this.stores.Health.size,
      InvulnTimer: this.stores.InvulnTimer.size,
    };
    return {
      entities: this.entities.size,
      stores,
    };
  }
}
