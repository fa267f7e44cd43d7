import type {
  AgentEntity,
  Entity,
  Inventory,
  ResourceEntity,
} from '../entities/entity';
import { isAgent, isResource } from '../entities/entity';
import { applyInventoryDelta } from '../entities/agent';
import type { Result } from '../actions/types';
import { ok, err } from '../actions/types';

// ============================================================================
// ENTITY STORE - Canonical entity records keyed by entityId
// ============================================================================

/**
 * Source of truth for positions, inventories and quantities.
 * Records are immutable; every change replaces the record via Map.set.
 * Counts never go negative: a mutation that would is refused whole.
 */
export class EntityStore {
  private readonly entities = new Map<string, Entity>();

  get size(): number {
    return this.entities.size;
  }

  has(entityId: string): boolean {
    return this.entities.has(entityId);
  }

  get(entityId: string): Result<Entity> {
    const entity = this.entities.get(entityId);
    if (!entity) {
      return err('NOT_FOUND', `Entity ${entityId} does not exist in the world`);
    }
    return ok(entity);
  }

  getAgent(entityId: string): Result<AgentEntity> {
    const entity = this.entities.get(entityId);
    if (!entity || !isAgent(entity)) {
      return err('NOT_FOUND', `Agent ${entityId} does not exist in the world`);
    }
    return ok(entity);
  }

  getResource(entityId: string): Result<ResourceEntity> {
    const entity = this.entities.get(entityId);
    if (!entity || !isResource(entity)) {
      return err('NOT_FOUND', `Resource ${entityId} does not exist in the world`);
    }
    return ok(entity);
  }

  upsert(entity: Entity): void {
    this.entities.set(entity.entityId, entity);
  }

  remove(entityId: string): Result<Entity> {
    const entity = this.entities.get(entityId);
    if (!entity) {
      return err('NOT_FOUND', `Entity ${entityId} does not exist in the world`);
    }
    this.entities.delete(entityId);
    return ok(entity);
  }

  /** Apply a signed delta to an agent's inventory, all or nothing */
  adjustInventory(agentId: string, delta: Inventory): Result<AgentEntity> {
    const found = this.getAgent(agentId);
    if (!found.ok) return found;

    const inventory = applyInventoryDelta(found.value.inventory, delta);
    if (!inventory) {
      return err(
        'INSUFFICIENT_RESOURCE',
        `Agent ${agentId} cannot cover ${JSON.stringify(delta)}`
      );
    }
    const updated: AgentEntity = { ...found.value, inventory };
    this.entities.set(agentId, updated);
    return ok(updated);
  }

  /** Apply a signed delta to a resource's quantity */
  adjustQuantity(resourceId: string, delta: number): Result<ResourceEntity> {
    const found = this.getResource(resourceId);
    if (!found.ok) return found;

    const quantity = found.value.quantity + delta;
    if (quantity < 0) {
      return err(
        'INSUFFICIENT_RESOURCE',
        `Resource ${resourceId} holds ${found.value.quantity}, cannot remove ${-delta}`
      );
    }
    const updated: ResourceEntity = { ...found.value, quantity };
    this.entities.set(resourceId, updated);
    return ok(updated);
  }

  values(): IterableIterator<Entity> {
    return this.entities.values();
  }

  /** All agents, in insertion order */
  agents(): AgentEntity[] {
    const result: AgentEntity[] = [];
    for (const entity of this.entities.values()) {
      if (isAgent(entity)) result.push(entity);
    }
    return result;
  }

  /** All resources, in insertion order */
  resources(): ResourceEntity[] {
    const result: ResourceEntity[] = [];
    for (const entity of this.entities.values()) {
      if (isResource(entity)) result.push(entity);
    }
    return result;
  }
}
