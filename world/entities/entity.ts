// ============================================================================
// ENTITY - Closed set of things that occupy a grid cell
// ============================================================================

export type ResourceType = 'ORE' | 'FUEL';

/** Everything an agent can carry: raw resources plus crafted products */
export type InventoryKey = ResourceType | 'COMPONENTS';

export const RESOURCE_TYPES: readonly ResourceType[] = ['ORE', 'FUEL'];
export const INVENTORY_KEYS: readonly InventoryKey[] = ['ORE', 'FUEL', 'COMPONENTS'];

/** Absent key means zero */
export type Inventory = Readonly<Partial<Record<InventoryKey, number>>>;

interface EntityBase {
  readonly entityId: string;
  /** Tile/grid X coordinate (integer) */
  readonly x: number;
  /** Tile/grid Y coordinate (integer) */
  readonly y: number;
}

export interface ResourceEntity extends EntityBase {
  readonly kind: 'RESOURCE';
  readonly resourceType: ResourceType;
  readonly quantity: number;
}

/**
 * A client-controlled entity. It never holds its connection: the session
 * registry looks the connection up by entityId, so the agent stays valid
 * after its socket is gone.
 */
export interface AgentEntity extends EntityBase {
  readonly kind: 'AGENT';
  readonly displayName: string;
  readonly inventory: Inventory;
}

export type Entity = ResourceEntity | AgentEntity;

export type EntityKind = Entity['kind'];

export function isAgent(entity: Entity): entity is AgentEntity {
  return entity.kind === 'AGENT';
}

export function isResource(entity: Entity): entity is ResourceEntity {
  return entity.kind === 'RESOURCE';
}
