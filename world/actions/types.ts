import type { Entity, InventoryKey, ResourceType } from '../entities/entity';

// ============================================================================
// WORLD ACTIONS - The ONLY way an agent mutates world state
// ============================================================================

/** Step the agent by (dx, dy) cells */
export interface MoveAction {
  readonly type: 'move';
  readonly dx: number;
  readonly dy: number;
}

/** Take stock from a resource on the agent's cell */
export interface HarvestAction {
  readonly type: 'harvest';
}

/** Turn ORE + FUEL into one COMPONENTS unit */
export interface CraftAction {
  readonly type: 'craft';
}

/** Discriminated union of all resolvable actions */
export type WorldAction = MoveAction | HarvestAction | CraftAction;

export type ActionKind = WorldAction['type'];

export const ACTION_KINDS: readonly ActionKind[] = ['move', 'harvest', 'craft'];

/**
 * An intent waiting in the action queue.
 * `action` and `params` are kept as received; they are decoded at resolution
 * time so an unknown kind is recorded against the agent instead of being
 * dropped at the socket.
 */
export interface PendingAction {
  readonly agentId: string;
  readonly action: string;
  readonly params: Readonly<Record<string, unknown>>;
  readonly submittedTick: number;
}

// ============================================================================
// WORLD EVENTS - Outputs returned by the world (never mutate external systems)
// ============================================================================

export interface EntityJoinedEvent {
  readonly type: 'ENTITY_JOINED';
  readonly entity: Entity;
}

export interface EntityLeftEvent {
  readonly type: 'ENTITY_LEFT';
  readonly entityId: string;
}

export interface EntityMovedEvent {
  readonly type: 'ENTITY_MOVED';
  readonly entityId: string;
  readonly x: number;
  readonly y: number;
}

export interface ResourceHarvestedEvent {
  readonly type: 'RESOURCE_HARVESTED';
  readonly agentId: string;
  readonly resourceId: string;
  readonly resourceType: ResourceType;
  readonly amount: number;
  readonly remaining: number;
}

export interface ResourceDepletedEvent {
  readonly type: 'RESOURCE_DEPLETED';
  readonly resourceId: string;
}

export interface ItemCraftedEvent {
  readonly type: 'ITEM_CRAFTED';
  readonly agentId: string;
  readonly item: InventoryKey;
  readonly quantity: number;
}

/** Discriminated union of all world events */
export type WorldEvent =
  | EntityJoinedEvent
  | EntityLeftEvent
  | EntityMovedEvent
  | ResourceHarvestedEvent
  | ResourceDepletedEvent
  | ItemCraftedEvent;

// ============================================================================
// RESULT TYPE - World never throws for agent errors, returns Result instead
// ============================================================================

export type ErrorCode =
  | 'OUT_OF_BOUNDS'
  | 'INSUFFICIENT_RESOURCE'
  | 'NOT_FOUND'
  | 'UNKNOWN_ACTION'
  | 'INVALID_PARAMS'
  | 'ENTITY_EXISTS';

export interface ResultOk<T> {
  readonly ok: true;
  readonly value: T;
}

export interface ResultErr {
  readonly ok: false;
  readonly error: {
    readonly code: ErrorCode;
    readonly message: string;
  };
}

export type Result<T> = ResultOk<T> | ResultErr;

/** Helper to create success result */
export function ok<T>(value: T): ResultOk<T> {
  return { ok: true, value };
}

/** Helper to create error result */
export function err(code: ErrorCode, message: string): ResultErr {
  return { ok: false, error: { code, message } };
}
