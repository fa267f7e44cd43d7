// ============================================================================
// ACTION PIPELINE - Every queued intent goes decode -> validate -> apply
// ============================================================================

import type { WorldState } from '../state/worldState';
import type { AgentEntity, Inventory, ResourceEntity } from '../entities/entity';
import { isResource } from '../entities/entity';
import type {
  MoveAction,
  PendingAction,
  WorldAction,
  WorldEvent,
  Result,
} from './types';
import { ok, err } from './types';
import { deleteEntity, relocateEntity } from '../state/transactions';

// ============================================================================
// DECODING
// ============================================================================

function readStep(params: Readonly<Record<string, unknown>>, key: 'dx' | 'dy'): number | null {
  const value = params[key];
  if (value === undefined) return 0;
  if (typeof value !== 'number' || !Number.isInteger(value)) return null;
  return value;
}

/** Turn a raw queued intent into a typed action */
export function decodeAction(pending: PendingAction): Result<WorldAction> {
  switch (pending.action) {
    case 'move': {
      const dx = readStep(pending.params, 'dx');
      const dy = readStep(pending.params, 'dy');
      if (dx === null || dy === null) {
        return err('INVALID_PARAMS', 'move needs integer dx and dy');
      }
      return ok({ type: 'move', dx, dy });
    }
    case 'harvest':
      return ok({ type: 'harvest' });
    case 'craft':
      return ok({ type: 'craft' });
    default:
      return err('UNKNOWN_ACTION', `Unknown action: ${pending.action}`);
  }
}

// ============================================================================
// VALIDATION
// ============================================================================

export function validateAction(state: WorldState, actorId: string): Result<AgentEntity> {
  // Actor must exist and be an agent
  return state.store.getAgent(actorId);
}

// ============================================================================
// APPLICATION
// ============================================================================

/**
 * Apply a validated action.
 * An empty event list means the action was a no-op (blocked move, nothing to
 * harvest, not enough stock to craft).
 */
export function applyAction(
  state: WorldState,
  actor: AgentEntity,
  action: WorldAction
): WorldEvent[] {
  switch (action.type) {
    case 'move':
      return applyMove(state, actor, action);
    case 'harvest':
      return applyHarvest(state, actor);
    case 'craft':
      return applyCraft(state, actor);
  }
}

function applyMove(state: WorldState, actor: AgentEntity, action: MoveAction): WorldEvent[] {
  if (action.dx === 0 && action.dy === 0) return [];

  const targetX = actor.x + action.dx;
  const targetY = actor.y + action.dy;

  // Off the edge: stay put
  if (!state.grid.isInBounds(targetX, targetY)) return [];

  const moved = relocateEntity(state, actor.entityId, targetX, targetY);
  if (!moved.ok) return [];

  return [
    {
      type: 'ENTITY_MOVED',
      entityId: actor.entityId,
      x: targetX,
      y: targetY,
    },
  ];
}

/** First resource in the agent's cell, in placement order */
function findResourceAt(state: WorldState, x: number, y: number): ResourceEntity | undefined {
  for (const id of state.grid.occupantsAt(x, y)) {
    const found = state.store.get(id);
    if (found.ok && isResource(found.value)) return found.value;
  }
  return undefined;
}

function applyHarvest(state: WorldState, actor: AgentEntity): WorldEvent[] {
  const resource = findResourceAt(state, actor.x, actor.y);
  if (!resource) return [];

  const amount = Math.min(state.config.harvestAmount, resource.quantity);
  if (amount <= 0) return [];

  const drained = state.store.adjustQuantity(resource.entityId, -amount);
  if (!drained.ok) return [];
  const credit: Inventory =
    resource.resourceType === 'ORE' ? { ORE: amount } : { FUEL: amount };
  const credited = state.store.adjustInventory(actor.entityId, credit);
  if (!credited.ok) {
    // Put the stock back so nothing is lost
    state.store.adjustQuantity(resource.entityId, amount);
    return [];
  }

  const events: WorldEvent[] = [
    {
      type: 'RESOURCE_HARVESTED',
      agentId: actor.entityId,
      resourceId: resource.entityId,
      resourceType: resource.resourceType,
      amount,
      remaining: drained.value.quantity,
    },
  ];

  if (drained.value.quantity === 0) {
    deleteEntity(state, resource.entityId);
    events.push({ type: 'RESOURCE_DEPLETED', resourceId: resource.entityId });
  }

  return events;
}

function applyCraft(state: WorldState, actor: AgentEntity): WorldEvent[] {
  const { ore, fuel } = state.config.recipe;
  const crafted = state.store.adjustInventory(actor.entityId, {
    ORE: -ore,
    FUEL: -fuel,
    COMPONENTS: 1,
  });

  // INSUFFICIENT_RESOURCE: nothing was debited, the craft is a no-op
  if (!crafted.ok) return [];

  return [
    {
      type: 'ITEM_CRAFTED',
      agentId: actor.entityId,
      item: 'COMPONENTS',
      quantity: 1,
    },
  ];
}

// ============================================================================
// UNIFIED PIPELINE ENTRY POINT
// ============================================================================

export function processAction(state: WorldState, pending: PendingAction): Result<WorldEvent[]> {
  const decoded = decodeAction(pending);
  if (!decoded.ok) return decoded;

  const actor = validateAction(state, pending.agentId);
  if (!actor.ok) return actor;

  return ok(applyAction(state, actor.value, decoded.value));
}
