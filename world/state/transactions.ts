// ============================================================================
// TRANSACTIONS - Grid and store change together or not at all
// ============================================================================

import type { Entity } from '../entities/entity';
import type { Result } from '../actions/types';
import { ok, err } from '../actions/types';
import type { WorldState } from './worldState';
import { InvariantViolationError } from '../engine/errors';

export function insertEntity(state: WorldState, entity: Entity): Result<Entity> {
  if (state.store.has(entity.entityId)) {
    return err('ENTITY_EXISTS', `Entity ${entity.entityId} already exists in the world`);
  }
  const placed = state.grid.place(entity.entityId, entity.x, entity.y);
  if (!placed.ok) return placed;

  state.store.upsert(entity);
  return ok(entity);
}

export function deleteEntity(state: WorldState, entityId: string): Result<Entity> {
  const removed = state.store.remove(entityId);
  if (!removed.ok) return removed;

  const { x, y } = removed.value;
  if (!state.grid.remove(entityId, x, y)) {
    throw new InvariantViolationError(
      `Entity ${entityId} was in the store at (${x}, ${y}) but not in that grid cell`,
      entityId
    );
  }
  return ok(removed.value);
}

/** Move an entity to (x, y). Fails with OUT_OF_BOUNDS before touching anything. */
export function relocateEntity(
  state: WorldState,
  entityId: string,
  x: number,
  y: number
): Result<Entity> {
  const found = state.store.get(entityId);
  if (!found.ok) return found;
  if (!state.grid.isInBounds(x, y)) {
    return err('OUT_OF_BOUNDS', `Cell (${x}, ${y}) is outside the grid`);
  }

  const entity = found.value;
  if (!state.grid.remove(entityId, entity.x, entity.y)) {
    throw new InvariantViolationError(
      `Entity ${entityId} was in the store at (${entity.x}, ${entity.y}) but not in that grid cell`,
      entityId
    );
  }
  state.grid.place(entityId, x, y);
  const moved: Entity = { ...entity, x, y };
  state.store.upsert(moved);
  return ok(moved);
}
