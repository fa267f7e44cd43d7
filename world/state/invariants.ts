import type { WorldState } from './worldState';
import { InvariantViolationError } from '../engine/errors';

/**
 * Every stored entity is in bounds and listed in its own cell, and the grid
 * holds no other memberships. Since ids are unique and each cell is a set,
 * equal counts mean no id appears in a second cell.
 *
 * @throws InvariantViolationError on the first disagreement found
 */
export function verifyPlacement(state: WorldState): void {
  for (const entity of state.store.values()) {
    if (!state.grid.isInBounds(entity.x, entity.y)) {
      throw new InvariantViolationError(
        `Entity ${entity.entityId} sits outside the grid at (${entity.x}, ${entity.y})`,
        entity.entityId
      );
    }
    if (!state.grid.occupantsAt(entity.x, entity.y).has(entity.entityId)) {
      throw new InvariantViolationError(
        `Entity ${entity.entityId} is stored at (${entity.x}, ${entity.y}) but missing from that cell`,
        entity.entityId
      );
    }
  }

  const memberships = state.grid.occupiedCount();
  if (memberships !== state.store.size) {
    throw new InvariantViolationError(
      `Grid holds ${memberships} memberships for ${state.store.size} stored entities`
    );
  }
}
