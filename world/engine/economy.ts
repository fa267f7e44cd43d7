import type { WorldEvent } from '../actions/types';
import { RESOURCE_TYPES } from '../entities/entity';
import { createResource } from '../entities/resource';
import type { WorldState } from '../state/worldState';
import { insertEntity } from '../state/transactions';

// ============================================================================
// ECONOMY - Resource placement at start-up and on the respawn schedule
// ============================================================================

/**
 * Place up to `count` new resources on empty cells.
 * Type and quantity come from the world's seeded RNG.
 */
export function scatterResources(state: WorldState, count: number): WorldEvent[] {
  const { minQuantity, maxQuantity } = state.config.respawn;
  const low = Math.max(1, Math.min(minQuantity, maxQuantity));
  const high = Math.max(low, maxQuantity);

  const cells = state.grid.emptyCells();
  const events: WorldEvent[] = [];

  for (let i = 0; i < count && cells.length > 0; i++) {
    const [cell] = cells.splice(state.rng.nextInt(cells.length), 1);
    const resourceType = state.rng.pick(RESOURCE_TYPES);
    const quantity = state.rng.nextIntInclusive(low, high);

    const inserted = insertEntity(
      state,
      createResource(resourceType, quantity, cell.x, cell.y)
    );
    if (inserted.ok) {
      events.push({ type: 'ENTITY_JOINED', entity: inserted.value });
    }
  }

  return events;
}

/** Whether the respawn schedule fires on this tick */
export function isRespawnTick(state: WorldState, tick: number): boolean {
  const { intervalTicks } = state.config.respawn;
  return intervalTicks > 0 && tick > 0 && tick % intervalTicks === 0;
}

/**
 * Top the world back up to `maxResources` on every respawn tick.
 * Only cells with nothing in them are eligible.
 */
export function runRespawn(state: WorldState, tick: number): WorldEvent[] {
  if (!isRespawnTick(state, tick)) return [];

  const live = state.store.resources().length;
  const missing = state.config.respawn.maxResources - live;
  if (missing <= 0) return [];

  return scatterResources(state, missing);
}
