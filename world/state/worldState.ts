// ============================================================================
// WORLD STATE - The single source of truth for the simulation
// ============================================================================

import type { WorldConfig } from '../config';
import type { MapDef } from '../map/mapDef';
import { createMapDef } from '../map/mapDef';
import { WorldGrid } from '../map/grid';
import { EntityStore } from './entityStore';
import { SeededRng } from '../utils/rng';

export interface WorldState {
  readonly config: WorldConfig;
  readonly map: MapDef;
  /** Where everything is */
  readonly grid: WorldGrid;
  /** What everything is */
  readonly store: EntityStore;
  readonly rng: SeededRng;
}

/** Create initial world state */
export function createWorldState(config: WorldConfig): WorldState {
  const map = createMapDef(config.width, config.height);
  return {
    config,
    map,
    grid: new WorldGrid(map),
    store: new EntityStore(),
    rng: new SeededRng(config.seed),
  };
}
