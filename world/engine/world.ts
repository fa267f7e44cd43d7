// ============================================================================
// WORLD ENGINE - The main API for interacting with the simulation
// ============================================================================

import type { AgentEntity, Entity, ResourceEntity } from '../entities/entity';
import { isAgent } from '../entities/entity';
import { createAgent } from '../entities/agent';
import type { MapDef } from '../map/mapDef';
import { centerOf } from '../map/mapDef';
import type { WorldConfig } from '../config';
import { DEFAULT_WORLD_CONFIG } from '../config';
import type { WorldState } from '../state/worldState';
import type { PendingAction, WorldEvent, Result } from '../actions/types';
import { ok } from '../actions/types';
import { createWorldState } from '../state/worldState';
import { insertEntity, deleteEntity } from '../state/transactions';
import { verifyPlacement } from '../state/invariants';
import { processAction } from '../actions/pipeline';
import { runRespawn, scatterResources } from './economy';
import type { ActionOutcome, WorldSnapshot } from './snapshot';
import { buildSnapshot } from './snapshot';

export interface SpawnAgentOptions {
  readonly entityId?: string;
  readonly x?: number;
  readonly y?: number;
}

// ============================================================================
// WORLD CLASS
// ============================================================================

/**
 * World is the SINGLE SOURCE OF TRUTH for the simulation.
 *
 * Invariants:
 * - All operations are synchronous
 * - Grid and store are only changed together
 * - Agent errors are returned as Result, never thrown
 * - Only a grid/store disagreement throws (InvariantViolationError)
 */
export class World {
  private readonly state: WorldState;
  private currentTick = 0;

  constructor(config: WorldConfig = DEFAULT_WORLD_CONFIG) {
    this.state = createWorldState(config);
  }

  get config(): WorldConfig {
    return this.state.config;
  }

  get map(): MapDef {
    return this.state.map;
  }

  /** Last completed tick (0 before the first one) */
  get tick(): number {
    return this.currentTick;
  }

  /**
   * Add an entity to the world.
   * Returns ENTITY_JOINED event on success.
   */
  addEntity(entity: Entity): Result<WorldEvent[]> {
    const inserted = insertEntity(this.state, entity);
    if (!inserted.ok) return inserted;
    return ok([{ type: 'ENTITY_JOINED', entity: inserted.value }]);
  }

  /** Create an agent, at the map centre unless told otherwise */
  spawnAgent(displayName: string, options: SpawnAgentOptions = {}): Result<AgentEntity> {
    const center = centerOf(this.state.map);
    const agent = createAgent(
      displayName,
      options.x ?? center.x,
      options.y ?? center.y,
      options.entityId
    );
    const inserted = insertEntity(this.state, agent);
    if (!inserted.ok) return inserted;
    return ok(agent);
  }

  /**
   * Remove an entity from the world.
   * Returns ENTITY_LEFT event on success.
   */
  removeEntity(entityId: string): Result<WorldEvent[]> {
    const removed = deleteEntity(this.state, entityId);
    if (!removed.ok) return removed;
    return ok([{ type: 'ENTITY_LEFT', entityId }]);
  }

  /**
   * Resolve one queued intent against the current state.
   * Never throws for agent errors; the outcome records them.
   *
   * @throws InvariantViolationError if grid and store disagree afterwards
   */
  resolve(pending: PendingAction): ActionOutcome {
    const result = processAction(this.state, pending);
    if (this.state.config.verifyInvariants) {
      verifyPlacement(this.state);
    }

    if (!result.ok) {
      return {
        agentId: pending.agentId,
        action: pending.action,
        status: 'rejected',
        error: result.error,
        events: [],
      };
    }
    return {
      agentId: pending.agentId,
      action: pending.action,
      status: result.value.length > 0 ? 'applied' : 'noop',
      events: result.value,
    };
  }

  /** Place up to `count` random resources on empty cells */
  scatterResources(count: number): WorldEvent[] {
    return scatterResources(this.state, count);
  }

  /** Respawn schedule for the tick being resolved */
  runWorldEvents(tick: number): WorldEvent[] {
    return runRespawn(this.state, tick);
  }

  /** @throws InvariantViolationError */
  verifyInvariants(): void {
    verifyPlacement(this.state);
  }

  /** Mark `tick` as completed; ticks only move forward by one */
  completeTick(tick: number): void {
    if (tick !== this.currentTick + 1) {
      throw new RangeError(`Tick ${tick} does not follow ${this.currentTick}`);
    }
    this.currentTick = tick;
  }

  getSnapshot(outcomes: readonly ActionOutcome[] = []): WorldSnapshot {
    return buildSnapshot(this.state, this.currentTick, outcomes);
  }

  getEntity(entityId: string): Entity | undefined {
    const found = this.state.store.get(entityId);
    return found.ok ? found.value : undefined;
  }

  getAgent(entityId: string): AgentEntity | undefined {
    const entity = this.getEntity(entityId);
    return entity && isAgent(entity) ? entity : undefined;
  }

  getAgents(): AgentEntity[] {
    return this.state.store.agents();
  }

  getResources(): ResourceEntity[] {
    return this.state.store.resources();
  }

  /** Entities in a cell, in placement order */
  entitiesAt(x: number, y: number): Entity[] {
    const result: Entity[] = [];
    for (const id of this.state.grid.occupantsAt(x, y)) {
      const found = this.state.store.get(id);
      if (found.ok) result.push(found.value);
    }
    return result;
  }

  /**
   * Entities within `radius` cells of (x, y) in both axes, row by row.
   * Cells outside the grid are skipped.
   */
  entitiesNear(x: number, y: number, radius = 1): Entity[] {
    const result: Entity[] = [];
    for (let dy = -radius; dy <= radius; dy++) {
      for (let dx = -radius; dx <= radius; dx++) {
        result.push(...this.entitiesAt(x + dx, y + dy));
      }
    }
    return result;
  }

  occupantsAt(x: number, y: number): ReadonlySet<string> {
    return this.state.grid.occupantsAt(x, y);
  }

  isInBounds(x: number, y: number): boolean {
    return this.state.grid.isInBounds(x, y);
  }

  /** Direct state access for tests and invariant tooling */
  getState(): WorldState {
    return this.state;
  }
}

/** Build a world and scatter its starting resources */
export function createWorld(config: WorldConfig = DEFAULT_WORLD_CONFIG): World {
  const world = new World(config);
  world.scatterResources(config.initialResources);
  return world;
}
