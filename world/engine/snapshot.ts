import type { ErrorCode, WorldEvent } from '../actions/types';
import type { InventoryKey, ResourceType } from '../entities/entity';
import { toFullInventory } from '../entities/agent';
import type { WorldState } from '../state/worldState';

// ============================================================================
// SNAPSHOT TYPES - Read-only per-tick projection of the world
// ============================================================================

export interface AgentView {
  readonly id: string;
  readonly name: string;
  readonly x: number;
  readonly y: number;
  readonly inventory: Readonly<Record<InventoryKey, number>>;
}

export interface ResourceView {
  readonly id: string;
  readonly resourceType: ResourceType;
  readonly quantity: number;
  readonly x: number;
  readonly y: number;
}

export interface WorldInfo {
  readonly dimensions: readonly [number, number];
  readonly totalAgents: number;
  readonly totalResources: number;
  readonly totalEntities: number;
}

export type ActionStatus = 'applied' | 'noop' | 'rejected';

/** What happened to one agent's queued intent during a tick */
export interface ActionOutcome {
  readonly agentId: string;
  readonly action: string;
  readonly status: ActionStatus;
  readonly error?: {
    readonly code: ErrorCode;
    readonly message: string;
  };
  readonly events: readonly WorldEvent[];
}

/**
 * Every record in a snapshot is frozen. The `agents` and `outcomes` maps are
 * read-only by type only: consumers must not cast them back to Map.
 */
export interface WorldSnapshot {
  readonly tick: number;
  readonly worldInfo: WorldInfo;
  readonly agents: ReadonlyMap<string, AgentView>;
  readonly resources: readonly ResourceView[];
  readonly outcomes: ReadonlyMap<string, ActionOutcome>;
}

/** The slice of a snapshot one agent receives */
export interface AgentStateView {
  readonly tick: number;
  readonly agent: AgentView;
  readonly worldInfo: WorldInfo;
  readonly lastAction?: ActionOutcome;
}

// ============================================================================
// BUILDERS
// ============================================================================

export function buildSnapshot(
  state: WorldState,
  tick: number,
  outcomes: readonly ActionOutcome[] = []
): WorldSnapshot {
  const agents = new Map<string, AgentView>();
  for (const agent of state.store.agents()) {
    agents.set(
      agent.entityId,
      Object.freeze({
        id: agent.entityId,
        name: agent.displayName,
        x: agent.x,
        y: agent.y,
        inventory: Object.freeze(toFullInventory(agent.inventory)),
      })
    );
  }

  const resources = state.store.resources().map((resource) =>
    Object.freeze({
      id: resource.entityId,
      resourceType: resource.resourceType,
      quantity: resource.quantity,
      x: resource.x,
      y: resource.y,
    })
  );

  const worldInfo: WorldInfo = Object.freeze({
    dimensions: Object.freeze([state.map.width, state.map.height] as const),
    totalAgents: agents.size,
    totalResources: resources.length,
    totalEntities: state.store.size,
  });

  const byAgent = new Map<string, ActionOutcome>();
  for (const outcome of outcomes) {
    byAgent.set(outcome.agentId, Object.freeze(outcome));
  }

  return Object.freeze({
    tick,
    worldInfo,
    agents,
    resources: Object.freeze(resources),
    outcomes: byAgent,
  });
}

/** One agent's own state plus the shared world info; undefined if the agent is gone */
export function viewFor(snapshot: WorldSnapshot, agentId: string): AgentStateView | undefined {
  const agent = snapshot.agents.get(agentId);
  if (!agent) return undefined;

  const lastAction = snapshot.outcomes.get(agentId);
  return lastAction
    ? { tick: snapshot.tick, agent, worldInfo: snapshot.worldInfo, lastAction }
    : { tick: snapshot.tick, agent, worldInfo: snapshot.worldInfo };
}
