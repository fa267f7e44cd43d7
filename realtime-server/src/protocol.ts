import type {
  ActionOutcome,
  AgentStateView,
  AgentView,
  WorldInfo,
  WorldSnapshot,
} from '../../world/index.ts';
import type {
  ActionConfirmedMessage,
  GameStateMessage,
  ServerMessage,
  StatusMessage,
  WireAgentState,
  WireWorldInfo,
  WorldSnapshotMessage,
} from './types';

// ============================================================================
// PROTOCOL - Snapshot views -> wire messages
// ============================================================================

function toWireAgent(agent: AgentView): WireAgentState {
  return {
    id: agent.id,
    name: agent.name,
    x: agent.x,
    y: agent.y,
    inventory: { ...agent.inventory },
  };
}

function toWireWorldInfo(info: WorldInfo): WireWorldInfo {
  return {
    dimensions: [info.dimensions[0], info.dimensions[1]],
    total_agents: info.totalAgents,
    total_resources: info.totalResources,
    total_entities: info.totalEntities,
  };
}

export function toActionConfirmedMessage(
  tick: number,
  outcome: ActionOutcome
): ActionConfirmedMessage {
  const message: ActionConfirmedMessage = {
    type: 'action_confirmed',
    tick,
    action: outcome.action,
    success: outcome.status === 'applied',
  };
  if (outcome.error) {
    message.error = outcome.error.code;
  }
  return message;
}

export function toGameStateMessage(view: AgentStateView): GameStateMessage {
  return {
    type: 'game_state',
    tick: view.tick,
    agent_state: toWireAgent(view.agent),
    world_info: toWireWorldInfo(view.worldInfo),
  };
}

/** Frames for one agent's tick: the action confirmation first (if any), then its state */
export function encodeAgentView(view: AgentStateView): ServerMessage[] {
  const frames: ServerMessage[] = [];
  if (view.lastAction) {
    frames.push(toActionConfirmedMessage(view.tick, view.lastAction));
  }
  frames.push(toGameStateMessage(view));
  return frames;
}

/** Whole-world view for spectators */
export function toWorldSnapshotMessage(snapshot: WorldSnapshot): WorldSnapshotMessage {
  return {
    type: 'world_snapshot',
    tick: snapshot.tick,
    world_info: toWireWorldInfo(snapshot.worldInfo),
    agents: Array.from(snapshot.agents.values(), toWireAgent),
    resources: snapshot.resources.map((resource) => ({
      id: resource.id,
      resource_type: resource.resourceType,
      quantity: resource.quantity,
      x: resource.x,
      y: resource.y,
    })),
  };
}

/** Server summary for a newly connected spectator */
export function toStatusMessage(snapshot: WorldSnapshot, connectedAgents: number): StatusMessage {
  return {
    type: 'status',
    tick: snapshot.tick,
    dimensions: [snapshot.worldInfo.dimensions[0], snapshot.worldInfo.dimensions[1]],
    total_resources: snapshot.worldInfo.totalResources,
    connected_agents: connectedAgents,
  };
}
