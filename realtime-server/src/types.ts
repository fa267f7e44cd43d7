import { z } from 'zod';
import type { InventoryKey, ResourceType } from '../../world/index.ts';

// ============================================================================
// WIRE TYPES - JSON exchanged with agents and spectators
// ============================================================================

/** Client -> server: one intent per message */
export const ClientMessageSchema = z.object({
  action: z.string().min(1),
  params: z.record(z.unknown()).default({}),
});

export type ClientMessage = z.infer<typeof ClientMessageSchema>;

export interface WireAgentState {
  id: string;
  name: string;
  x: number;
  y: number;
  inventory: Record<InventoryKey, number>;
}

export interface WireResource {
  id: string;
  resource_type: ResourceType;
  quantity: number;
  x: number;
  y: number;
}

export interface WireWorldInfo {
  dimensions: [number, number];
  total_agents: number;
  total_resources: number;
  total_entities: number;
}

export interface ConnectionEstablishedMessage {
  type: 'connection_established';
  agent_id: string;
  message: string;
}

export interface GameStateMessage {
  type: 'game_state';
  tick: number;
  agent_state: WireAgentState;
  world_info: WireWorldInfo;
}

/** Sent before game_state on ticks where the agent's intent was resolved */
export interface ActionConfirmedMessage {
  type: 'action_confirmed';
  tick: number;
  action: string;
  success: boolean;
  error?: string;
}

export interface WorldSnapshotMessage {
  type: 'world_snapshot';
  tick: number;
  world_info: WireWorldInfo;
  agents: WireAgentState[];
  resources: WireResource[];
}

/** First frame on the watch port */
export interface StatusMessage {
  type: 'status';
  tick: number;
  dimensions: [number, number];
  total_resources: number;
  connected_agents: number;
}

export interface ErrorMessage {
  type: 'error';
  message: string;
}

export type ServerMessage =
  | ConnectionEstablishedMessage
  | GameStateMessage
  | ActionConfirmedMessage
  | WorldSnapshotMessage
  | StatusMessage
  | ErrorMessage;
