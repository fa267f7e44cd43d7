export { World, createWorld } from './world';
export type { SpawnAgentOptions } from './world';
export { TickEngine } from './tickEngine';
export type { TickPhase, TickReport, TickEngineOptions } from './tickEngine';
export { buildSnapshot, viewFor } from './snapshot';
export type {
  AgentView,
  ResourceView,
  WorldInfo,
  ActionStatus,
  ActionOutcome,
  WorldSnapshot,
  AgentStateView,
} from './snapshot';
export { scatterResources, runRespawn, isRespawnTick } from './economy';
export { InvariantViolationError } from './errors';
