// ============================================================================
// WORLD MODULE - Simulation core for the tick-driven grid world
// ============================================================================

// Config
export { DEFAULT_WORLD_CONFIG, resolveWorldConfig } from './config';
export type { WorldConfig, WorldConfigOverrides, RecipeCost, RespawnConfig } from './config';

// Core engine
export {
  World,
  createWorld,
  TickEngine,
  buildSnapshot,
  viewFor,
  InvariantViolationError,
} from './engine';
export type {
  SpawnAgentOptions,
  TickPhase,
  TickReport,
  TickEngineOptions,
  AgentView,
  ResourceView,
  WorldInfo,
  ActionStatus,
  ActionOutcome,
  WorldSnapshot,
  AgentStateView,
} from './engine';

// Sessions
export { SessionRegistry } from './sessions';
export type { OutboundChannel, DeliveryReport, SessionRegistryOptions } from './sessions';

// Entities
export { createAgent, inventoryCount, toFullInventory } from './entities/agent';
export { createResource } from './entities/resource';
export { isAgent, isResource, RESOURCE_TYPES, INVENTORY_KEYS } from './entities/entity';
export type {
  Entity,
  EntityKind,
  AgentEntity,
  ResourceEntity,
  ResourceType,
  InventoryKey,
  Inventory,
} from './entities/entity';

// Map
export { createMapDef, isInBounds, centerOf, WorldGrid } from './map';
export type { MapDef } from './map';

// Actions & Events
export type {
  WorldAction,
  ActionKind,
  PendingAction,
  WorldEvent,
  ErrorCode,
  Result,
  ResultOk,
  ResultErr,
} from './actions';
export { ok, err, ACTION_KINDS, ActionQueue } from './actions';

// Pipeline (exposed for testing/advanced use)
export { decodeAction, validateAction, applyAction, processAction } from './actions';

// State (exposed for testing/advanced use)
export type { WorldState } from './state';
export { createWorldState, EntityStore } from './state';
