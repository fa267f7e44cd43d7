export { createWorldState } from './worldState';
export type { WorldState } from './worldState';
export { EntityStore } from './entityStore';
