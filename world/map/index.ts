export { createMapDef, isInBounds, centerOf } from './mapDef';
export type { MapDef } from './mapDef';
export { WorldGrid } from './grid';
