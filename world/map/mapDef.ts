// ============================================================================
// MAP DEFINITION - Fixed-size tile lattice
// ============================================================================

export interface MapDef {
  readonly width: number;
  readonly height: number;
}

/** Create a new map definition */
export function createMapDef(width: number, height: number): MapDef {
  return {
    width: Math.max(1, Math.floor(width)),
    height: Math.max(1, Math.floor(height)),
  };
}

/** Check if coordinates are within map bounds */
export function isInBounds(map: MapDef, x: number, y: number): boolean {
  return (
    Number.isInteger(x) &&
    Number.isInteger(y) &&
    x >= 0 &&
    x < map.width &&
    y >= 0 &&
    y < map.height
  );
}

/** Cell at the centre of the map */
export function centerOf(map: MapDef): { x: number; y: number } {
  return {
    x: Math.floor(map.width / 2),
    y: Math.floor(map.height / 2),
  };
}
