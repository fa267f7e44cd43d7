import type { MapDef } from './mapDef';
import { isInBounds } from './mapDef';
import type { Result } from '../actions/types';
import { ok, err } from '../actions/types';

const EMPTY: ReadonlySet<string> = new Set();

/**
 * Per-cell occupancy for the world.
 * Pure data: it knows which ids sit where, nothing about what they are.
 */
export class WorldGrid {
  readonly map: MapDef;
  private readonly cells: Array<Set<string> | undefined>;
  private memberships = 0;

  constructor(map: MapDef) {
    this.map = map;
    this.cells = new Array(map.width * map.height);
  }

  get width(): number {
    return this.map.width;
  }

  get height(): number {
    return this.map.height;
  }

  isInBounds(x: number, y: number): boolean {
    return isInBounds(this.map, x, y);
  }

  /** Ids in a cell, in placement order. Empty for out-of-bounds cells. */
  occupantsAt(x: number, y: number): ReadonlySet<string> {
    if (!this.isInBounds(x, y)) return EMPTY;
    return this.cells[this.index(x, y)] ?? EMPTY;
  }

  isEmpty(x: number, y: number): boolean {
    return this.occupantsAt(x, y).size === 0;
  }

  place(id: string, x: number, y: number): Result<void> {
    if (!this.isInBounds(x, y)) {
      return err(
        'OUT_OF_BOUNDS',
        `Cell (${x}, ${y}) is outside the ${this.width}x${this.height} grid`
      );
    }
    const i = this.index(x, y);
    let cell = this.cells[i];
    if (!cell) {
      cell = new Set();
      this.cells[i] = cell;
    }
    if (!cell.has(id)) {
      cell.add(id);
      this.memberships++;
    }
    return ok(undefined);
  }

  remove(id: string, x: number, y: number): boolean {
    if (!this.isInBounds(x, y)) return false;
    const i = this.index(x, y);
    const cell = this.cells[i];
    if (!cell || !cell.delete(id)) return false;
    this.memberships--;
    if (cell.size === 0) this.cells[i] = undefined;
    return true;
  }

  /** Total number of (id, cell) memberships across the grid */
  occupiedCount(): number {
    return this.memberships;
  }

  /** Cells with nobody in them, scanned column by column */
  emptyCells(): Array<{ x: number; y: number }> {
    const result: Array<{ x: number; y: number }> = [];
    for (let x = 0; x < this.width; x++) {
      for (let y = 0; y < this.height; y++) {
        if (this.isEmpty(x, y)) result.push({ x, y });
      }
    }
    return result;
  }

  private index(x: number, y: number): number {
    return y * this.width + x;
  }
}
