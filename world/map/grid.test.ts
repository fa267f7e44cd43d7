import { describe, expect, test } from 'vitest';
import { WorldGrid } from './grid';
import { createMapDef } from './mapDef';

describe('WorldGrid', () => {
  test('places ids and reports them in placement order', () => {
    const grid = new WorldGrid(createMapDef(4, 3));
    grid.place('b', 1, 1);
    grid.place('a', 1, 1);

    expect(Array.from(grid.occupantsAt(1, 1))).toEqual(['b', 'a']);
    expect(grid.isEmpty(0, 0)).toBe(true);
    expect(grid.occupiedCount()).toBe(2);
  });

  test('refuses out-of-bounds cells', () => {
    const grid = new WorldGrid(createMapDef(4, 3));
    const placed = grid.place('a', 4, 0);

    expect(placed.ok).toBe(false);
    if (!placed.ok) expect(placed.error.code).toBe('OUT_OF_BOUNDS');
    expect(grid.occupiedCount()).toBe(0);
    expect(grid.occupantsAt(-1, 0).size).toBe(0);
  });

  test('placing the same id twice in a cell counts once', () => {
    const grid = new WorldGrid(createMapDef(2, 2));
    grid.place('a', 0, 0);
    grid.place('a', 0, 0);
    expect(grid.occupiedCount()).toBe(1);
  });

  test('remove reports whether the id was there', () => {
    const grid = new WorldGrid(createMapDef(2, 2));
    grid.place('a', 0, 1);

    expect(grid.remove('a', 1, 1)).toBe(false);
    expect(grid.remove('a', 0, 1)).toBe(true);
    expect(grid.remove('a', 0, 1)).toBe(false);
    expect(grid.occupiedCount()).toBe(0);
  });

  test('emptyCells scans column by column', () => {
    const grid = new WorldGrid(createMapDef(2, 2));
    grid.place('a', 0, 1);
    expect(grid.emptyCells()).toEqual([
      { x: 0, y: 0 },
      { x: 1, y: 0 },
      { x: 1, y: 1 },
    ]);
  });

  test('non-integer coordinates are out of bounds', () => {
    const grid = new WorldGrid(createMapDef(5, 5));
    expect(grid.isInBounds(1.5, 2)).toBe(false);
    expect(grid.isInBounds(4, 4)).toBe(true);
  });
});
