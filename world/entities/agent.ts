import { v4 as uuidv4 } from 'uuid';
import type { AgentEntity, Inventory, InventoryKey } from './entity';
import { INVENTORY_KEYS } from './entity';

// ============================================================================
// AGENT - A remote client's body in the world
// ============================================================================

export function createAgent(
  displayName: string,
  x: number,
  y: number,
  entityId: string = uuidv4(),
  inventory: Inventory = {}
): AgentEntity {
  return {
    entityId,
    kind: 'AGENT',
    displayName,
    x: Math.floor(x),
    y: Math.floor(y),
    inventory,
  };
}

export function inventoryCount(inventory: Inventory, key: InventoryKey): number {
  return inventory[key] ?? 0;
}

/**
 * Apply a signed delta to an inventory.
 * Returns null if any count would drop below zero; nothing is applied then.
 * Keys that reach zero are dropped.
 */
export function applyInventoryDelta(
  inventory: Inventory,
  delta: Inventory
): Inventory | null {
  const next: Partial<Record<InventoryKey, number>> = { ...inventory };
  for (const key of INVENTORY_KEYS) {
    const change = delta[key];
    if (change === undefined || change === 0) continue;
    const value = inventoryCount(inventory, key) + change;
    if (value < 0) return null;
    if (value === 0) {
      delete next[key];
    } else {
      next[key] = value;
    }
  }
  return next;
}

/** Full inventory with every key present, for the wire */
export function toFullInventory(inventory: Inventory): Readonly<Record<InventoryKey, number>> {
  return {
    ORE: inventoryCount(inventory, 'ORE'),
    FUEL: inventoryCount(inventory, 'FUEL'),
    COMPONENTS: inventoryCount(inventory, 'COMPONENTS'),
  };
}
