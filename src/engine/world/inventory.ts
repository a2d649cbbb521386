/**
 * Inventory helpers for living NPCs.
 *
 * Generated records keep the inventory they were created with; a living NPC
 * owns a mutable copy and changes it only through these functions.
 */

import type { Item } from '../types';

/**
 * Copy a generated inventory so the record stays untouched
 */
export function cloneInventory(items: readonly Item[]): Item[] {
  return items.map((item) => ({
    ...item,
    stats: { ...item.stats },
    properties: [...item.properties],
    damageTypes: [...item.damageTypes],
  }));
}

export function inventoryAdd(inventory: Item[], item: Item): void {
  inventory.push(item);
}

/**
 * Remove the first item with the given name
 * @returns the removed item, or null if none matched
 */
export function inventoryRemove(inventory: Item[], name: string): Item | null {
  const index = inventory.findIndex((item) => item.name === name);
  if (index < 0) {
    return null;
  }
  const [removed] = inventory.splice(index, 1);
  return removed;
}

export function inventoryValue(inventory: readonly Item[]): number {
  return inventory.reduce((total, item) => total + item.value, 0);
}

/**
 * Count items per item type
 */
export function inventoryByType(inventory: readonly Item[]): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const item of inventory) {
    counts[item.type] = (counts[item.type] ?? 0) + 1;
  }
  return counts;
}
