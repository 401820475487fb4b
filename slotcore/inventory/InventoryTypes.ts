//slotcore/inventory/InventoryTypes.ts

import type { Item } from "../items/Item";

/** Search result when nothing matches. */
export const NOT_FOUND = -1;

/**
 * Minimal capability set of an inventory. Everything else is derived from
 * these five calls (see InventorySecondary), so a new backend only has to
 * provide them.
 */
export interface InventoryKernel {
  size(): number;

  /**
   * Empty slot: `item` replaces it. Equal item: counts are summed.
   * Otherwise, or when the stack the slot would end up holding is not
   * allowed here, returns false and the caller keeps `item`.
   */
  addItem(slot: number, item: Item): boolean;

  /** Returns the occupant and leaves a fresh empty item behind. */
  removeItem(slot: number): Item;

  /** First index >= pos holding an item called `name`, or NOT_FOUND. */
  nextIndexOf(name: string, pos: number): number;

  /** The empty item is always allowed. */
  isAllowed(item: Item): boolean;
}

export interface Inventory extends InventoryKernel {
  getItem(slot: number): Item;
  swapItems(slot1: number, slot2: number): boolean;
  swapItems(src: InventoryKernel, srcSlot: number, destSlot: number): boolean;
  transferItem(src: InventoryKernel, srcSlot: number, destSlot: number): boolean;
  splitItem(src: InventoryKernel, srcSlot: number, destSlot: number, count: number): boolean;
  copyItem(src: InventoryKernel, name: string, destSlot: number): boolean;
  nextPlacement(item: Item, maxStack: number): number;
  useItem(slot: number): string;
  isAt(slot: number, name: string): boolean;
  equals(other: InventoryKernel): boolean;
  hashCode(): never;
  toString(): string;
}

export type ItemFilter = (item: Item) => boolean;

export interface InventoryOptions {
  /** Which non-empty items the inventory accepts. Default: all. */
  allow?: ItemFilter;
}
