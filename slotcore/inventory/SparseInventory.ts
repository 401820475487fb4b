//slotcore/inventory/SparseInventory.ts

import { BasicItem, COUNT_TAG, EMPTY_NAME, Item, countOf, stackOnto, withCount } from "../items/Item";
import { requires } from "../core/errors";
import { Logger } from "../utils/logger";
import { InventorySecondary, requireSlot } from "./InventorySecondary";
import { InventoryOptions, ItemFilter, NOT_FOUND } from "./InventoryTypes";

const log = Logger.scope("INVENTORY");

// the empty item exactly as `new BasicItem()` builds it
function isPlainEmpty(item: Item): boolean {
  if (!item.isEmpty()) return false;
  const tags = item.tagEntries();
  return tags.length === 1 && tags[0][0] === COUNT_TAG && tags[0][1] === 0;
}

/**
 * Map-backed inventory that only stores slots that differ from the plain
 * empty item. Suits large inventories that are mostly empty (banks, chests).
 * An empty item carrying other tags is stored like any other item.
 */
export class SparseInventory extends InventorySecondary {
  private readonly occupied = new Map<number, Item>();
  private readonly allow: ItemFilter | undefined;

  constructor(
    private readonly slotCount = 1,
    opts: InventoryOptions = {},
  ) {
    super();
    requires(
      Number.isInteger(slotCount) && slotCount >= 1,
      "SparseInventory",
      `size must be a positive integer, got ${slotCount}`,
    );
    this.allow = opts.allow;
  }

  size(): number {
    return this.slotCount;
  }

  /** Number of slots stored (anything but the plain empty item). */
  occupiedCount(): number {
    return this.occupied.size;
  }

  isAllowed(item: Item): boolean {
    if (item.isEmpty() || !this.allow) return true;
    return this.allow(item);
  }

  /** The allow filter sees what the slot would hold afterwards. */
  addItem(slot: number, item: Item): boolean {
    requireSlot(this, slot, "addItem");

    const dest = this.occupied.get(slot);
    if (!dest || dest.isEmpty()) {
      if (!this.isAllowed(item)) {
        log.debug(`Slot ${slot}: ${item.name} not allowed here`);
        return false;
      }
      if (isPlainEmpty(item)) this.occupied.delete(slot);
      else this.occupied.set(slot, item);
      return true;
    }

    if (!dest.equals(item)) {
      log.debug(`Slot ${slot}: ${item.name} refused, holds ${dest.name}`);
      return false;
    }

    const total = countOf(dest) + countOf(item);
    if (!this.isAllowed(withCount(dest, total))) {
      log.debug(`Slot ${slot}: a ${item.name} stack of ${total} is not allowed here`);
      return false;
    }

    return stackOnto(dest, item);
  }

  removeItem(slot: number): Item {
    requireSlot(this, slot, "removeItem");

    const removed = this.occupied.get(slot);
    if (!removed) return new BasicItem();

    this.occupied.delete(slot);
    return removed;
  }

  nextIndexOf(name: string, pos: number): number {
    requires(
      Number.isInteger(pos) && pos >= 0 && pos <= this.slotCount,
      "nextIndexOf",
      `position ${pos} outside [0, ${this.slotCount}]`,
    );

    for (let i = pos; i < this.slotCount; i++) {
      const nameAt = this.occupied.get(i)?.name ?? EMPTY_NAME;
      if (nameAt === name) return i;
    }
    return NOT_FOUND;
  }
}
