//slotcore/inventory/SlotInventory.ts

import { BasicItem, Item, countOf, stackOnto, withCount } from "../items/Item";
import { requires } from "../core/errors";
import { Logger } from "../utils/logger";
import { InventorySecondary, requireSlot } from "./InventorySecondary";
import { InventoryOptions, ItemFilter, NOT_FOUND } from "./InventoryTypes";

const log = Logger.scope("INVENTORY");

/**
 * Array-backed inventory: every slot holds an Item, empty slots the empty
 * item. Size is fixed at construction.
 */
export class SlotInventory extends InventorySecondary {
  private readonly slots: Item[];
  private readonly allow: ItemFilter | undefined;

  constructor(size = 1, opts: InventoryOptions = {}) {
    super();
    requires(Number.isInteger(size) && size >= 1, "SlotInventory", `size must be a positive integer, got ${size}`);

    this.slots = Array.from({ length: size }, () => new BasicItem());
    this.allow = opts.allow;
  }

  size(): number {
    return this.slots.length;
  }

  isAllowed(item: Item): boolean {
    if (item.isEmpty() || !this.allow) return true;
    return this.allow(item);
  }

  /** The allow filter sees what the slot would hold afterwards. */
  addItem(slot: number, item: Item): boolean {
    requireSlot(this, slot, "addItem");

    const dest = this.slots[slot];
    if (dest.isEmpty()) {
      if (!this.isAllowed(item)) {
        log.debug(`Slot ${slot}: ${item.name} not allowed here`);
        return false;
      }
      this.slots[slot] = item;
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

    const removed = this.slots[slot];
    this.slots[slot] = new BasicItem();
    return removed;
  }

  nextIndexOf(name: string, pos: number): number {
    requires(
      Number.isInteger(pos) && pos >= 0 && pos <= this.slots.length,
      "nextIndexOf",
      `position ${pos} outside [0, ${this.slots.length}]`,
    );

    for (let i = pos; i < this.slots.length; i++) {
      if (this.slots[i].name === name) return i;
    }
    return NOT_FOUND;
  }
}
