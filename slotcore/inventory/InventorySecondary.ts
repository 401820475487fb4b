//slotcore/inventory/InventorySecondary.ts
//
// Operations layered on the five kernel calls. Nothing here touches a
// backend's storage directly.

import { BasicItem, COUNT_TAG, EMPTY_NAME, Item, countOf, withCount } from "../items/Item";
import { UnsupportedOperationError, requires } from "../core/errors";
import { Logger } from "../utils/logger";
import { Inventory, InventoryKernel, NOT_FOUND } from "./InventoryTypes";

const log = Logger.scope("INVENTORY");

export function requireSlot(inv: InventoryKernel, slot: number, op: string): void {
  requires(
    Number.isInteger(slot) && slot >= 0 && slot < inv.size(),
    op,
    `slot ${slot} outside [0, ${inv.size()})`,
  );
}

// Re-adding into a slot that was just emptied always succeeds.
function peek(inv: InventoryKernel, slot: number): Item {
  const item = inv.removeItem(slot);
  inv.addItem(slot, item);
  return item;
}

export abstract class InventorySecondary implements Inventory {
  abstract size(): number;
  abstract addItem(slot: number, item: Item): boolean;
  abstract removeItem(slot: number): Item;
  abstract nextIndexOf(name: string, pos: number): number;
  abstract isAllowed(item: Item): boolean;

  getItem(slot: number): Item {
    requireSlot(this, slot, "getItem");
    return peek(this, slot);
  }

  /**
   * Exchange two slots of this inventory, or `src[srcSlot]` with
   * `this[destSlot]`. Both items are removed before either is re-added, so
   * stackable items never merge. Returns false (nothing moved) when either
   * side refuses the incoming item.
   */
  swapItems(slot1: number, slot2: number): boolean;
  swapItems(src: InventoryKernel, srcSlot: number, destSlot: number): boolean;
  swapItems(a: number | InventoryKernel, b: number, c?: number): boolean {
    if (typeof a === "number") {
      return this.swapBetween(this, a, b);
    }
    requires(c !== undefined, "swapItems", "destination slot missing");
    return this.swapBetween(a, b, c);
  }

  private swapBetween(src: InventoryKernel, srcSlot: number, destSlot: number): boolean {
    requireSlot(src, srcSlot, "swapItems");
    requireSlot(this, destSlot, "swapItems");

    const srcRemoved = src.removeItem(srcSlot);
    const destRemoved = this.removeItem(destSlot);

    if (!src.isAllowed(destRemoved) || !this.isAllowed(srcRemoved)) {
      src.addItem(srcSlot, srcRemoved);
      this.addItem(destSlot, destRemoved);
      log.debug(`Swap refused, restored ${srcRemoved.name || "<empty>"} and ${destRemoved.name || "<empty>"}`);
      return false;
    }

    src.addItem(srcSlot, destRemoved);
    this.addItem(destSlot, srcRemoved);
    return true;
  }

  /** Move `src[srcSlot]` here; on refusal the item goes back to its slot. */
  transferItem(src: InventoryKernel, srcSlot: number, destSlot: number): boolean {
    requireSlot(src, srcSlot, "transferItem");
    requireSlot(this, destSlot, "transferItem");

    const moved = src.removeItem(srcSlot);
    const placed = this.addItem(destSlot, moved);

    if (!placed) {
      src.addItem(srcSlot, moved);
      log.debug(`Transfer of ${moved.name} into slot ${destSlot} refused, returned to slot ${srcSlot}`);
    }

    return placed;
  }

  /**
   * Move `count` units of the stack at `src[srcSlot]` into the empty slot
   * `this[destSlot]`. The new stack gets its own copy of the tags. Returns
   * false, with nothing moved, when either allow filter refuses the stack it
   * would end up holding.
   */
  splitItem(src: InventoryKernel, srcSlot: number, destSlot: number, count: number): boolean {
    requireSlot(src, srcSlot, "splitItem");
    requireSlot(this, destSlot, "splitItem");

    const current = peek(src, srcSlot);
    const available = countOf(current);
    requires(
      Number.isInteger(count) && count >= 0 && count <= available,
      "splitItem",
      `count ${count} outside [0, ${available}]`,
    );
    requires(peek(this, destSlot).isEmpty(), "splitItem", `destination slot ${destSlot} is occupied`);

    if (count === 0) return true;

    const remaining = available - count;
    const newStack = withCount(current, count);
    if (!this.isAllowed(newStack) || (remaining > 0 && !src.isAllowed(withCount(current, remaining)))) {
      log.debug(`Split of ${count} ${current.name} from slot ${srcSlot} refused`);
      return false;
    }

    // Both slots end up holding allowed stacks, so neither add below can fail.
    const oldStack = src.removeItem(srcSlot);
    if (remaining > 0) {
      oldStack.putTag(COUNT_TAG, remaining);
      src.addItem(srcSlot, oldStack);
    }
    return this.addItem(destSlot, newStack);
  }

  /**
   * Place a copy of the first `name` item of `src` at `destSlot` through the
   * normal add path, so it may stack with what is already there.
   */
  copyItem(src: InventoryKernel, name: string, destSlot: number): boolean {
    requireSlot(this, destSlot, "copyItem");
    const at = src.nextIndexOf(name, 0);
    requires(at !== NOT_FOUND, "copyItem", `no item named '${name}' in source`);

    const copy = BasicItem.copyOf(peek(src, at));
    return this.addItem(destSlot, copy);
  }

  /**
   * Where `item` could go: the first stack it stacks with (same name and the
   * same non-count tags, not just the same name) that has room (any such
   * stack when `maxStack <= 0`), else the first empty slot, else NOT_FOUND.
   * The allow filter is checked against the stack each slot would end up
   * holding.
   */
  nextPlacement(item: Item, maxStack: number): number {
    const incoming = countOf(item);
    let checkAt = 0;

    while (checkAt < this.size()) {
      const pos = this.nextIndexOf(item.name, checkAt);
      if (pos === NOT_FOUND) break;

      const candidate = peek(this, pos);
      const total = countOf(candidate) + incoming;
      if (
        candidate.equals(item) &&
        (maxStack <= 0 || total <= maxStack) &&
        this.isAllowed(withCount(candidate, total))
      ) {
        return pos;
      }
      checkAt = pos + 1;
    }

    if (!this.isAllowed(item)) return NOT_FOUND;
    return this.nextIndexOf(EMPTY_NAME, 0);
  }

  /** Consume one unit from the stack at `slot`; returns the item's name. */
  useItem(slot: number): string {
    requireSlot(this, slot, "useItem");
    const current = peek(this, slot);
    requires(!current.isEmpty() && countOf(current) >= 1, "useItem", `slot ${slot} is empty`);
    const newCount = countOf(current) - 1;
    requires(
      newCount === 0 || this.isAllowed(withCount(current, newCount)),
      "useItem",
      `a ${current.name} stack of ${newCount} is not allowed in slot ${slot}`,
    );

    const removed = this.removeItem(slot);
    if (newCount > 0) {
      removed.putTag(COUNT_TAG, newCount);
      this.addItem(slot, removed);
    } else {
      this.addItem(slot, new BasicItem());
    }

    return removed.name;
  }

  isAt(slot: number, name: string): boolean {
    requireSlot(this, slot, "isAt");
    return peek(this, slot).name === name;
  }

  equals(other: InventoryKernel): boolean {
    if (other === this) return true;
    if (other.size() !== this.size()) return false;

    let same = true;
    for (let i = 0; i < this.size(); i++) {
      const mine = this.removeItem(i);
      const theirs = other.removeItem(i);

      if (!mine.equals(theirs)) same = false;

      this.addItem(i, mine);
      other.addItem(i, theirs);
    }
    return same;
  }

  /** Inventories are mutable aggregates and never hash keys. */
  hashCode(): never {
    throw new UnsupportedOperationError("Inventory.hashCode");
  }

  toString(): string {
    const parts: string[] = [];
    for (let i = 0; i < this.size(); i++) {
      parts.push(peek(this, i).toString());
    }
    return `{ ${parts.join("; ")} }`;
  }
}
