//slotcore/items/itemText.ts

import { Item, countOf } from "./Item";
import type { InventoryKernel } from "../inventory/InventoryTypes";

/** "Food : 3" style label; the empty item reads "(empty)". */
export function formatStackLabel(item: Item): string {
  if (item.isEmpty()) return "(empty)";
  return `${item.name} : ${countOf(item)}`;
}

/**
 * One line per slot, e.g. "  [2] Food : 3". Uses remove/re-add so the
 * inventory is left exactly as it was.
 */
export function buildSlotLines(inv: InventoryKernel): string[] {
  const lines: string[] = [];
  for (let i = 0; i < inv.size(); i++) {
    const item = inv.removeItem(i);
    lines.push(`  [${i}] ${formatStackLabel(item)}`);
    inv.addItem(i, item);
  }
  return lines;
}
