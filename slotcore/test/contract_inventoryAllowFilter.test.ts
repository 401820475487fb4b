// slotcore/test/contract_inventoryAllowFilter.test.ts
//
// Contract: an inventory's allow filter refuses items through the normal
// negative outcomes, and every multi-step operation rolls back cleanly.

import test from "node:test";
import assert from "node:assert/strict";

import { BasicItem, countOf } from "../items/Item";
import type { Item } from "../items/Item";
import { ContractViolationError } from "../core/errors";
import { NOT_FOUND } from "../inventory/InventoryTypes";
import { BACKENDS, stack } from "./inventoryFixtures";

const noLava = (item: Item) => item.name !== "Lava";
const smallStacks = { allow: (item: Item) => countOf(item) <= 4 };
const pairsOrMore = { allow: (item: Item) => countOf(item) >= 2 };

for (const backend of BACKENDS) {
  const tag = `[contract] ${backend.label}`;

  test(`${tag} isAllowed follows the filter and always takes the empty item`, () => {
    const inv = backend.make(2, { allow: noLava });
    assert.equal(inv.isAllowed(new BasicItem("Lava")), false);
    assert.equal(inv.isAllowed(new BasicItem("Water")), true);
    assert.equal(inv.isAllowed(new BasicItem()), true);
  });

  test(`${tag} addItem refuses a filtered item`, () => {
    const inv = backend.make(2, { allow: noLava });
    assert.equal(inv.addItem(0, new BasicItem("Lava")), false);
    assert.equal(inv.getItem(0).isEmpty(), true);
  });

  test(`${tag} transferItem of a filtered item returns it to the source`, () => {
    const src = backend.make(1);
    src.addItem(0, stack("Lava", 2));
    const dest = backend.make(1, { allow: noLava });

    assert.equal(dest.transferItem(src, 0, 0), false);
    assert.equal(src.getItem(0).toString(), "Lava:{(count, 2) }");
    assert.equal(dest.getItem(0).isEmpty(), true);
  });

  test(`${tag} swapItems refused by the filter leaves both sides as they were`, () => {
    const src = backend.make(1);
    src.addItem(0, stack("Lava", 1));
    const dest = backend.make(1, { allow: noLava });
    dest.addItem(0, stack("Water", 3));

    assert.equal(dest.swapItems(src, 0, 0), false);
    assert.equal(src.getItem(0).toString(), "Lava:{(count, 1) }");
    assert.equal(dest.getItem(0).toString(), "Water:{(count, 3) }");
  });

  test(`${tag} splitItem refused by the filter restores the source count`, () => {
    const src = backend.make(2);
    src.addItem(0, stack("Foo", 8));
    src.addItem(1, stack("Bar", 6));
    const dest = backend.make(2, smallStacks);

    assert.equal(dest.splitItem(src, 0, 0, 5), false);
    assert.equal(countOf(src.getItem(0)), 8);

    assert.equal(dest.splitItem(src, 1, 0, 6), false);
    assert.equal(src.getItem(1).toString(), "Bar:{(count, 6) }");

    assert.equal(dest.splitItem(src, 0, 1, 4), true);
    assert.equal(countOf(src.getItem(0)), 4);
    assert.equal(dest.toString(), "{ :{(count, 0) }; Foo:{(count, 4) } }");
  });

  test(`${tag} nextPlacement never offers a slot to a filtered item`, () => {
    const inv = backend.make(3, { allow: noLava });
    assert.equal(inv.nextPlacement(new BasicItem("Lava"), 0), NOT_FOUND);
    assert.equal(inv.nextPlacement(new BasicItem("Water"), 0), 0);
  });

  test(`${tag} addItem refuses a merge whose total the filter rejects`, () => {
    const dest = backend.make(1, smallStacks);
    assert.equal(dest.addItem(0, stack("Foo", 3)), true);

    const src = backend.make(1);
    src.addItem(0, stack("Foo", 2));
    assert.equal(dest.transferItem(src, 0, 0), false);
    assert.equal(src.getItem(0).toString(), "Foo:{(count, 2) }");
    assert.equal(dest.getItem(0).toString(), "Foo:{(count, 3) }");

    assert.equal(dest.addItem(0, stack("Foo", 1)), true);
    assert.equal(countOf(dest.getItem(0)), 4);
  });

  test(`${tag} splitItem refused by the source filter moves nothing`, () => {
    const src = backend.make(1, pairsOrMore);
    src.addItem(0, stack("Foo", 4));
    const dest = backend.make(1, pairsOrMore);

    assert.equal(dest.splitItem(src, 0, 0, 3), false);
    assert.equal(src.getItem(0).toString(), "Foo:{(count, 4) }");
    assert.equal(dest.getItem(0).isEmpty(), true);

    assert.equal(dest.splitItem(src, 0, 0, 2), true);
    assert.equal(src.getItem(0).toString(), "Foo:{(count, 2) }");
    assert.equal(dest.getItem(0).toString(), "Foo:{(count, 2) }");
  });

  test(`${tag} useItem that would leave a refused stack is a contract violation`, () => {
    const inv = backend.make(1, pairsOrMore);
    inv.addItem(0, stack("Food", 2));

    assert.throws(() => inv.useItem(0), ContractViolationError);
    assert.equal(inv.getItem(0).toString(), "Food:{(count, 2) }");
  });

  test(`${tag} useItem under a filter consumes while the rest stays allowed`, () => {
    const inv = backend.make(1, pairsOrMore);
    inv.addItem(0, stack("Food", 3));

    assert.equal(inv.useItem(0), "Food");
    assert.equal(inv.getItem(0).toString(), "Food:{(count, 2) }");
  });

  test(`${tag} swapItems within one inventory keeps counts under a count filter`, () => {
    const inv = backend.make(3, smallStacks);
    inv.addItem(0, stack("Foo", 4));
    inv.addItem(1, stack("Bar", 2));

    assert.equal(inv.swapItems(0, 1), true);
    assert.equal(inv.getItem(0).toString(), "Bar:{(count, 2) }");
    assert.equal(inv.getItem(1).toString(), "Foo:{(count, 4) }");

    assert.equal(inv.swapItems(1, 2), true);
    assert.equal(inv.getItem(1).isEmpty(), true);
    assert.equal(inv.getItem(2).toString(), "Foo:{(count, 4) }");
  });

  test(`${tag} nextPlacement checks the stack a slot would end up holding`, () => {
    const inv = backend.make(2, pairsOrMore);
    assert.equal(inv.nextPlacement(stack("Foo", 1), 0), NOT_FOUND);

    inv.addItem(1, stack("Foo", 3));
    assert.equal(inv.nextPlacement(stack("Foo", 1), 0), 1);
    assert.equal(inv.nextPlacement(stack("Foo", 1), 3), NOT_FOUND);
    assert.equal(inv.nextPlacement(stack("Foo", 2), 3), 0);
  });
}
