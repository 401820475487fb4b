// slotcore/tools/collateDemo.ts
//
// Demo: collate every Gravel stack of one inventory into a single slot of
// another, then show both sides.
//
// Usage:
//   npx tsx slotcore/tools/collateDemo.ts
//   SLOT_DEMO_SIZE=16 SLOT_DEMO_SEED=abc npx tsx slotcore/tools/collateDemo.ts

import dotenv from "dotenv";

import { SlotConfig, loadSlotConfig } from "../config/config";
import { BasicItem, countOf } from "../items/Item";
import { buildSlotLines, formatStackLabel } from "../items/itemText";
import { SlotInventory } from "../inventory/SlotInventory";
import { NOT_FOUND } from "../inventory/InventoryTypes";
import { Logger } from "../utils/logger";
import { randomInt, seededRandom } from "../utils/Rng";

const log = Logger.scope("DEMO");

export const COLLATED_NAME = "Gravel";
export const KEPT_NAME = "Food";

export type CollateDemoResult = {
  source: SlotInventory;
  collector: SlotInventory;
  /** Gravel units in the source before collating. */
  gravelBefore: number;
  /** Slot a fresh Food stack would go to afterwards, or NOT_FOUND. */
  foodPlacement: number;
  lines: string[];
};

export function runCollateDemo(config: SlotConfig): CollateDemoResult {
  log.info("Running collate demo", {
    size: config.demoSize,
    maxCount: config.demoMaxCount,
    seed: config.demoSeed,
  });

  const rand = seededRandom(config.demoSeed);
  const source = new SlotInventory(config.demoSize);
  const collector = new SlotInventory(1);
  const lines: string[] = [];

  lines.push(`Demo: collating ${COLLATED_NAME} from one inventory into another.`);
  lines.push("");

  let gravelBefore = 0;
  for (let i = 0; i < source.size(); i++) {
    const name = i % 2 === 0 ? KEPT_NAME : COLLATED_NAME;
    const count = randomInt(rand, 1, config.demoMaxCount);
    source.addItem(i, new BasicItem(name, count));
    if (name === COLLATED_NAME) gravelBefore += count;
  }

  lines.push("Items in source:");
  lines.push(...buildSlotLines(source));

  for (let i = 0; i < source.size(); i++) {
    if (source.isAt(i, COLLATED_NAME)) {
      collector.transferItem(source, i, 0);
    }
  }

  lines.push("");
  lines.push(`${COLLATED_NAME} sent to collector:`);
  lines.push(`  ${formatStackLabel(collector.getItem(0))}`);

  lines.push("");
  lines.push("Items in source after:");
  lines.push(...buildSlotLines(source));

  const nextFood = new BasicItem(KEPT_NAME, 1);
  const foodPlacement = source.nextPlacement(nextFood, config.defaultMaxStack);
  lines.push("");
  lines.push(
    foodPlacement === NOT_FOUND
      ? `No room for another ${KEPT_NAME}.`
      : `Next ${KEPT_NAME} x${countOf(nextFood)} goes to slot ${foodPlacement} (max stack ${config.defaultMaxStack || "unbounded"}).`,
  );

  return { source, collector, gravelBefore, foodPlacement, lines };
}

// CLI
if (require.main === module) {
  dotenv.config();
  try {
    const res = runCollateDemo(loadSlotConfig());
    process.stdout.write(res.lines.join("\n") + "\n");
  } catch (err) {
    log.error("Collate demo failed", err);
    process.exit(1);
  }
}
