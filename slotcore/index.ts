// slotcore/index.ts

// Config
export * from "./config/config";
export * from "./config/logconfig";

// Errors
export * from "./core/errors";

// Items
export * from "./items/Item";
export * from "./items/itemText";

// Inventories
export * from "./inventory/InventoryTypes";
export { InventorySecondary, requireSlot } from "./inventory/InventorySecondary";
export { SlotInventory } from "./inventory/SlotInventory";
export { SparseInventory } from "./inventory/SparseInventory";

// Utils
export { Logger, setLogSink } from "./utils/logger";
export type { LogSink } from "./utils/logger";
export { randomInt, seededRandom } from "./utils/Rng";
export type { RandomSource } from "./utils/Rng";
