//slotcore/config/config.ts

import { z } from "zod";

import { ConfigError } from "../core/errors";

const intFromEnv = (min: number, fallback: number) =>
  z.coerce.number().int().min(min).default(fallback);

const slotEnvSchema = z.object({
  SLOT_DEMO_SIZE: intFromEnv(1, 10),
  SLOT_DEMO_MAX_COUNT: intFromEnv(1, 10),
  SLOT_DEMO_SEED: z.string().min(1).default("collate"),
  // 0 = unbounded stacking
  SLOT_DEFAULT_MAX_STACK: intFromEnv(0, 64),
});

export interface SlotConfig {
  demoSize: number;
  demoMaxCount: number;
  demoSeed: string;
  defaultMaxStack: number;
}

export type SlotEnv = Record<string, string | undefined>;

/**
 * Validate an environment map into a SlotConfig.
 * Blank values count as unset. Nothing here reads `.env`; the demo CLI loads
 * it before calling this.
 */
export function loadSlotConfig(env: SlotEnv = process.env): SlotConfig {
  const raw: SlotEnv = {};
  for (const key of Object.keys(slotEnvSchema.shape)) {
    const v = env[key];
    if (v !== undefined && v.trim() !== "") raw[key] = v.trim();
  }

  const parsed = slotEnvSchema.safeParse(raw);
  if (!parsed.success) {
    const keys = parsed.error.issues.map((i) => i.path.join("."));
    throw new ConfigError(`Invalid slotcore config: ${keys.join(", ")}`, keys);
  }

  return {
    demoSize: parsed.data.SLOT_DEMO_SIZE,
    demoMaxCount: parsed.data.SLOT_DEMO_MAX_COUNT,
    demoSeed: parsed.data.SLOT_DEMO_SEED,
    defaultMaxStack: parsed.data.SLOT_DEFAULT_MAX_STACK,
  };
}
