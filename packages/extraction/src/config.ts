import { z } from "zod";

import type { BaselineConfig } from "./types";

const sizeInGb = z.number().int().min(0);

export const BASELINE_SCHEMA = z.object({
  ramGb: sizeInGb,
  storageGb: sizeInGb,
  cpuGen: z.number().int().min(0),
});

export type DealDefaults = {
  baseline: BaselineConfig;
  topN: number;
  fileConcurrency: number;
};

export function parseBaseline(input: unknown): BaselineConfig {
  return Object.freeze(BASELINE_SCHEMA.parse(input));
}

export function loadDefaults(env: NodeJS.ProcessEnv = process.env): DealDefaults {
  return {
    baseline: parseBaseline({
      ramGb: parseEnvInt(env.DEALS_BASELINE_RAM_GB, 16, 0, 4096),
      storageGb: parseEnvInt(env.DEALS_BASELINE_STORAGE_GB, 512, 0, 1_048_576),
      cpuGen: parseEnvInt(env.DEALS_BASELINE_CPU_GEN, 10, 0, 99),
    }),
    topN: parseEnvInt(env.DEALS_TOP_N, 3, 1, 100),
    fileConcurrency: parseEnvInt(env.DEALS_FILE_CONCURRENCY, 2, 1, 8),
  };
}

export function parseEnvInt(raw: string | undefined, fallback: number, min: number, max: number): number {
  const parsed = raw ? Number.parseInt(raw, 10) : fallback;
  if (!Number.isFinite(parsed)) {
    return fallback;
  }
  return Math.min(Math.max(parsed, min), max);
}
