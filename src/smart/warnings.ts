/**
 * Threshold checks over a drive's normalized metrics
 */

import type { Field, NormalizedMetrics, PassFail, Warnings } from "./types.ts";

export const HIGH_TEMP_CELSIUS = 70;
export const HIGH_WEAR_PERCENT = 80;

const SECTOR_COUNTERS = [
  ["REALLOCATED_SECTORS", "reallocatedSectors"],
  ["PENDING_SECTORS", "pendingSectors"],
  ["UNCORRECTABLE_SECTORS", "uncorrectableSectors"],
] as const satisfies readonly (readonly [string, keyof NormalizedMetrics])[];

/** Integer part of a readable value, or null when there is nothing to compare */
function whole(field: Field<number>): number | null {
  if (field.kind === "unavailable" || !Number.isFinite(field.value)) return null;
  return Math.trunc(field.value);
}

/**
 * Derives warning tags, in fixed order: health, sector counters, temperature, wear.
 * Unavailable values are skipped.
 */
export function generateWarnings(input: {
  readonly healthStatus: Field<PassFail>;
  readonly metrics: NormalizedMetrics;
}): Warnings {
  const { healthStatus, metrics } = input;
  const warnings: string[] = [];

  if (healthStatus.kind === "value" && healthStatus.value === "FAILED") {
    warnings.push("SMART_HEALTH_FAILED");
  }

  for (const [tag, key] of SECTOR_COUNTERS) {
    const count = whole(metrics[key]);
    if (count !== null && count > 0) {
      warnings.push(`${tag}:${count}`);
    }
  }

  const temp = whole(metrics.temperatureC);
  if (temp !== null && temp > HIGH_TEMP_CELSIUS) {
    warnings.push(`HIGH_TEMP:${temp}C`);
  }

  const wear = whole(metrics.wearLevelPct);
  if (wear !== null && wear > HIGH_WEAR_PERCENT) {
    warnings.push(`HIGH_WEAR:${wear}%`);
  }

  return warnings.length === 0 ? "None" : [warnings[0], ...warnings.slice(1)];
}
