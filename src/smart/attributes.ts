/**
 * Maps a smartctl report onto device info and normalized health metrics.
 * Vendor-specific encodings are resolved through ordered, first-match rule tables.
 */

import type { SmartAttribute, SmartctlReport } from "./schema.ts";
import { indexAttributes } from "./schema.ts";
import type { DeviceInfo, Field, NormalizedMetrics, PassFail } from "./types.ts";
import { log } from "../utils/logger.ts";
import { fromOptional, present, unavailable } from "./types.ts";

/** ATA SMART attribute IDs this tool reads */
export const SmartAttributeId = {
  REALLOCATED_SECTORS: 5,
  POWER_ON_HOURS: 9,
  POWER_CYCLES: 12,
  RESERVED_SPACE: 170,
  WEAR_LEVELING: 177,
  TEMPERATURE: 194,
  PENDING_SECTORS: 197,
  UNCORRECTABLE_SECTORS: 198,
  SSD_LIFE_LEFT: 231,
  MEDIA_WEAROUT: 233,
  TOTAL_LBAS_WRITTEN: 241,
  HOST_WRITES_32MIB: 246,
} as const;

const GIB = 1024 ** 3;
const TIB = 1024 ** 4;

/**
 * Raw values above this are read as an LBA count, below as gigabytes.
 * There is no vendor table behind it; drives near the boundary can be misread.
 */
export const LBA_COUNT_THRESHOLD = 100_000;

export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Remaining-life attributes, checked in order. Each reports 100 = new, 0 = worn out.
 */
export const WEAR_LEVEL_RULES: readonly { readonly id: number; readonly vendor: string }[] = [
  { id: SmartAttributeId.WEAR_LEVELING, vendor: "Samsung" },
  { id: SmartAttributeId.SSD_LIFE_LEFT, vendor: "generic" },
  { id: SmartAttributeId.MEDIA_WEAROUT, vendor: "Intel" },
];

export interface DataWrittenRule {
  readonly id: number;
  readonly unit: string;
  readonly applies: (raw: number) => boolean;
  readonly toTerabytes: (raw: number) => number;
}

/**
 * Total-written encodings, checked in order. The first attribute present decides
 * the path; 246 is only consulted when 241 is missing.
 */
export const DATA_WRITTEN_RULES: readonly DataWrittenRule[] = [
  // Samsung/Intel: 512-byte LBAs
  {
    id: SmartAttributeId.TOTAL_LBAS_WRITTEN,
    unit: "lba",
    applies: (raw) => raw > LBA_COUNT_THRESHOLD,
    toTerabytes: (raw) => (raw * 512) / TIB,
  },
  // WD/Kingston/SanDisk: already gigabytes
  {
    id: SmartAttributeId.TOTAL_LBAS_WRITTEN,
    unit: "gb",
    applies: () => true,
    toTerabytes: (raw) => raw / 1024,
  },
  // Crucial/Micron: 32 MiB units
  {
    id: SmartAttributeId.HOST_WRITES_32MIB,
    unit: "32mib",
    applies: () => true,
    toTerabytes: (raw) => (raw * 32) / (1024 * 1024),
  },
];

export function extractDeviceInfo(report: SmartctlReport): DeviceInfo {
  const bytes = report.user_capacity?.bytes;
  return {
    model: fromOptional(report.model_name ?? report.model_family),
    serial: fromOptional(report.serial_number),
    firmware: fromOptional(report.firmware_version),
    capacityGb: bytes === undefined ? unavailable : present(round2(bytes / GIB)),
  };
}

function rawValue(lookup: Map<number, SmartAttribute>, id: number): Field<number> {
  return fromOptional(lookup.get(id)?.raw?.value);
}

function extractTemperature(
  report: SmartctlReport,
  lookup: Map<number, SmartAttribute>,
): Field<number> {
  const current = report.temperature?.current;
  if (current !== undefined) {
    return present(current);
  }

  const raw = lookup.get(SmartAttributeId.TEMPERATURE)?.raw;
  if (raw?.string !== undefined) {
    // e.g. "36 (Min/Max 2/56)"
    const match = /^(\d+)/.exec(raw.string);
    return match ? present(Number(match[1])) : unavailable;
  }
  if (raw?.value !== undefined) {
    // Current temperature sits in the lowest byte; min/max are packed above it
    return present(raw.value & 0xff);
  }
  return unavailable;
}

function extractWearLevel(lookup: Map<number, SmartAttribute>): Field<number> {
  for (const rule of WEAR_LEVEL_RULES) {
    const attr = lookup.get(rule.id);
    if (!attr) continue;
    log({ mod: "smart", event: "wear_level_source", attribute: rule.id, vendor: rule.vendor });
    return attr.value === undefined ? unavailable : present(100 - attr.value);
  }
  return unavailable;
}

function extractDataWritten(
  lookup: Map<number, SmartAttribute>,
): Pick<NormalizedMetrics, "totalLbasWritten" | "totalTbWritten"> {
  for (const rule of DATA_WRITTEN_RULES) {
    const attr = lookup.get(rule.id);
    if (!attr) continue;

    const raw = attr.raw?.value;
    if (raw === undefined) {
      return { totalLbasWritten: unavailable, totalTbWritten: unavailable };
    }
    if (!rule.applies(raw)) continue;

    log({ mod: "smart", event: "data_written_source", attribute: rule.id, unit: rule.unit, raw });

    return {
      totalLbasWritten: present(raw),
      totalTbWritten: present(round2(rule.toTerabytes(raw))),
    };
  }
  return { totalLbasWritten: unavailable, totalTbWritten: unavailable };
}

export function extractSmartAttributes(report: SmartctlReport): NormalizedMetrics {
  const lookup = indexAttributes(report);

  return {
    powerOnHours: rawValue(lookup, SmartAttributeId.POWER_ON_HOURS),
    powerCycles: rawValue(lookup, SmartAttributeId.POWER_CYCLES),
    temperatureC: extractTemperature(report, lookup),
    reallocatedSectors: rawValue(lookup, SmartAttributeId.REALLOCATED_SECTORS),
    pendingSectors: rawValue(lookup, SmartAttributeId.PENDING_SECTORS),
    uncorrectableSectors: rawValue(lookup, SmartAttributeId.UNCORRECTABLE_SECTORS),
    // Normalized, not raw: the percentage of spare blocks left
    reservedSpacePct: fromOptional(lookup.get(SmartAttributeId.RESERVED_SPACE)?.value),
    wearLevelPct: extractWearLevel(lookup),
    ...extractDataWritten(lookup),
  };
}

function passFail(passed: boolean | undefined): Field<PassFail> {
  if (passed === undefined) return unavailable;
  return present(passed ? "PASSED" : "FAILED");
}

/**
 * Overall verdict. A `smart_status` block without a `passed` flag counts as FAILED;
 * only a missing block is unavailable.
 */
export function getHealthStatus(report: SmartctlReport): Field<PassFail> {
  if (report.smart_status === undefined) return unavailable;
  return passFail(report.smart_status.passed ?? false);
}

/** Result of the most recent self-test recorded by the drive */
export function getSelfTestResult(report: SmartctlReport): Field<PassFail> {
  return passFail(report.ata_smart_data?.self_test?.status?.passed);
}
