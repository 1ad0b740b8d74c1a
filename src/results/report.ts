/**
 * Fixed-layout terminal rendering of a drive test result
 */

import type { Colors } from "../utils/colors.ts";
import { type Field, formatField, formatWarnings, type TestResult } from "../smart/types.ts";
import { HIGH_TEMP_CELSIUS, HIGH_WEAR_PERCENT } from "../smart/warnings.ts";

export const RULE_WIDTH = 60;

// Yellow band below the warning thresholds
const WARM_TEMP_CELSIUS = 60;
const MODERATE_WEAR_PERCENT = 50;

// Thresholds compare whole units, the same way the warnings do
function whole(value: number): number {
  return Math.trunc(value);
}

function colorHealth(field: Field<string>, c: Colors): string {
  if (field.kind === "unavailable") return formatField(field);
  if (field.value === "PASSED") return c.success(field.value);
  if (field.value === "FAILED") return c.error(field.value);
  return field.value;
}

function colorTemperature(field: Field<number>, c: Colors): string {
  if (field.kind === "unavailable") return formatField(field);
  const text = `${field.value}°C`;
  const degrees = whole(field.value);
  if (degrees > HIGH_TEMP_CELSIUS) return c.error(text);
  if (degrees > WARM_TEMP_CELSIUS) return c.warning(text);
  return text;
}

function colorWear(field: Field<number>, c: Colors): string {
  if (field.kind === "unavailable") return formatField(field);
  const text = `${field.value}%`;
  const percent = whole(field.value);
  if (percent > HIGH_WEAR_PERCENT) return c.error(text);
  if (percent > MODERATE_WEAR_PERCENT) return c.warning(text);
  return c.success(text);
}

function colorSectors(field: Field<number>, c: Colors): string {
  if (field.kind === "unavailable") return formatField(field);
  const text = String(field.value);
  return field.value > 0 ? c.error(text) : c.success(text);
}

/**
 * Renders the result block as lines, without trailing newlines
 */
export function renderResults(result: TestResult, c: Colors): string[] {
  const rule = c.header("=".repeat(RULE_WIDTH));
  const separator = "-".repeat(RULE_WIDTH);
  const warnings = formatWarnings(result.warnings);

  return [
    "",
    rule,
    c.header("DRIVE TEST RESULTS"),
    rule,
    `Model:           ${c.info(formatField(result.model))}`,
    `Serial:          ${formatField(result.serial)}`,
    `Firmware:        ${formatField(result.firmware)}`,
    `Capacity:        ${formatField(result.capacityGb)} GB`,
    `Health Status:   ${colorHealth(result.healthStatus, c)}`,
    separator,
    `Power-On Hours:  ${formatField(result.powerOnHours)}`,
    `Power Cycles:    ${formatField(result.powerCycles)}`,
    `Temperature:     ${colorTemperature(result.temperatureC, c)}`,
    `Total Written:   ${formatField(result.totalTbWritten)} TB`,
    `Wear Level:      ${colorWear(result.wearLevelPct, c)}`,
    separator,
    `Reallocated:     ${colorSectors(result.reallocatedSectors, c)}`,
    `Pending:         ${colorSectors(result.pendingSectors, c)}`,
    `Uncorrectable:   ${colorSectors(result.uncorrectableSectors, c)}`,
    separator,
    `Warnings:        ${result.warnings === "None" ? c.success(warnings) : c.error(warnings)}`,
    rule,
  ];
}
