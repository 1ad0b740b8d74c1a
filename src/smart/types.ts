/**
 * Types for drive test results
 */

/** Marker printed and written wherever a value could not be read */
export const NOT_AVAILABLE = "N/A";

/**
 * A value read from the drive, or the explicit "unavailable" marker.
 * Every result field is one of these, never absent.
 */
export type Field<T> =
  | { readonly kind: "value"; readonly value: T }
  | { readonly kind: "unavailable" };

export const unavailable: Field<never> = { kind: "unavailable" };

export function present<const T>(value: T): Field<T> {
  return { kind: "value", value };
}

/** Wraps a possibly-missing value */
export function fromOptional<T>(value: T | undefined): Field<T> {
  return value === undefined ? unavailable : present(value);
}

export function formatField(field: Field<string | number>): string {
  return field.kind === "value" ? String(field.value) : NOT_AVAILABLE;
}

export type PassFail = "PASSED" | "FAILED";

export interface DeviceInfo {
  readonly model: Field<string>;
  readonly serial: Field<string>;
  readonly firmware: Field<string>;
  readonly capacityGb: Field<number>;
}

export interface NormalizedMetrics {
  readonly powerOnHours: Field<number>;
  readonly powerCycles: Field<number>;
  readonly temperatureC: Field<number>;
  readonly reallocatedSectors: Field<number>;
  readonly pendingSectors: Field<number>;
  readonly uncorrectableSectors: Field<number>;
  readonly reservedSpacePct: Field<number>;
  readonly wearLevelPct: Field<number>;
  readonly totalLbasWritten: Field<number>;
  readonly totalTbWritten: Field<number>;
}

/** Ordered warning tags, or "None" when nothing fired */
export type Warnings = readonly [string, ...string[]] | "None";

export interface TestResult extends DeviceInfo, NormalizedMetrics {
  /** Local time, `YYYY-MM-DD HH:MM:SS` */
  readonly timestamp: string;
  readonly healthStatus: Field<PassFail>;
  readonly selfTestResult: Field<PassFail>;
  readonly warnings: Warnings;
}

export function formatWarnings(warnings: Warnings): string {
  return warnings === "None" ? "None" : warnings.join(", ");
}
