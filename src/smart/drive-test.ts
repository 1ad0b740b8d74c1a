/**
 * One full drive test: smartctl run, extraction, warnings
 */

import { extractDeviceInfo, extractSmartAttributes, getHealthStatus, getSelfTestResult } from "./attributes.ts";
import { parseSmartctlReport } from "./schema.ts";
import { DEFAULT_SMARTCTL_OPTIONS, runSmartctl, type SmartctlDeps } from "./smartctl.ts";
import type { TestResult } from "./types.ts";
import { generateWarnings } from "./warnings.ts";

/** Local time as `YYYY-MM-DD HH:MM:SS` */
export function formatTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

/**
 * Builds a TestResult from an already-decoded smartctl document
 */
export function buildTestResult(data: unknown, now: Date = new Date()): TestResult {
  const report = parseSmartctlReport(data);
  const metrics = extractSmartAttributes(report);
  const healthStatus = getHealthStatus(report);

  return {
    timestamp: formatTimestamp(now),
    ...extractDeviceInfo(report),
    healthStatus,
    ...metrics,
    selfTestResult: getSelfTestResult(report),
    warnings: generateWarnings({ healthStatus, metrics }),
  };
}

export type DriveTestOutcome =
  | { readonly ok: true; readonly result: TestResult }
  | { readonly ok: false; readonly error: string };

export async function testDrive(
  devicePath: string,
  deps: SmartctlDeps & { readonly now?: () => Date },
): Promise<DriveTestOutcome> {
  const run = await runSmartctl(devicePath, DEFAULT_SMARTCTL_OPTIONS, deps);
  if (run.data === null) {
    return { ok: false, error: run.error ?? "Failed to get smartctl data" };
  }
  return { ok: true, result: buildTestResult(run.data, deps.now?.() ?? new Date()) };
}
