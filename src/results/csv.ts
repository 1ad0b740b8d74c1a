/**
 * Append-only CSV log of drive test results
 */

import { appendFile } from "node:fs/promises";
import { fileExists } from "../utils/fs.ts";
import { describeError, log } from "../utils/logger.ts";
import { formatField, formatWarnings, type TestResult } from "../smart/types.ts";

interface CsvColumn {
  readonly header: string;
  readonly cell: (result: TestResult) => string;
}

export const CSV_COLUMNS: readonly CsvColumn[] = [
  { header: "timestamp", cell: (r) => r.timestamp },
  { header: "model", cell: (r) => formatField(r.model) },
  { header: "serial", cell: (r) => formatField(r.serial) },
  { header: "firmware", cell: (r) => formatField(r.firmware) },
  { header: "capacity_gb", cell: (r) => formatField(r.capacityGb) },
  { header: "health_status", cell: (r) => formatField(r.healthStatus) },
  { header: "power_on_hours", cell: (r) => formatField(r.powerOnHours) },
  { header: "power_cycles", cell: (r) => formatField(r.powerCycles) },
  { header: "temperature_c", cell: (r) => formatField(r.temperatureC) },
  { header: "total_lbas_written", cell: (r) => formatField(r.totalLbasWritten) },
  { header: "total_tb_written", cell: (r) => formatField(r.totalTbWritten) },
  { header: "wear_level_pct", cell: (r) => formatField(r.wearLevelPct) },
  { header: "reserved_space_pct", cell: (r) => formatField(r.reservedSpacePct) },
  { header: "reallocated_sectors", cell: (r) => formatField(r.reallocatedSectors) },
  { header: "pending_sectors", cell: (r) => formatField(r.pendingSectors) },
  { header: "uncorrectable_sectors", cell: (r) => formatField(r.uncorrectableSectors) },
  { header: "self_test_result", cell: (r) => formatField(r.selfTestResult) },
  { header: "warnings", cell: (r) => formatWarnings(r.warnings) },
];

const LINE_END = "\r\n";

/** RFC 4180: quote only when the cell holds a delimiter, quote or line break */
export function escapeCsvCell(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

function csvLine(cells: readonly string[]): string {
  return cells.map(escapeCsvCell).join(",") + LINE_END;
}

export function csvHeaderLine(): string {
  return csvLine(CSV_COLUMNS.map((c) => c.header));
}

export function csvRowLine(result: TestResult): string {
  return csvLine(CSV_COLUMNS.map((c) => c.cell(result)));
}

/** `ssd_test_results_<YYYYMMDD>_<HHMMSS>.csv`, local time */
export function sessionCsvFilename(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `ssd_test_results_${day}_${time}.csv`;
}

/**
 * Writes test results to one CSV file, header first when the file is new
 */
export class CsvResultWriter {
  readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  /**
   * Appends one row (plus the header for a new file) in a single write
   * @returns false when the write failed; the error is logged, not thrown
   */
  async append(result: TestResult): Promise<boolean> {
    try {
      const isNew = !(await fileExists(this.filePath));
      const content = (isNew ? csvHeaderLine() : "") + csvRowLine(result);
      await appendFile(this.filePath, content, { encoding: "utf8" });
      log({ mod: "csv", event: "row_appended", file: this.filePath, header: isNew });
      return true;
    } catch (error) {
      log({ mod: "csv", event: "write_failed", file: this.filePath, error: describeError(error) });
      return false;
    }
  }
}
