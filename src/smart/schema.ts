/**
 * Lenient zod schema for `smartctl --json` reports.
 * Every field is optional and a field of the wrong type reads as absent,
 * so extraction never has to guard against shape errors.
 */
import { z } from "zod";
import { log } from "../utils/logger.ts";

function lenient<T extends z.ZodTypeAny>(schema: T) {
  return schema.optional().catch(undefined);
}

export const smartAttributeSchema = z.object({
  id: z.number().int(),
  name: lenient(z.string()),
  /** Normalized health score (vendor scale, usually 0-100 or 0-255) */
  value: lenient(z.number()),
  raw: lenient(z.object({
    value: lenient(z.number()),
    string: lenient(z.string()),
  })),
});

export type SmartAttribute = z.infer<typeof smartAttributeSchema>;

export const smartctlReportSchema = z.object({
  model_name: lenient(z.string()),
  model_family: lenient(z.string()),
  serial_number: lenient(z.string()),
  firmware_version: lenient(z.string()),
  user_capacity: lenient(z.object({ bytes: lenient(z.number()) })),
  smart_status: lenient(z.object({ passed: lenient(z.boolean()) })),
  temperature: lenient(z.object({ current: lenient(z.number()) })),
  ata_smart_attributes: lenient(z.object({ table: lenient(z.array(z.unknown())) })),
  ata_smart_data: lenient(z.object({
    self_test: lenient(z.object({
      status: lenient(z.object({ passed: lenient(z.boolean()) })),
    })),
  })),
});

export type SmartctlReport = z.infer<typeof smartctlReportSchema>;

/**
 * Reads a decoded JSON document as a report; anything that is not an object
 * yields an empty report
 */
export function parseSmartctlReport(data: unknown): SmartctlReport {
  const parsed = smartctlReportSchema.safeParse(data);
  if (!parsed.success) {
    log({ mod: "smartctl", event: "report_not_an_object", type: typeof data });
    return {};
  }
  return parsed.data;
}

/**
 * Indexes the ATA attribute table by ID. Rows without a numeric ID are skipped;
 * on duplicate IDs the later row wins.
 */
export function indexAttributes(report: SmartctlReport): Map<number, SmartAttribute> {
  const lookup = new Map<number, SmartAttribute>();
  const rows = report.ata_smart_attributes?.table ?? [];

  for (const row of rows) {
    const parsed = smartAttributeSchema.safeParse(row);
    if (parsed.success) {
      lookup.set(parsed.data.id, parsed.data);
    } else {
      log({ mod: "smartctl", event: "attribute_row_skipped", row: String(JSON.stringify(row)).slice(0, 100) });
    }
  }

  return lookup;
}
