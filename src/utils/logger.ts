/**
 * Structured logging infrastructure with pretty and JSON format support
 * Records go to stderr so they never interleave with the report on stdout
 */

import { supportsColor } from "./colors.ts";

// Global logger configuration - initialized once at startup
const loggerConfig = { format: "pretty" as "pretty" | "json" };

/**
 * Initializes logger with configuration
 * Must be called before any logging functions
 */
export function initializeLogger(format: "pretty" | "json"): void {
  loggerConfig.format = format;
}

/**
 * Formats a log entry as pretty human-readable text with optional colors
 */
function formatPretty(fields: Record<string, unknown>): string {
  const timestamp = new Date().toISOString().slice(11, 23); // HH:MM:SS.mmm format
  const mod = typeof fields.mod === "string" ? fields.mod : "unknown";
  const event = typeof fields.event === "string" ? fields.event : "unknown";

  // Remove mod and event from fields for display
  const { mod: _mod, event: _event, ts: _ts, ...rest } = fields;

  const colors = supportsColor(process.stderr);
  const modColor = colors ? "\x1b[1;36m" : ""; // Cyan for module
  const eventColor = colors ? "\x1b[1;32m" : ""; // Green for event
  const resetColor = colors ? "\x1b[0m" : "";

  const parts: string[] = [
    `[${timestamp}]`,
    `${modColor}${mod.toUpperCase()}${resetColor}`,
    `${eventColor}${event}${resetColor}`,
  ];

  // Add key-value pairs for remaining fields
  for (const [key, value] of Object.entries(rest)) {
    if (value !== undefined && value !== null) {
      const displayValue = typeof value === "string" ? `"${value}"` : String(value);
      parts.push(`${key}=${displayValue}`);
    }
  }

  return parts.join(" ");
}

/**
 * Formats a log entry as JSON string
 */
function formatJson(fields: Record<string, unknown>): string {
  const base = { ts: new Date().toISOString() };
  return JSON.stringify({ ...base, ...fields });
}

/**
 * Logs a structured message to stderr in configured format
 */
export function log(fields: Record<string, unknown>): void {
  if (loggerConfig.format === "json") {
    console.error(formatJson(fields));
  } else {
    console.error(formatPretty(fields));
  }
}

/**
 * Renders an unknown thrown value as a message
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
