/**
 * Configuration type definitions
 */
import { z } from "zod";

export interface SessionConfig {
  readonly outputDir: string;
  readonly requireRoot: boolean;
}

export interface ToolsConfig {
  readonly smartctl: string;
  readonly lsblk: string;
}

export interface LoggingConfig {
  readonly format: "pretty" | "json";
}

/**
 * Parsed and validated configuration object
 */
export interface Config {
  readonly session: SessionConfig;
  readonly tools: ToolsConfig;
  readonly logging: LoggingConfig;
}

/**
 * Zod schema for configuration validation
 * Validates the entire configuration object structure
 */
export const configSchema = z.object({
  session: z.object({
    outputDir: z.string().min(1),
    requireRoot: z.boolean(),
  }),
  tools: z.object({
    smartctl: z.string().min(1),
    lsblk: z.string().min(1),
  }),
  logging: z.object({
    format: z.enum(["pretty", "json"]),
  }),
});
