/**
 * Configuration and environment variable validation
 */
import type { Config } from "./types.ts";
import { env } from "./utils.ts";
export type { Config };

/**
 * Creates default configuration instance using environment variables
 * This function is called by the loader to build the configuration
 * @returns Default configuration with environment overrides
 */
export function createDefaultConfig(): Config {
  return {
    session: {
      // Directory that receives the per-session CSV file
      outputDir: env("SSD_TEST_OUTPUT_DIR", "."),
      // Refuse to start without root (smartctl needs raw device access)
      requireRoot: env("SSD_TEST_REQUIRE_ROOT", true),
    },
    // External programs, resolved through PATH unless absolute
    tools: {
      smartctl: env("SSD_TEST_SMARTCTL_BIN", "smartctl"),
      lsblk: env("SSD_TEST_LSBLK_BIN", "lsblk"),
    },
    logging: {
      // Log format: "pretty" for terminals, "json" for piping into other tools
      format: env("LOGGING_FORMAT", "pretty") as "pretty" | "json",
    },
  };
}
