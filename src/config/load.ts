import { readFileSync } from "node:fs";
import { join } from "node:path";
import type { Config } from "./types.ts";
import { configSchema } from "./types.ts";
import { isNotFound } from "../utils/fs.ts";
import { createDefaultConfig } from "./config.ts";

/**
 * Loads environment variables from .env file if it exists
 * @returns Object with environment variables from .env file
 */
function loadDotEnv(): Record<string, string | undefined> {
  let content: string;
  try {
    content = readFileSync(join(process.cwd(), ".env"), "utf8");
  } catch (error) {
    // .env file doesn't exist, return empty object
    if (isNotFound(error)) {
      return {};
    }
    throw error;
  }

  const env: Record<string, string | undefined> = {};
  for (const line of content.split("\n")) {
    const trimmed = line.trim();
    // Skip empty lines and comments
    if (!trimmed || trimmed.startsWith("#")) {
      continue;
    }

    const equalIndex = trimmed.indexOf("=");
    if (equalIndex === -1) {
      continue;
    }

    const key = trimmed.slice(0, equalIndex).trim();
    const value = trimmed.slice(equalIndex + 1).trim();

    // Remove surrounding quotes if present
    env[key] = value.replace(/^["']|["']$/g, "");
  }

  return env;
}

/**
 * Cached configuration instance
 * Exported for testing purposes to allow cache clearing
 */
export let cachedConfig: Config | null = null;

/**
 * Clears the configuration cache
 * Used for testing purposes
 */
export function clearConfigCache(): void {
  cachedConfig = null;
}

/**
 * Loads and validates environment configuration
 * @throws {Error} if a variable is invalid or the assembled config fails validation
 */
export function loadConfig(): Config {
  if (cachedConfig) {
    return cachedConfig;
  }

  // Set .env variables in the environment if they are not already set
  for (const [key, value] of Object.entries(loadDotEnv())) {
    if (process.env[key] === undefined && value !== undefined) {
      process.env[key] = value;
    }
  }

  const config = createDefaultConfig();

  // Validate the entire configuration object using zod schema
  cachedConfig = configSchema.parse(config);
  return cachedConfig;
}
