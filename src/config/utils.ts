/**
 * Configuration utility functions
 */

/**
 * Type-safe environment variable getter with automatic type inference
 * @param name Environment variable name
 * @param defaultValue Default value (optional). If not provided, variable is required
 * @returns Environment variable value converted to the type of defaultValue, or defaultValue if variable not set
 * @throws {Error} if variable is required but not set, or if conversion fails
 */
export function env(name: string, defaultValue?: string): string;
export function env(name: string, defaultValue: number): number;
export function env(name: string, defaultValue: boolean): boolean;
export function env(
  name: string,
  defaultValue?: string | number | boolean,
): string | number | boolean {
  const value = process.env[name];

  if (value === undefined) {
    if (defaultValue === undefined) {
      throw new Error(`Required environment variable ${name} is not set`);
    }
    return defaultValue;
  }

  // Type-safe conversion based on default value type
  if (typeof defaultValue === "number") {
    const numValue = Number(value);
    if (isNaN(numValue)) {
      throw new Error(`Environment variable ${name} must be a valid number, got: ${value}`);
    }
    return numValue;
  }

  if (typeof defaultValue === "boolean") {
    if (value === "true" || value === "1") {
      return true;
    }
    if (value === "false" || value === "0") {
      return false;
    }
    throw new Error(
      `Environment variable ${name} must be a valid boolean (true/false/1/0), got: ${value}`,
    );
  }

  return value;
}

