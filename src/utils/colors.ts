/**
 * ANSI color helpers for terminal output
 */

export interface Colors {
  success(text: string): string;
  error(text: string): string;
  warning(text: string): string;
  info(text: string): string;
  header(text: string): string;
}

const CODES = {
  red: "\x1b[91m",
  green: "\x1b[92m",
  yellow: "\x1b[93m",
  cyan: "\x1b[96m",
  bold: "\x1b[1m",
  reset: "\x1b[0m",
} as const;

/**
 * Detects if a stream supports colors
 * Returns false in CI environments or when the stream is not a TTY
 */
export function supportsColor(stream: { isTTY?: boolean } = process.stdout): boolean {
  // Disable colors in CI environments
  if (process.env.CI === "true" || process.env.CONTINUOUS_INTEGRATION === "true") {
    return false;
  }
  return stream.isTTY === true;
}

export function createColors(enabled: boolean): Colors {
  const paint = (code: string) => (text: string) => enabled ? `${code}${text}${CODES.reset}` : text;
  return {
    success: paint(CODES.green),
    error: paint(CODES.red),
    warning: paint(CODES.yellow),
    info: paint(CODES.cyan),
    header: paint(CODES.bold),
  };
}

/** Pass-through palette, for tests and non-TTY output */
export const plainColors: Colors = createColors(false);
