/**
 * smartctl invocation: validated device path in, decoded JSON report out
 */

import { validateDevicePath } from "../devices/validate.ts";
import { describeError, log } from "../utils/logger.ts";
import type { ExecFn } from "../utils/sh.ts";

export const DEFAULT_SMARTCTL_OPTIONS: readonly string[] = ["-x"];

export interface SmartctlRun {
  /** Decoded JSON document, null when there is no usable data */
  readonly data: unknown;
  /** smartctl exit status (a bitmask), -1 when it did not run */
  readonly code: number;
  readonly error?: string;
}

export interface SmartctlDeps {
  readonly exec: ExecFn;
  readonly smartctl?: string;
  readonly exists?: (path: string) => boolean;
}

/**
 * Runs `smartctl <options...> -j <device>`. Never throws: failures come back as
 * `data: null` with an error message.
 */
export async function runSmartctl(
  devicePath: string,
  options: readonly string[],
  deps: SmartctlDeps,
): Promise<SmartctlRun> {
  if (!validateDevicePath(devicePath, deps.exists)) {
    log({ mod: "smartctl", event: "rejected_device_path", device: devicePath });
    return { data: null, code: -1, error: `Invalid device path: ${devicePath}` };
  }

  const command = deps.smartctl ?? "smartctl";
  const args = [...options, "-j", devicePath];
  log({ mod: "smartctl", event: "command_start", command, args: args.join(" ") });

  const start = Date.now();
  let stdout: string;
  let code: number;
  try {
    const output = await deps.exec(command, args);
    stdout = output.stdoutText();
    code = output.code;
  } catch (error) {
    log({ mod: "smartctl", event: "command_failed", device: devicePath, error: describeError(error) });
    return { data: null, code: -1, error: `Failed to execute smartctl: ${describeError(error)}` };
  }

  // Non-zero exit codes flag drive conditions; the JSON is still emitted
  log({ mod: "smartctl", event: "command_result", device: devicePath, exitCode: code, durationMs: Date.now() - start });

  try {
    return { data: JSON.parse(stdout), code };
  } catch (error) {
    log({ mod: "smartctl", event: "json_parse_failed", device: devicePath, error: describeError(error) });
    return {
      data: null,
      code,
      error: `Failed to parse smartctl JSON output: ${describeError(error)}`,
    };
  }
}
