/**
 * Block device listing via lsblk
 */

import { log, describeError } from "../utils/logger.ts";
import type { ExecFn } from "../utils/sh.ts";

export interface BlockDevice {
  readonly name: string;
  readonly size: string;
  readonly path: string;
}

/**
 * Parses `lsblk -d -n -o NAME,SIZE,TYPE` output, keeping whole `sd*` disks
 */
export function parseLsblkOutput(stdout: string): BlockDevice[] {
  const devices: BlockDevice[] = [];

  for (const line of stdout.trim().split("\n")) {
    const [name, size, type] = line.trim().split(/\s+/);
    if (name === undefined || size === undefined || type === undefined) continue;
    // Filter for disk type devices (not partitions or loops)
    if (type === "disk" && name.startsWith("sd")) {
      devices.push({ name, size, path: `/dev/${name}` });
    }
  }

  return devices;
}

/**
 * Lists candidate drives; any failure is logged and yields an empty list
 */
export async function listBlockDevices(exec: ExecFn, lsblk = "lsblk"): Promise<BlockDevice[]> {
  try {
    const output = await exec(lsblk, ["-d", "-n", "-o", "NAME,SIZE,TYPE"]);
    if (!output.success) {
      throw new Error(`(exit code: ${output.code}) ${output.stderrText().trim()}`);
    }

    const devices = parseLsblkOutput(output.stdoutText());
    log({ mod: "devices", event: "listed", count: devices.length });
    return devices;
  } catch (error) {
    log({ mod: "devices", event: "list_failed", error: describeError(error) });
    return [];
  }
}
