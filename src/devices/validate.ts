import { existsSync } from "node:fs";

/** Whole SATA/USB disks only: no partitions, no other device classes */
const DEVICE_PATH_PATTERN = /^\/dev\/sd[a-z]$/;

export const DEVICE_PATH_HINT = "/dev/sd[a-z]";

/**
 * Gate in front of every smartctl invocation with a user-supplied path.
 * @param exists Existence probe, replaceable in tests
 */
export function validateDevicePath(
  devicePath: string,
  exists: (path: string) => boolean = existsSync,
): boolean {
  if (!DEVICE_PATH_PATTERN.test(devicePath)) {
    return false;
  }
  return exists(devicePath);
}
