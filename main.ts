#!/usr/bin/env -S npx tsx
/**
 * Interactive SMART health check for USB-attached SATA drives
 * - Runtime: Node.js via tsx
 * - External tools: smartctl (smartmontools), lsblk
 * - Output: one CSV file per session in SSD_TEST_OUTPUT_DIR
 */

import { startSession } from "./src/app.ts";

process.exitCode = await startSession();
