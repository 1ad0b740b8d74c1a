/**
 * End-to-end drive test: fake smartctl output through to a TestResult
 */

import { test } from "node:test";
import assert from "node:assert/strict";
import { createFakeExec, fakeOutput } from "../utils/mock.ts";
import { buildTestResult, formatTimestamp, testDrive } from "./drive-test.ts";
import { present, type TestResult, unavailable } from "./types.ts";

const at = new Date(2024, 0, 15, 9, 5, 7);

const samsungReport = {
  model_name: "Samsung SSD 860",
  serial_number: "S3Z1NB0K000000X",
  firmware_version: "RVT02B6Q",
  user_capacity: { bytes: 500107862016 },
  smart_status: { passed: true },
  ata_smart_attributes: {
    table: [
      { id: 177, name: "Wear_Leveling_Count", value: 90, raw: { value: 54, string: "54" } },
      { id: 241, name: "Total_LBAs_Written", value: 99, raw: { value: 524288000, string: "524288000" } },
    ],
  },
};

test("drive test: timestamp is local YYYY-MM-DD HH:MM:SS", () => {
  assert.equal(formatTimestamp(at), "2024-01-15 09:05:07");
});

test("drive test: Samsung report end to end", () => {
  const result = buildTestResult(samsungReport, at);

  const expected: TestResult = {
    timestamp: "2024-01-15 09:05:07",
    model: present("Samsung SSD 860"),
    serial: present("S3Z1NB0K000000X"),
    firmware: present("RVT02B6Q"),
    capacityGb: present(465.76),
    healthStatus: present("PASSED"),
    powerOnHours: unavailable,
    powerCycles: unavailable,
    temperatureC: unavailable,
    reallocatedSectors: unavailable,
    pendingSectors: unavailable,
    uncorrectableSectors: unavailable,
    reservedSpacePct: unavailable,
    wearLevelPct: present(10),
    totalLbasWritten: present(524288000),
    totalTbWritten: present(0.24),
    selfTestResult: unavailable,
    warnings: "None",
  };
  assert.deepEqual(result, expected);
});

test("drive test: failing drive collects warnings", () => {
  const result = buildTestResult({
    model_name: "Worn SSD",
    smart_status: { passed: false },
    temperature: { current: 72 },
    ata_smart_attributes: {
      table: [
        { id: 5, value: 90, raw: { value: 3 } },
        { id: 233, value: 12, raw: { value: 0 } },
      ],
    },
  }, at);

  assert.deepEqual(result.warnings, [
    "SMART_HEALTH_FAILED",
    "REALLOCATED_SECTORS:3",
    "HIGH_TEMP:72C",
    "HIGH_WEAR:88%",
  ]);
});

test("drive test: testDrive runs smartctl -x and builds the result", async () => {
  const { exec, calls } = createFakeExec(() => fakeOutput(JSON.stringify(samsungReport), 0));

  const outcome = await testDrive("/dev/sdb", { exec, exists: () => true, now: () => at });

  assert.deepEqual(calls, [{ command: "smartctl", args: ["-x", "-j", "/dev/sdb"] }]);
  assert.equal(outcome.ok, true);
  if (outcome.ok) {
    assert.deepEqual(outcome.result, buildTestResult(samsungReport, at));
  }
});

test("drive test: no data yields an error outcome", async () => {
  const { exec } = createFakeExec(() => fakeOutput("", 1));

  const outcome = await testDrive("/dev/sdb", { exec, exists: () => true });

  assert.equal(outcome.ok, false);
  if (!outcome.ok) {
    assert.ok(outcome.error.startsWith("Failed to parse smartctl JSON output: "));
  }
});

test("drive test: smart_status without a verdict warns as failed", () => {
  const result = buildTestResult({ model_name: "Bare SSD", smart_status: {} }, at);

  assert.deepEqual(result.healthStatus, present("FAILED"));
  assert.deepEqual(result.warnings, ["SMART_HEALTH_FAILED"]);
});
