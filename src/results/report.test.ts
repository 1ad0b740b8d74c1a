import { test } from "node:test";
import assert from "node:assert/strict";
import { buildTestResult } from "../smart/drive-test.ts";
import { createColors, plainColors } from "../utils/colors.ts";
import { renderResults } from "./report.ts";

const at = new Date(2024, 0, 15, 9, 5, 7);

test("report: fixed layout with N/A for unreadable fields", () => {
  const result = buildTestResult({
    model_name: "Samsung SSD 860",
    serial_number: "S3Z1NB0K000000X",
    smart_status: { passed: true },
    temperature: { current: 36 },
    ata_smart_attributes: {
      table: [
        { id: 5, value: 100, raw: { value: 0 } },
        { id: 177, value: 90 },
        { id: 241, value: 99, raw: { value: 524288000 } },
      ],
    },
  }, at);

  const rule = "=".repeat(60);
  const separator = "-".repeat(60);

  assert.deepEqual(renderResults(result, plainColors), [
    "",
    rule,
    "DRIVE TEST RESULTS",
    rule,
    "Model:           Samsung SSD 860",
    "Serial:          S3Z1NB0K000000X",
    "Firmware:        N/A",
    "Capacity:        N/A GB",
    "Health Status:   PASSED",
    separator,
    "Power-On Hours:  N/A",
    "Power Cycles:    N/A",
    "Temperature:     36°C",
    "Total Written:   0.24 TB",
    "Wear Level:      10%",
    separator,
    "Reallocated:     0",
    "Pending:         N/A",
    "Uncorrectable:   N/A",
    separator,
    "Warnings:        None",
    rule,
  ]);
});

test("report: colors follow the thresholds", () => {
  const colors = createColors(true);
  const result = buildTestResult({
    smart_status: { passed: false },
    temperature: { current: 65 },
    ata_smart_attributes: {
      table: [
        { id: 5, value: 90, raw: { value: 4 } },
        { id: 231, value: 10 },
      ],
    },
  }, at);

  const lines = renderResults(result, colors);

  assert.equal(lines[8], "Health Status:   \x1b[91mFAILED\x1b[0m");
  assert.equal(lines[12], "Temperature:     \x1b[93m65°C\x1b[0m");
  assert.equal(lines[14], "Wear Level:      \x1b[91m90%\x1b[0m");
  assert.equal(lines[16], "Reallocated:     \x1b[91m4\x1b[0m");
  assert.equal(
    lines[20],
    "Warnings:        \x1b[91mSMART_HEALTH_FAILED, REALLOCATED_SECTORS:4, HIGH_WEAR:90%\x1b[0m",
  );
});

test("report: fractional readings just over a threshold stay below the red band", () => {
  const colors = createColors(true);
  const result = buildTestResult({
    smart_status: { passed: true },
    temperature: { current: 70.5 },
    ata_smart_attributes: {
      table: [{ id: 231, value: 19.5 }],
    },
  }, at);

  const lines = renderResults(result, colors);

  assert.equal(result.warnings, "None");
  assert.equal(lines[12], "Temperature:     \x1b[93m70.5°C\x1b[0m");
  assert.equal(lines[14], "Wear Level:      \x1b[93m80.5%\x1b[0m");
  assert.equal(lines[20], "Warnings:        \x1b[92mNone\x1b[0m");
});
