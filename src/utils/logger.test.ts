/**
 * Logger infrastructure tests
 */

import { test } from "node:test";
import assert from "node:assert/strict";
import { describeError, initializeLogger, log } from "./logger.ts";

// Mock console.error to capture output
let capturedLogs: string[] = [];
const originalConsoleError = console.error;

function setupConsoleMock() {
  capturedLogs = [];
  console.error = (message: string) => {
    capturedLogs.push(message);
  };
}

function restoreConsoleMock() {
  console.error = originalConsoleError;
}

test("log: basic structured logging (pretty format)", () => {
  setupConsoleMock();

  try {
    initializeLogger("pretty");

    log({
      mod: "test",
      event: "test_event",
      custom_field: "custom_value",
    });

    assert.equal(capturedLogs.length, 1);
    const logLine = capturedLogs[0];

    assert.match(logLine, /^\[\d{2}:\d{2}:\d{2}\.\d{3}\] /);
    assert.ok(logLine.includes("TEST"));
    assert.ok(logLine.includes("test_event"));
    assert.ok(logLine.includes('custom_field="custom_value"'));
  } finally {
    restoreConsoleMock();
  }
});

test("log: JSON format logging", () => {
  setupConsoleMock();

  try {
    initializeLogger("json");

    log({
      mod: "test",
      event: "json_event",
      custom_field: "json_value",
    });

    assert.equal(capturedLogs.length, 1);
    const logData = JSON.parse(capturedLogs[0]);

    assert.equal(logData.mod, "test");
    assert.equal(logData.event, "json_event");
    assert.equal(logData.custom_field, "json_value");
    assert.ok(logData.ts.startsWith(new Date().toISOString().slice(0, 10)));
  } finally {
    restoreConsoleMock();
  }
});

test("pretty format: handles different field types", () => {
  setupConsoleMock();

  try {
    initializeLogger("pretty");

    log({
      mod: "test",
      event: "field_types",
      string_field: "string_value",
      number_field: 42,
      boolean_field: true,
      null_field: null,
      undefined_field: undefined,
    });

    const logLine = capturedLogs[0];
    assert.ok(logLine.includes('string_field="string_value"'));
    assert.ok(logLine.includes("number_field=42"));
    assert.ok(logLine.includes("boolean_field=true"));

    // null and undefined should not appear
    assert.equal(logLine.includes("null_field"), false);
    assert.equal(logLine.includes("undefined_field"), false);
  } finally {
    restoreConsoleMock();
  }
});

test("describeError: uses message for errors, String() otherwise", () => {
  assert.equal(describeError(new Error("boom")), "boom");
  assert.equal(describeError("plain"), "plain");
  assert.equal(describeError(7), "7");
});
