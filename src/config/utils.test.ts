/**
 * Tests for configuration utility functions
 */

import { test } from "node:test";
import assert from "node:assert/strict";
import { env } from "./utils.ts";

// Mock environment for testing
const originalEnv = { ...process.env };

function setTestEnv(vars: Record<string, string>) {
  for (const key of Object.keys(process.env)) {
    delete process.env[key];
  }
  Object.assign(process.env, vars);
}

function restoreEnv() {
  for (const key of Object.keys(process.env)) {
    delete process.env[key];
  }
  Object.assign(process.env, originalEnv);
}

test("utils: env throws when variable is not set", () => {
  try {
    setTestEnv({});

    assert.throws(
      () => env("NON_EXISTENT_VAR"),
      { message: "Required environment variable NON_EXISTENT_VAR is not set" },
    );
  } finally {
    restoreEnv();
  }
});

test("utils: env returns string value when variable is set", () => {
  try {
    setTestEnv({ TEST_VAR: "test_value" });
    assert.equal(env("TEST_VAR"), "test_value");
    assert.equal(env("TEST_VAR", "fallback"), "test_value");
  } finally {
    restoreEnv();
  }
});

test("utils: env returns default when variable is not set", () => {
  try {
    setTestEnv({});
    assert.equal(env("MISSING_VAR", "fallback"), "fallback");
    assert.equal(env("MISSING_VAR", 42), 42);
    assert.equal(env("MISSING_VAR", false), false);
  } finally {
    restoreEnv();
  }
});

test("utils: env converts numbers and rejects garbage", () => {
  try {
    setTestEnv({ NUM_VAR: "17", BAD_NUM: "seventeen" });
    assert.equal(env("NUM_VAR", 0), 17);
    assert.throws(
      () => env("BAD_NUM", 0),
      { message: "Environment variable BAD_NUM must be a valid number, got: seventeen" },
    );
  } finally {
    restoreEnv();
  }
});

test("utils: env converts booleans", () => {
  try {
    setTestEnv({ A: "true", B: "0", C: "maybe" });
    assert.equal(env("A", false), true);
    assert.equal(env("B", true), false);
    assert.throws(
      () => env("C", true),
      { message: "Environment variable C must be a valid boolean (true/false/1/0), got: maybe" },
    );
  } finally {
    restoreEnv();
  }
});
