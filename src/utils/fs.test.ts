/**
 * Filesystem helper tests
 */

import { test } from "node:test";
import assert from "node:assert/strict";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { fileExists, isNotFound } from "./fs.ts";

test("fs: isNotFound only matches ENOENT", () => {
  const missing = Object.assign(new Error("missing"), { code: "ENOENT" });
  const denied = Object.assign(new Error("denied"), { code: "EACCES" });
  assert.equal(isNotFound(missing), true);
  assert.equal(isNotFound(denied), false);
  assert.equal(isNotFound("ENOENT"), false);
});

test("fs: fileExists separates missing paths from failed lookups", async () => {
  const dir = await mkdtemp(join(tmpdir(), "ssd-test-fs-"));
  try {
    const file = join(dir, "present.csv");
    await writeFile(file, "");

    assert.equal(await fileExists(file), true);
    assert.equal(await fileExists(join(dir, "absent.csv")), false);
    await assert.rejects(fileExists(join(file, "nested.csv")), { code: "ENOTDIR" });
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
});
