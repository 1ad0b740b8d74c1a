import { test } from "node:test";
import assert from "node:assert/strict";
import { createFakeExec, fakeOutput } from "../utils/mock.ts";
import { listBlockDevices, parseLsblkOutput } from "./block-devices.ts";

const LSBLK_OUTPUT = [
  "sda     465.8G disk",
  "sr0      1024M rom",
  "loop0     4K loop",
  "nvme0n1 953.9G disk",
  "sdb       1.8T disk",
  "sdc",
  "",
].join("\n");

test("lsblk: keeps whole sd* disks only", () => {
  assert.deepEqual(parseLsblkOutput(LSBLK_OUTPUT), [
    { name: "sda", size: "465.8G", path: "/dev/sda" },
    { name: "sdb", size: "1.8T", path: "/dev/sdb" },
  ]);
});

test("lsblk: empty output lists nothing", () => {
  assert.deepEqual(parseLsblkOutput(""), []);
});

test("lsblk: invokes lsblk without partitions or headings", async () => {
  const { exec, calls } = createFakeExec(() => fakeOutput(LSBLK_OUTPUT));

  const devices = await listBlockDevices(exec);

  assert.deepEqual(calls, [{ command: "lsblk", args: ["-d", "-n", "-o", "NAME,SIZE,TYPE"] }]);
  assert.equal(devices.length, 2);
});

test("lsblk: failing command yields an empty list", async () => {
  const { exec } = createFakeExec(() => fakeOutput("", 32, "lsblk: failed to access sysfs"));
  assert.deepEqual(await listBlockDevices(exec), []);
});

test("lsblk: missing binary yields an empty list", async () => {
  const { exec } = createFakeExec(() => {
    throw new Error("spawn lsblk ENOENT");
  });
  assert.deepEqual(await listBlockDevices(exec, "/sbin/lsblk"), []);
});
