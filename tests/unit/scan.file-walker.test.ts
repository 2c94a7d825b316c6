"use strict";

import assert from "node:assert/strict";
import { mkdir, mkdtemp, rm, symlink, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { after, before, test } from "node:test";
import type { Logger } from "../../cli/logger.js";
import { collectInputFiles } from "../../scan/file-walker.js";

let root = "";

before(async () => {
  root = await mkdtemp(join(tmpdir(), "file-walker-"));
  await mkdir(join(root, "a", "nested"), { recursive: true });
  await writeFile(join(root, "b.so"), "b");
  await writeFile(join(root, "c.txt"), "c");
  await writeFile(join(root, "a", "z.so"), "z");
  await writeFile(join(root, "a", "nested", "deep.so"), "deep");
  await symlink(join(root, "b.so"), join(root, "link.so"));
});

after(async () => {
  await rm(root, { recursive: true, force: true });
});

const captureLogger = (lines: string[]): Logger => ({
  debug: message => lines.push(`debug ${message}`),
  info: message => lines.push(`info ${message}`),
  warn: message => lines.push(`warn ${message}`),
  error: message => lines.push(`error ${message}`)
});

void test("collectInputFiles walks directories breadth-first in name order", async () => {
  const files = await collectInputFiles([root]);
  assert.deepEqual(files, [
    join(root, "b.so"),
    join(root, "c.txt"),
    join(root, "a", "z.so"),
    join(root, "a", "nested", "deep.so")
  ]);
});

void test("collectInputFiles skips symlinks inside directories", async () => {
  const lines: string[] = [];
  const files = await collectInputFiles([root], captureLogger(lines));
  assert.equal(files.includes(join(root, "link.so")), false);
  assert.deepEqual(lines, [`debug Skipping symlink ${join(root, "link.so")}`]);
});

void test("collectInputFiles follows symlinks named on the command line", async () => {
  const link = join(root, "link.so");
  assert.deepEqual(await collectInputFiles([link]), [link]);
});

void test("collectInputFiles keeps the order of explicit paths", async () => {
  const files = await collectInputFiles([join(root, "c.txt"), join(root, "a"), join(root, "b.so")]);
  assert.deepEqual(files, [
    join(root, "c.txt"),
    join(root, "a", "z.so"),
    join(root, "a", "nested", "deep.so"),
    join(root, "b.so")
  ]);
});

void test("collectInputFiles warns about missing paths and continues", async () => {
  const lines: string[] = [];
  const missing = join(root, "missing.so");
  const files = await collectInputFiles([missing, join(root, "b.so")], captureLogger(lines));
  assert.deepEqual(files, [join(root, "b.so")]);
  assert.equal(lines.length, 1);
  assert.ok(lines[0]?.startsWith(`warn Cannot access ${missing}: `));
});
