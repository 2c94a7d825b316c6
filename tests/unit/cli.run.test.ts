"use strict";

import assert from "node:assert/strict";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { after, before, test } from "node:test";
import type { CliOptions } from "../../cli/args.js";
import { NullLogger } from "../../cli/logger.js";
import { renderOutcomes, runScan } from "../../cli/run.js";
import type { ScanOutcome } from "../../scan/scan-files.js";
import { createSharedObjectFile } from "../fixtures/elf-shared-object-file.js";

const BUILD_ID = "000102030405060708090a0b0c0d0e0f10111213";

let root = "";

before(async () => {
  root = await mkdtemp(join(tmpdir(), "scanelf-run-"));
  const library = createSharedObjectFile({
    soname: "libdemo.so.1",
    needed: ["libc.so.6"],
    dynsym: [
      { name: "puts", bind: 1, type: 2, shndx: 0 },
      { name: "demo_init", bind: 1, type: 2, shndx: 9 }
    ]
  });
  await writeFile(join(root, "libdemo.so"), library.bytes);
  await writeFile(join(root, "notes.txt"), "release notes, not an object file");
});

after(async () => {
  await rm(root, { recursive: true, force: true });
});

const options = (overrides: Partial<CliOptions> = {}): CliOptions => ({
  paths: [root],
  format: "text",
  jobs: 2,
  details: false,
  verbose: false,
  color: false,
  ...overrides
});

void test("runScan prints one text block per ELF file", async () => {
  const printed: string[] = [];
  await runScan(options(), new NullLogger(), text => printed.push(text));
  assert.deepEqual(printed, [
    [
      "",
      "libdemo.so:",
      "Build_ID:",
      `\t${BUILD_ID}`,
      "NEEDED_libs:",
      "\tlibc.so.6",
      "ABI_exports:",
      "\tdemo_init",
      "ABI_imports:",
      "\tputs"
    ].join("\n")
  ]);
});

void test("runScan prints JSON records on request", async () => {
  const printed: string[] = [];
  await runScan(options({ format: "json" }), new NullLogger(), text => printed.push(text));
  assert.equal(printed.length, 1);
  assert.deepEqual(JSON.parse(printed[0] ?? ""), [
    {
      fileName: "libdemo.so",
      buildId: BUILD_ID,
      soname: "libdemo.so.1",
      needed: ["libc.so.6"],
      exported: ["demo_init"],
      imported: ["puts"]
    }
  ]);
});

void test("runScan appends the detail dump after each report", async () => {
  const printed: string[] = [];
  await runScan(options({ details: true }), new NullLogger(), text => printed.push(text));
  const lines = (printed[0] ?? "").split("\n");
  assert.equal(lines[9], "\tputs");
  assert.equal(lines[10], "");
  assert.equal(lines[11], "ELF file properties:");
  assert.equal(lines[lines.length - 1], "    GLOBAL\tFUNC\tdemo_init\t(9)");
});

void test("runScan prints nothing when no ELF files are found", async () => {
  const printed: string[] = [];
  await runScan(options({ paths: [join(root, "notes.txt")] }), new NullLogger(), text => printed.push(text));
  assert.deepEqual(printed, []);
});

void test("renderOutcomes ignores non-ELF and failed outcomes", () => {
  const outcomes: ScanOutcome[] = [
    { kind: "not-elf", path: "/tmp/readme" },
    { kind: "error", path: "/tmp/gone", message: "ENOENT" }
  ];
  assert.equal(renderOutcomes(outcomes, { format: "text", details: false }), "");
  assert.equal(renderOutcomes(outcomes, { format: "json", details: false }), "[]");
});
