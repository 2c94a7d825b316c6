"use strict";

import assert from "node:assert/strict";
import { test } from "node:test";
import { decodeDynamicTable, readDynamicTable } from "../../analyzers/elf/dynamic-table.js";
import { parseElf } from "../../analyzers/elf/index.js";
import { createSharedObjectFile } from "../fixtures/elf-shared-object-file.js";
import { expectDefined } from "../helpers/expect-defined.js";
import { makeSection, makeStringTable } from "../helpers/elf-section.js";

const encodeDynamic64 = (entries: Array<[number, number]>): Uint8Array => {
  const bytes = new Uint8Array(entries.length * 16);
  const dv = new DataView(bytes.buffer);
  entries.forEach(([tag, value], index) => {
    dv.setBigInt64(index * 16, BigInt(tag), true);
    dv.setBigUint64(index * 16 + 8, BigInt(value), true);
  });
  return bytes;
};

const DYNSTR = makeStringTable("\0libc.so.6\0libm.so.6\0libfoo.so.1\0");
const LIBC = 1;
const LIBM = 11;
const LIBFOO = 21;

const dynamicSection = (entries: Array<[number, number]>) =>
  makeSection({ name: ".dynamic", type: 6, content: encodeDynamic64(entries) });

void test("decodeDynamicTable keeps NEEDED in table order and reads SONAME", () => {
  const table = decodeDynamicTable(
    dynamicSection([
      [1, LIBM],
      [14, LIBFOO],
      [1, LIBC],
      [1, LIBM],
      [0, 0]
    ]),
    DYNSTR
  );
  assert.deepEqual(table, { soname: "libfoo.so.1", needed: ["libm.so.6", "libc.so.6", "libm.so.6"], issues: [] });
});

void test("decodeDynamicTable stops at DT_NULL", () => {
  const table = decodeDynamicTable(
    dynamicSection([
      [1, LIBC],
      [0, 0],
      [1, LIBM]
    ]),
    DYNSTR
  );
  assert.deepEqual(table.needed, ["libc.so.6"]);
  assert.deepEqual(table.issues, []);
});

void test("decodeDynamicTable keeps empty NEEDED names", () => {
  const table = decodeDynamicTable(
    dynamicSection([
      [1, 0],
      [1, LIBC],
      [1, 0],
      [0, 0]
    ]),
    DYNSTR
  );
  assert.deepEqual(table.needed, ["", "libc.so.6", ""]);
  assert.deepEqual(table.issues, []);
});

void test("decodeDynamicTable reports a missing terminator and bad string offsets", () => {
  const table = decodeDynamicTable(
    dynamicSection([
      [1, LIBC],
      [1, 500]
    ]),
    DYNSTR
  );
  assert.deepEqual(table.needed, ["libc.so.6"]);
  assert.deepEqual(table.issues, [
    "Dynamic table is not terminated by DT_NULL.",
    "DT_NEEDED offset 500 is outside the string table."
  ]);
});

void test("decodeDynamicTable treats an empty SONAME as absent and keeps the first one", () => {
  const empty = decodeDynamicTable(dynamicSection([[14, 0], [0, 0]]), DYNSTR);
  assert.equal(empty.soname, null);
  const first = decodeDynamicTable(dynamicSection([[14, 0], [14, LIBM], [14, LIBFOO], [0, 0]]), DYNSTR);
  assert.equal(first.soname, "libm.so.6");
});

void test("decodeDynamicTable without a string table yields no names", () => {
  const table = decodeDynamicTable(dynamicSection([[1, LIBC], [0, 0]]), null);
  assert.deepEqual(table.needed, []);
  assert.deepEqual(table.issues, ["Dynamic table has no string table.", "DT_NEEDED offset 1 is outside the string table."]);
});

void test("decodeDynamicTable rejects sections that are not SHT_DYNAMIC", () => {
  const table = decodeDynamicTable(makeSection({ name: ".dynamic", type: 1 }), DYNSTR);
  assert.deepEqual(table, {
    soname: null,
    needed: [],
    issues: ['Section ".dynamic" is not a dynamic table (type 1).']
  });
});

void test("readDynamicTable decodes .dynamic through its linked string table", async () => {
  const file = createSharedObjectFile({ soname: "libdemo.so.3", needed: ["libz.so.1", "libc.so.6"] });
  const elf = expectDefined(await parseElf(file));
  const dynamic = expectDefined(await readDynamicTable(file, elf));
  assert.equal(dynamic.section.name, ".dynamic");
  assert.deepEqual(dynamic.table, { soname: "libdemo.so.3", needed: ["libz.so.1", "libc.so.6"], issues: [] });
});
