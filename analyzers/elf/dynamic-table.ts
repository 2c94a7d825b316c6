"use strict";

import { readCString } from "../../binary-utils.js";
import { DT_NEEDED, DT_NULL, DT_SONAME, SHT_DYNAMIC } from "./constants.js";
import { getSection, getSectionByIndex } from "./sections.js";
import type { ElfByteSource, ElfDynamicTable, ElfParseResult, ElfSection } from "./types.js";

type DynEntry = { tag: number; value: bigint };

const parseDynamicEntries = (section: ElfSection, issues: string[]): DynEntry[] => {
  const { content, is64, littleEndian } = section;
  const dv = new DataView(content.buffer, content.byteOffset, content.byteLength);
  const entrySize = is64 ? 16 : 8;
  const count = Math.floor(dv.byteLength / entrySize);
  const out: DynEntry[] = [];
  for (let index = 0; index < count; index += 1) {
    const base = index * entrySize;
    const tagBig = is64 ? dv.getBigInt64(base, littleEndian) : BigInt(dv.getInt32(base, littleEndian));
    const tag = Number(tagBig);
    if (!Number.isSafeInteger(tag)) {
      issues.push(`Dynamic entry #${index} has an out-of-range tag; stopping.`);
      break;
    }
    if (tag === DT_NULL) return out;
    const value = is64 ? dv.getBigUint64(base + 8, littleEndian) : BigInt(dv.getUint32(base + 4, littleEndian));
    out.push({ tag, value });
  }
  if (dv.byteLength % entrySize !== 0) issues.push("Dynamic table size is not a multiple of the entry size.");
  issues.push("Dynamic table is not terminated by DT_NULL.");
  return out;
};

const readTableString = (table: DataView | null, value: bigint): string | null => {
  if (!table) return null;
  const offset = Number(value);
  if (!Number.isSafeInteger(offset) || offset < 0 || offset >= table.byteLength) return null;
  return readCString(table, offset, table.byteLength - offset);
};

/**
 * Projects a `.dynamic` table onto its SONAME and NEEDED entries, keeping
 * every NEEDED entry in table order, empty names included.
 */
export function decodeDynamicTable(dynamic: ElfSection, strtab: ElfSection | null): ElfDynamicTable {
  const issues: string[] = [];
  if (dynamic.type !== SHT_DYNAMIC) {
    issues.push(`Section "${dynamic.name}" is not a dynamic table (type ${dynamic.type}).`);
    return { soname: null, needed: [], issues };
  }
  const entries = parseDynamicEntries(dynamic, issues);
  if (!strtab) issues.push("Dynamic table has no string table.");
  const names = strtab ? new DataView(strtab.content.buffer, strtab.content.byteOffset, strtab.content.byteLength) : null;

  const needed: string[] = [];
  let soname: string | null = null;
  for (const entry of entries) {
    if (entry.tag !== DT_NEEDED && entry.tag !== DT_SONAME) continue;
    const label = entry.tag === DT_NEEDED ? "DT_NEEDED" : "DT_SONAME";
    const text = readTableString(names, entry.value);
    if (text == null) {
      issues.push(`${label} offset ${entry.value.toString()} is outside the string table.`);
      continue;
    }
    if (entry.tag === DT_NEEDED) {
      needed.push(text);
    } else if (soname == null && text.length) {
      soname = text;
    }
  }
  return { soname, needed, issues };
}

/**
 * Loads `.dynamic` and its string table (`sh_link`, falling back to
 * `.dynstr`). Returns the section alongside the decoded table so callers can
 * check its type.
 */
export async function readDynamicTable(
  source: ElfByteSource,
  elf: ElfParseResult
): Promise<{ section: ElfSection; table: ElfDynamicTable } | null> {
  const issues: string[] = [];
  const section = await getSection(source, elf, ".dynamic", issues);
  if (!section) return null;
  const strtab =
    (await getSectionByIndex(source, elf, section.link, issues)) ?? (await getSection(source, elf, ".dynstr", issues));
  const table = decodeDynamicTable(section, strtab);
  return { section, table: { ...table, issues: [...issues, ...table.issues] } };
}
