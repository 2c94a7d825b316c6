"use strict";

import { readCString } from "../../binary-utils.js";
import {
  SHT_DYNSYM,
  SHT_SYMTAB,
  SYMBOL_BINDINGS,
  SYMBOL_TYPES,
  SYMBOL_VISIBILITY,
  decodeOption
} from "./constants.js";
import { getSection, getSectionByIndex } from "./sections.js";
import type {
  ElfByteSource,
  ElfParseResult,
  ElfSection,
  ElfSymbol,
  ElfSymbolDecodeError,
  ElfSymbolEntry,
  ElfSymbolTable
} from "./types.js";

const ELF32_SYM_SIZE = 16;
const ELF64_SYM_SIZE = 24;

export const isSymbolDecodeError = (entry: ElfSymbolEntry): entry is ElfSymbolDecodeError =>
  !("name" in entry);

const readSymbol = (
  symtab: DataView,
  base: number,
  index: number,
  name: string,
  is64: boolean,
  littleEndian: boolean
): ElfSymbol => {
  let value: bigint;
  let size: bigint;
  let info: number;
  let other: number;
  let shndx: number;
  if (is64) {
    info = symtab.getUint8(base + 4);
    other = symtab.getUint8(base + 5);
    shndx = symtab.getUint16(base + 6, littleEndian);
    value = symtab.getBigUint64(base + 8, littleEndian);
    size = symtab.getBigUint64(base + 16, littleEndian);
  } else {
    value = BigInt(symtab.getUint32(base + 4, littleEndian));
    size = BigInt(symtab.getUint32(base + 8, littleEndian));
    info = symtab.getUint8(base + 12);
    other = symtab.getUint8(base + 13);
    shndx = symtab.getUint16(base + 14, littleEndian);
  }
  const bind = info >> 4;
  const type = info & 0x0f;
  const visibility = other & 0x03;
  return {
    index,
    name,
    value,
    size,
    bind,
    bindName: decodeOption(bind, SYMBOL_BINDINGS) ?? `BIND_${bind}`,
    type,
    typeName: decodeOption(type, SYMBOL_TYPES) ?? `TYPE_${type}`,
    visibility,
    visibilityName: decodeOption(visibility, SYMBOL_VISIBILITY) ?? `VIS_${visibility}`,
    shndx
  };
};

/**
 * Decodes `Elf32_Sym`/`Elf64_Sym` records. A record that cannot be decoded
 * becomes an `ElfSymbolDecodeError` in place, so one bad entry never hides
 * the rest of the table.
 */
export function decodeSymbolTable(symtab: ElfSection, strtab: ElfSection | null): ElfSymbolTable {
  const source = symtab.name || `section #${symtab.index}`;
  const issues: string[] = [];
  if (symtab.type !== SHT_SYMTAB && symtab.type !== SHT_DYNSYM) {
    issues.push(`${source} is not a symbol table (type ${symtab.type}).`);
    return { source, entries: [], issues };
  }
  const entrySize = symtab.is64 ? ELF64_SYM_SIZE : ELF32_SYM_SIZE;
  if (symtab.entsize !== 0n && symtab.entsize !== BigInt(entrySize)) {
    issues.push(`${source} declares entry size ${symtab.entsize.toString()}; using ${entrySize}.`);
  }
  if (!strtab) issues.push(`${source} has no linked string table.`);

  const dv = new DataView(symtab.content.buffer, symtab.content.byteOffset, symtab.content.byteLength);
  const names = strtab
    ? new DataView(strtab.content.buffer, strtab.content.byteOffset, strtab.content.byteLength)
    : null;
  const count = Math.floor(dv.byteLength / entrySize);
  const entries: ElfSymbolEntry[] = [];
  for (let index = 0; index < count; index += 1) {
    const base = index * entrySize;
    const nameOff = dv.getUint32(base, symtab.littleEndian);
    if (nameOff !== 0 && (!names || nameOff >= names.byteLength)) {
      entries.push({ index, reason: `name offset ${nameOff} is outside the string table` });
      continue;
    }
    const name = names ? readCString(names, nameOff, names.byteLength - nameOff) : "";
    entries.push(readSymbol(dv, base, index, name, symtab.is64, symtab.littleEndian));
  }
  const trailing = dv.byteLength % entrySize;
  if (trailing !== 0) {
    entries.push({ index: count, reason: `record is truncated (${trailing} of ${entrySize} bytes)` });
  }
  return { source, entries, issues };
}

/**
 * Loads a symbol table by section name together with the string table its
 * `sh_link` names. Returns null when the section does not exist.
 */
export async function readSymbolTable(
  source: ElfByteSource,
  elf: ElfParseResult,
  name: string
): Promise<ElfSymbolTable | null> {
  const issues: string[] = [];
  const symtab = await getSection(source, elf, name, issues);
  if (!symtab) return null;
  const strtab = await getSectionByIndex(source, elf, symtab.link, issues);
  const table = decodeSymbolTable(symtab, strtab);
  return { ...table, issues: [...issues, ...table.issues] };
}
