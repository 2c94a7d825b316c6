"use strict";

import { readCString, toSafeIndex } from "../../binary-utils.js";
import {
  ELF_CLASS,
  ELF_DATA,
  ELF_MACHINE,
  ELF_MAGIC,
  ELF_OSABI,
  ELF_TYPE,
  SECTION_FLAGS,
  SECTION_TYPES,
  decodeFlags,
  decodeOption
} from "./constants.js";
import { sliceView } from "./sections.js";
import type { ElfByteSource, ElfHeader, ElfIdent, ElfParseResult, ElfSectionHeader } from "./types.js";

const ELF32_HEADER_SIZE = 0x34;
const ELF64_HEADER_SIZE = 0x40;
const ELF32_SECTION_HEADER_SIZE = 0x28;
const ELF64_SECTION_HEADER_SIZE = 0x40;

const bigFrom32 = (value: number): bigint => BigInt(value >>> 0);

function parseIdent(dv: DataView, issues: string[]): ElfIdent {
  const cls = dv.getUint8(4);
  const data = dv.getUint8(5);
  const version = dv.getUint8(6);
  const osabi = dv.getUint8(7);
  const abiVersion = dv.getUint8(8);
  const className = decodeOption(cls, ELF_CLASS) ?? "Unknown";
  const dataName = decodeOption(data, ELF_DATA) ?? "Unknown";
  if (version !== 1) issues.push(`Unexpected ELF version ${version}.`);
  return {
    classByte: cls,
    className,
    dataByte: data,
    dataName,
    osabi,
    osabiName: decodeOption(osabi, ELF_OSABI),
    abiVersion
  };
}

function parseElfHeader(dv: DataView, is64: boolean, little: boolean, issues: string[]): ElfHeader {
  const u16 = (offset: number): number => dv.getUint16(offset, little);
  const u32 = (offset: number): number => dv.getUint32(offset, little);
  const u64 = (offset: number): bigint => dv.getBigUint64(offset, little);
  const type = u16(0x10);
  const machine = u16(0x12);
  const version = u32(0x14);
  if (version !== 1) issues.push(`Unexpected ELF header version ${version}.`);
  return {
    type,
    typeName: decodeOption(type, ELF_TYPE),
    machine,
    machineName: decodeOption(machine, ELF_MACHINE),
    version,
    entry: is64 ? u64(0x18) : bigFrom32(u32(0x18)),
    phoff: is64 ? u64(0x20) : bigFrom32(u32(0x1c)),
    shoff: is64 ? u64(0x28) : bigFrom32(u32(0x20)),
    flags: u32(is64 ? 0x30 : 0x24),
    ehsize: u16(is64 ? 0x34 : 0x28),
    phentsize: u16(is64 ? 0x36 : 0x2a),
    phnum: u16(is64 ? 0x38 : 0x2c),
    shentsize: u16(is64 ? 0x3a : 0x2e),
    shnum: u16(is64 ? 0x3c : 0x30),
    shstrndx: u16(is64 ? 0x3e : 0x32)
  };
}

function parseSectionHeader(
  view: DataView,
  is64: boolean,
  little: boolean
): Omit<ElfSectionHeader, "index" | "name"> {
  const u32 = (offset: number): number => view.getUint32(offset, little);
  const u64 = (offset: number): bigint => view.getBigUint64(offset, little);
  if (is64) {
    const type = u32(4);
    const flags = u64(8);
    return {
      nameOff: u32(0),
      type,
      typeName: decodeOption(type, SECTION_TYPES),
      flags,
      flagNames: decodeFlags(Number(flags & 0xffffffffn), SECTION_FLAGS),
      addr: u64(16),
      offset: u64(24),
      size: u64(32),
      link: u32(40),
      info: u32(44),
      addralign: u64(48),
      entsize: u64(56)
    };
  }
  const type = u32(4);
  const flags = bigFrom32(u32(8));
  return {
    nameOff: u32(0),
    type,
    typeName: decodeOption(type, SECTION_TYPES),
    flags,
    flagNames: decodeFlags(Number(flags), SECTION_FLAGS),
    addr: bigFrom32(u32(12)),
    offset: bigFrom32(u32(16)),
    size: bigFrom32(u32(20)),
    link: u32(24),
    info: u32(28),
    addralign: bigFrom32(u32(32)),
    entsize: bigFrom32(u32(36))
  };
}

function readStringFromTable(tableDv: DataView | null, offset: number): string {
  if (!tableDv || offset >= tableDv.byteLength) return "";
  return readCString(tableDv, offset, tableDv.byteLength - offset);
}

async function loadSectionNameTable(
  source: ElfByteSource,
  sections: Array<Omit<ElfSectionHeader, "name">>,
  header: ElfHeader,
  issues: string[]
): Promise<DataView | null> {
  if (!sections.length || header.shstrndx === 0) return null;
  const shstr = sections[header.shstrndx];
  if (!shstr) {
    issues.push(`Section name table index ${header.shstrndx} is outside the section header table.`);
    return null;
  }
  const off = toSafeIndex(shstr.offset, "Section name table offset", issues);
  const size = toSafeIndex(shstr.size, "Section name table size", issues);
  if (off == null || size == null || size === 0) return null;
  const { dv, truncated } = await sliceView(source, off, size);
  if (!dv) {
    issues.push("Section name table falls outside the file.");
    return null;
  }
  if (truncated) issues.push("Section name table is truncated.");
  return dv;
}

async function parseSectionHeaders(
  source: ElfByteSource,
  header: ElfHeader,
  is64: boolean,
  little: boolean,
  issues: string[]
): Promise<ElfSectionHeader[]> {
  if (!header.shoff || !header.shnum) return [];
  const minimumEntrySize = is64 ? ELF64_SECTION_HEADER_SIZE : ELF32_SECTION_HEADER_SIZE;
  if (header.shentsize < minimumEntrySize) {
    issues.push(`Section header entry size ${header.shentsize} is smaller than ${minimumEntrySize} bytes.`);
    return [];
  }
  const tableOffset = toSafeIndex(header.shoff, "Section header offset", issues);
  if (tableOffset == null) return [];
  const { dv, truncated } = await sliceView(source, tableOffset, header.shentsize * header.shnum);
  if (!dv) {
    issues.push("Section header table falls outside the file.");
    return [];
  }
  if (truncated) issues.push("Section header table is truncated.");
  const usableCount = Math.min(header.shnum, Math.floor(dv.byteLength / header.shentsize));
  const headers: Array<Omit<ElfSectionHeader, "name">> = [];
  for (let index = 0; index < usableCount; index += 1) {
    const view = new DataView(dv.buffer, index * header.shentsize, header.shentsize);
    headers.push({ ...parseSectionHeader(view, is64, little), index });
  }
  const namesTable = await loadSectionNameTable(source, headers, header, issues);
  return headers.map(section => ({ ...section, name: readStringFromTable(namesTable, section.nameOff) }));
}

/**
 * Decodes the ELF identification, file header and section header table.
 * Returns null when the source does not start with an ELF header.
 */
export async function parseElf(source: ElfByteSource): Promise<ElfParseResult | null> {
  const buffer = await source.slice(0, Math.min(source.size, ELF64_HEADER_SIZE)).arrayBuffer();
  const dv = new DataView(buffer);
  if (dv.byteLength < ELF32_HEADER_SIZE || dv.getUint32(0, false) !== ELF_MAGIC) return null;
  const issues: string[] = [];
  const ident = parseIdent(dv, issues);
  const is64 = ident.classByte === 2;
  const little = ident.dataByte === 1;
  if (is64 && dv.byteLength < ELF64_HEADER_SIZE) return null;
  if (ident.classByte !== 1 && !is64) issues.push(`Unknown ELF class ${ident.classByte}; assuming ELF32.`);
  if (ident.dataByte !== 1 && ident.dataByte !== 2) {
    issues.push(`Unknown ELF data encoding ${ident.dataByte}; assuming big endian.`);
  }
  const header = parseElfHeader(dv, is64, little, issues);
  const sections = await parseSectionHeaders(source, header, is64, little, issues);
  return {
    ident,
    header,
    sections,
    issues,
    is64,
    littleEndian: little,
    fileSize: source.size
  };
}
