"use strict";

import { toSafeIndex } from "../../binary-utils.js";
import { SHT_NOBITS } from "./constants.js";
import type { ElfByteSource, ElfParseResult, ElfSection, ElfSectionHeader } from "./types.js";

export async function sliceView(
  source: ElfByteSource,
  offset: number,
  length: number
): Promise<{ dv: DataView | null; truncated: boolean }> {
  const end = offset + length;
  const bounded = end > source.size ? source.size : end;
  if (offset >= source.size || bounded <= offset) return { dv: null, truncated: true };
  const buffer = await source.slice(offset, bounded).arrayBuffer();
  const truncated = buffer.byteLength !== length;
  return { dv: new DataView(buffer), truncated };
}

const emptySection = (elf: ElfParseResult, header: ElfSectionHeader, truncated: boolean): ElfSection => ({
  index: header.index,
  name: header.name,
  type: header.type,
  typeName: header.typeName,
  link: header.link,
  entsize: header.entsize,
  content: new Uint8Array(0),
  is64: elf.is64,
  littleEndian: elf.littleEndian,
  truncated
});

/**
 * Loads a section's bytes, clamped to the end of the file. Problems are
 * appended to `issues` and never thrown.
 */
export async function loadSection(
  source: ElfByteSource,
  elf: ElfParseResult,
  header: ElfSectionHeader,
  issues: string[]
): Promise<ElfSection> {
  const label = header.name ? `Section "${header.name}"` : `Section #${header.index}`;
  if (header.type === SHT_NOBITS || header.size === 0n) return emptySection(elf, header, false);
  const start = toSafeIndex(header.offset, `${label} offset`, issues);
  const size = toSafeIndex(header.size, `${label} size`, issues);
  if (start == null || size == null) return emptySection(elf, header, true);
  const { dv, truncated } = await sliceView(source, start, size);
  if (!dv) {
    issues.push(`${label} falls outside the file.`);
    return emptySection(elf, header, true);
  }
  if (truncated) issues.push(`${label} is truncated.`);
  return {
    ...emptySection(elf, header, truncated),
    content: new Uint8Array(dv.buffer, dv.byteOffset, dv.byteLength)
  };
}

export async function getSection(
  source: ElfByteSource,
  elf: ElfParseResult,
  name: string,
  issues: string[]
): Promise<ElfSection | null> {
  const header = elf.sections.find(section => section.name === name);
  if (!header) return null;
  return loadSection(source, elf, header, issues);
}

export async function getSectionByIndex(
  source: ElfByteSource,
  elf: ElfParseResult,
  index: number,
  issues: string[]
): Promise<ElfSection | null> {
  const header = elf.sections[index];
  if (!header || index === 0) return null;
  return loadSection(source, elf, header, issues);
}
