"use strict";

import { SHT_NULL } from "../../analyzers/elf/constants.js";
import { isSymbolDecodeError } from "../../analyzers/elf/symbol-table.js";
import type { ElfDetails, ElfSectionHeader, ElfSymbolTable } from "../../analyzers/elf/types.js";
import { formatElfFlags, formatElfHex, formatElfLabel } from "./value-format.js";

const renderHeader = (details: ElfDetails, out: string[]): void => {
  const { ident, header } = details;
  out.push("ELF file properties:");
  out.push(`  fileClass: ${ident.className}`);
  out.push(`  dataEncoding: ${ident.dataName}`);
  out.push(`  abiVersion: ${ident.abiVersion}`);
  out.push(`  osABI: ${formatElfLabel(ident.osabiName, ident.osabi)}`);
  out.push(`  objectFileType: ${formatElfLabel(header.typeName, header.type)}`);
  out.push(`  machineISA: ${formatElfLabel(header.machineName, header.machine)}`);
  out.push(`  version: ${header.version}`);
  out.push(`  entryPoint: ${formatElfHex(header.entry)}`);
  out.push(`  programHeaderOffset: ${header.phoff.toString()}`);
  out.push(`  sectionHeaderOffset: ${header.shoff.toString()}`);
  out.push(`  sizeOfProgramHeaderEntry: ${header.phentsize}`);
  out.push(`  numberOfProgramHeaderEntries: ${header.phnum}`);
  out.push(`  sizeOfSectionHeaderEntry: ${header.shentsize}`);
  out.push(`  numberOfSectionHeaderEntries: ${header.shnum}`);
};

const renderSection = (section: ElfSectionHeader, out: string[]): void => {
  out.push(`  Section ${section.index} (${section.name || "-"})`);
  out.push(`    type: ${section.typeName ?? formatElfHex(section.type)}`);
  out.push(`    address: ${formatElfHex(section.addr)}`);
  out.push(`    offset: ${formatElfHex(section.offset)}`);
  out.push(`    flags: ${formatElfFlags(section.flags, section.flagNames)}`);
  out.push(`    size: ${section.size.toString()} bytes`);
  out.push(`    entry size: ${section.entsize.toString()} bytes`);
};

const renderSymbolTable = (table: ElfSymbolTable, out: string[]): void => {
  out.push(`  Symbol table ${table.source} contains: ${table.entries.length}`);
  for (const entry of table.entries) {
    if (isSymbolDecodeError(entry)) {
      out.push(`    #${entry.index}\t<malformed: ${entry.reason}>`);
      continue;
    }
    out.push(`    ${entry.bindName}\t${entry.typeName}\t${entry.name}\t(${entry.shndx})`);
  }
};

/** Appends header properties, the section list and every decoded symbol table. */
export function renderElfDetails(details: ElfDetails, out: string[]): void {
  renderHeader(details, out);
  out.push("");
  out.push("Sections:");
  details.sections.filter(section => section.type !== SHT_NULL).forEach(section => renderSection(section, out));
  out.push("");
  out.push("Symbol table sections contents:");
  details.symbolTables.forEach(table => renderSymbolTable(table, out));
}
