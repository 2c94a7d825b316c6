"use strict";

export type ElfOptionEntry = [number, string, string?];

/**
 * Anything the container reader can slice lazily: a `Blob` from
 * `fs.openAsBlob`, a browser `File`, or an in-memory test double.
 */
export interface ElfByteSource {
  readonly size: number;
  slice(start?: number, end?: number): { arrayBuffer(): Promise<ArrayBuffer> };
}

export interface ElfIdent {
  classByte: number;
  className: string;
  dataByte: number;
  dataName: string;
  osabi: number;
  osabiName: string | null;
  abiVersion: number;
}

export interface ElfHeader {
  type: number;
  typeName: string | null;
  machine: number;
  machineName: string | null;
  version: number;
  entry: bigint;
  phoff: bigint;
  shoff: bigint;
  flags: number;
  ehsize: number;
  phentsize: number;
  phnum: number;
  shentsize: number;
  shnum: number;
  shstrndx: number;
}

export interface ElfSectionHeader {
  nameOff: number;
  type: number;
  typeName: string | null;
  flags: bigint;
  flagNames: string[];
  addr: bigint;
  offset: bigint;
  size: bigint;
  link: number;
  info: number;
  addralign: bigint;
  entsize: bigint;
  index: number;
  name: string;
}

export interface ElfParseResult {
  ident: ElfIdent;
  header: ElfHeader;
  sections: ElfSectionHeader[];
  issues: string[];
  is64: boolean;
  littleEndian: boolean;
  fileSize: number;
}

/** Section header plus its bytes, as handed to the extractors. */
export interface ElfSection {
  index: number;
  name: string;
  type: number;
  typeName: string | null;
  link: number;
  entsize: bigint;
  content: Uint8Array;
  is64: boolean;
  littleEndian: boolean;
  /** Set when the header claims more bytes than the file holds. */
  truncated: boolean;
}

export interface ElfSymbol {
  index: number;
  name: string;
  value: bigint;
  size: bigint;
  bind: number;
  bindName: string;
  type: number;
  typeName: string;
  visibility: number;
  visibilityName: string;
  shndx: number;
}

export interface ElfSymbolDecodeError {
  index: number;
  reason: string;
}

export type ElfSymbolEntry = ElfSymbol | ElfSymbolDecodeError;

export interface ElfSymbolTable {
  source: string;
  entries: ElfSymbolEntry[];
  issues: string[];
}

export interface ElfDynamicTable {
  soname: string | null;
  needed: string[];
  issues: string[];
}

export type ExtractFailure = "not-applicable" | "truncated" | "out-of-bounds";

export type ExtractResult<T> =
  | { status: "ok"; value: T }
  | { status: ExtractFailure; reason: string };

export type ExtractStatus = ExtractResult<unknown>["status"];

export interface ElfDynamicMetadata {
  soname: string;
  needed: string[];
}

export interface ClassifiedSymbols {
  exported: string[];
  imported: string[];
}

export interface SkippedSymbol {
  source: string;
  index: number;
  reason: string;
}

export interface ClassifiedSymbolTable extends ClassifiedSymbols {
  source: string;
  skipped: SkippedSymbol[];
}

export interface ClassifiedSymbolTables extends ClassifiedSymbols {
  tables: ClassifiedSymbolTable[];
  skipped: SkippedSymbol[];
}

export interface ElfDetails {
  ident: ElfIdent;
  header: ElfHeader;
  sections: ElfSectionHeader[];
  symbolTables: ElfSymbolTable[];
}

export interface ElfAbiMetadata {
  fileName: string;
  /** Lowercase hex, or "N/A" when no usable build-id note was found. */
  buildId: string;
  buildIdStatus: ExtractStatus;
  soname: string;
  needed: string[];
  exported: string[];
  imported: string[];
  skippedSymbols: SkippedSymbol[];
  issues: string[];
  details?: ElfDetails;
}
