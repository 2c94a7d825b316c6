"use strict";

import type { ElfOptionEntry } from "./types.js";

export const ELF_MAGIC = 0x7f454c46;

export const SHT_NULL = 0;
export const SHT_SYMTAB = 2;
export const SHT_DYNAMIC = 6;
export const SHT_NOTE = 7;
export const SHT_NOBITS = 8;
export const SHT_DYNSYM = 11;

export const SHN_UNDEF = 0;

export const STB_LOCAL = 0;
export const STB_GLOBAL = 1;
export const STB_WEAK = 2;

export const STT_NOTYPE = 0;
export const STT_OBJECT = 1;
export const STT_FUNC = 2;

export const DT_NULL = 0;
export const DT_NEEDED = 1;
export const DT_SONAME = 14;

export const NT_GNU_BUILD_ID = 3;

export const ELF_CLASS: ElfOptionEntry[] = [
  [1, "ELF32", "32-bit objects with 4-byte addresses."],
  [2, "ELF64", "64-bit objects with 8-byte addresses."]
];

export const ELF_DATA: ElfOptionEntry[] = [
  [1, "Little endian", "Least-significant byte first (LSB)."],
  [2, "Big endian", "Most-significant byte first (MSB)."]
];

export const ELF_OSABI: ElfOptionEntry[] = [
  [0, "System V"],
  [3, "GNU/Linux"],
  [6, "Solaris"],
  [9, "FreeBSD"],
  [12, "OpenBSD"]
];

export const ELF_TYPE: ElfOptionEntry[] = [
  [0, "No type", "Unspecified."],
  [1, "Relocatable", "Object file used for linking."],
  [2, "Executable", "Loadable image with an entry point."],
  [3, "Shared object", "Position-independent library."],
  [4, "Core dump", "Process image captured after a crash."]
];

export const ELF_MACHINE: ElfOptionEntry[] = [
  [0, "No machine"],
  [3, "Intel 80386"],
  [8, "MIPS"],
  [20, "PowerPC"],
  [21, "PowerPC64"],
  [40, "ARM"],
  [62, "x86-64"],
  [183, "AArch64"],
  [243, "RISC-V"],
  [258, "LoongArch"]
];

export const SECTION_TYPES: ElfOptionEntry[] = [
  [0, "SHT_NULL", "Unused."],
  [1, "SHT_PROGBITS", "Program-defined contents."],
  [2, "SHT_SYMTAB", "Linker symbol table."],
  [3, "SHT_STRTAB", "String table."],
  [4, "SHT_RELA", "Relocation entries with addends."],
  [5, "SHT_HASH", "Symbol hash table."],
  [6, "SHT_DYNAMIC", "Dynamic linking information."],
  [7, "SHT_NOTE", "Auxiliary information notes."],
  [8, "SHT_NOBITS", "Zero-initialized data (BSS)."],
  [9, "SHT_REL", "Relocation entries without addends."],
  [11, "SHT_DYNSYM", "Dynamic symbol table."],
  [14, "SHT_INIT_ARRAY", "Constructor pointers."],
  [15, "SHT_FINI_ARRAY", "Destructor pointers."],
  [0x6ffffff6, "GNU_HASH", "GNU-style hash table."],
  [0x6ffffffd, "GNU_VERDEF", "Version definitions."],
  [0x6ffffffe, "GNU_VERNEED", "Version requirements."],
  [0x6fffffff, "GNU_VERSYM", "Version symbol table."]
];

export const SECTION_FLAGS: ElfOptionEntry[] = [
  [0x1, "WRITE", "Section is writable at runtime."],
  [0x2, "ALLOC", "Occupies memory when loaded."],
  [0x4, "EXECINSTR", "Contains executable code."],
  [0x10, "MERGE", "May be merged to eliminate duplicates."],
  [0x20, "STRINGS", "Contains NUL-terminated strings."],
  [0x40, "INFO_LINK", "sh_info field has extra meaning."],
  [0x200, "GROUP", "Section is part of a group."],
  [0x400, "TLS", "Thread-local storage."]
];

export const SYMBOL_BINDINGS: ElfOptionEntry[] = [
  [STB_LOCAL, "LOCAL"],
  [STB_GLOBAL, "GLOBAL"],
  [STB_WEAK, "WEAK"],
  [10, "GNU_UNIQUE"]
];

export const SYMBOL_TYPES: ElfOptionEntry[] = [
  [STT_NOTYPE, "NOTYPE"],
  [STT_OBJECT, "OBJECT"],
  [STT_FUNC, "FUNC"],
  [3, "SECTION"],
  [4, "FILE"],
  [5, "COMMON"],
  [6, "TLS"],
  [10, "GNU_IFUNC"]
];

export const SYMBOL_VISIBILITY: ElfOptionEntry[] = [
  [0, "DEFAULT"],
  [1, "INTERNAL"],
  [2, "HIDDEN"],
  [3, "PROTECTED"]
];

export const decodeOption = (value: number, options: ElfOptionEntry[]): string | null =>
  options.find(entry => entry[0] === value)?.[1] ?? null;

export const decodeFlags = (mask: number, flags: ElfOptionEntry[]): string[] =>
  flags.filter(([bit]) => (mask & bit) !== 0).map(([, name]) => name);
