"use strict";

import { compareByteOrder } from "../../binary-utils.js";
import { SHN_UNDEF, STB_GLOBAL, STB_WEAK, STT_FUNC, STT_OBJECT } from "./constants.js";
import { isSymbolDecodeError } from "./symbol-table.js";
import type {
  ClassifiedSymbolTable,
  ClassifiedSymbolTables,
  ClassifiedSymbols,
  ElfSymbol,
  ElfSymbolTable,
  SkippedSymbol
} from "./types.js";

type SymbolClassInput = Pick<ElfSymbol, "name" | "bind" | "type" | "shndx">;

export const SYMBOL_TABLE_SECTIONS = [".symtab", ".dynsym"] as const;

// Only strong definitions count as exports; weak ones stay out of both sets.
export const isExportedSymbol = (sym: SymbolClassInput): boolean =>
  sym.shndx !== SHN_UNDEF && sym.bind === STB_GLOBAL && (sym.type === STT_FUNC || sym.type === STT_OBJECT);

export const isImportedSymbol = (sym: SymbolClassInput): boolean =>
  sym.shndx === SHN_UNDEF && (sym.bind === STB_GLOBAL || sym.bind === STB_WEAK) && sym.type === STT_FUNC;

const toSorted = (names: Set<string>): string[] => [...names].sort(compareByteOrder);

const collect = (symbols: Iterable<SymbolClassInput>, exported: Set<string>, imported: Set<string>): void => {
  for (const sym of symbols) {
    if (isExportedSymbol(sym)) exported.add(sym.name);
    else if (isImportedSymbol(sym)) imported.add(sym.name);
  }
};

export function classifySymbols(symbols: Iterable<SymbolClassInput>): ClassifiedSymbols {
  const exported = new Set<string>();
  const imported = new Set<string>();
  collect(symbols, exported, imported);
  return { exported: toSorted(exported), imported: toSorted(imported) };
}

/**
 * Classifies every table and unions the results. Decode errors are carried
 * through as `skipped` entries instead of aborting the table.
 */
export function classifySymbolTables(tables: Iterable<ElfSymbolTable | null>): ClassifiedSymbolTables {
  const exported = new Set<string>();
  const imported = new Set<string>();
  const perTable: ClassifiedSymbolTable[] = [];
  const skipped: SkippedSymbol[] = [];
  for (const table of tables) {
    if (!table) continue;
    const symbols: ElfSymbol[] = [];
    const tableSkipped: SkippedSymbol[] = [];
    for (const entry of table.entries) {
      if (isSymbolDecodeError(entry)) {
        tableSkipped.push({ source: table.source, index: entry.index, reason: entry.reason });
      } else {
        symbols.push(entry);
      }
    }
    const classified = classifySymbols(symbols);
    collect(symbols, exported, imported);
    perTable.push({ source: table.source, ...classified, skipped: tableSkipped });
    skipped.push(...tableSkipped);
  }
  return { exported: toSorted(exported), imported: toSorted(imported), tables: perTable, skipped };
}
