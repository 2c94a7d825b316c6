"use strict";

import { BUILD_ID_SECTION, decodeBuildId, formatBuildId } from "./build-id.js";
import { readDynamicTable } from "./dynamic-table.js";
import { UNKNOWN_SONAME, resolveDynamicMetadata } from "./dynamic-metadata.js";
import { parseElf } from "./index.js";
import { getSection } from "./sections.js";
import { SYMBOL_TABLE_SECTIONS, classifySymbolTables } from "./symbol-classifier.js";
import { readSymbolTable } from "./symbol-table.js";
import type { ElfAbiMetadata, ElfByteSource, ElfSymbolTable, ExtractResult } from "./types.js";

export interface ExtractOptions {
  /** Attach header, section list and decoded symbol tables to the record. */
  details?: boolean;
}

const describeFailure = (label: string, result: ExtractResult<unknown>): string | null =>
  result.status === "ok" || result.status === "not-applicable" ? null : `${label}: ${result.reason}`;

/**
 * Runs the build-id, dynamic and symbol extractors over one file. Returns
 * null when the source is not an ELF file.
 */
export async function extractElfAbiMetadata(
  source: ElfByteSource,
  fileName: string,
  options: ExtractOptions = {}
): Promise<ElfAbiMetadata | null> {
  const elf = await parseElf(source);
  if (!elf) return null;

  const noteIssues: string[] = [];
  const [noteSection, dynamic, symbolTables] = await Promise.all([
    getSection(source, elf, BUILD_ID_SECTION, noteIssues),
    readDynamicTable(source, elf),
    Promise.all(SYMBOL_TABLE_SECTIONS.map(name => readSymbolTable(source, elf, name)))
  ]);

  const buildId = decodeBuildId(noteSection);
  const linking = resolveDynamicMetadata(dynamic?.section ?? null, dynamic?.table ?? null, fileName);
  const symbols = classifySymbolTables(symbolTables);

  const issues: string[] = [...elf.issues];
  noteIssues.forEach(issue => issues.push(`Build-id: ${issue}`));
  const buildIdFailure = describeFailure("Build-id", buildId);
  if (buildIdFailure) issues.push(buildIdFailure);
  dynamic?.table.issues.forEach(issue => issues.push(`Dynamic: ${issue}`));
  for (const table of symbolTables) {
    if (!table) continue;
    table.issues.forEach(issue => issues.push(`${table.source}: ${issue}`));
  }

  const metadata: ElfAbiMetadata = {
    fileName,
    buildId: formatBuildId(buildId),
    buildIdStatus: buildId.status,
    soname: linking.status === "ok" ? linking.value.soname : UNKNOWN_SONAME,
    needed: linking.status === "ok" ? linking.value.needed : [],
    exported: symbols.exported,
    imported: symbols.imported,
    skippedSymbols: symbols.skipped,
    issues
  };
  if (!options.details) return metadata;
  return {
    ...metadata,
    details: {
      ident: elf.ident,
      header: elf.header,
      sections: elf.sections,
      symbolTables: symbolTables.filter((table): table is ElfSymbolTable => table != null)
    }
  };
}
