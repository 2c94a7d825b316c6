"use strict";

import { compareByteOrder } from "../../binary-utils.js";
import { SHT_DYNAMIC } from "./constants.js";
import type { ElfDynamicMetadata, ElfDynamicTable, ElfSection, ExtractResult } from "./types.js";

export const UNKNOWN_SONAME = "unknown";

/**
 * Resolves SONAME and NEEDED from a decoded dynamic table. An object without
 * its own SONAME is named after the scanned file. NEEDED keeps duplicates;
 * the sort is stable so equal names stay in table order.
 */
export function resolveDynamicMetadata(
  section: ElfSection | null,
  table: ElfDynamicTable | null,
  fallbackName: string
): ExtractResult<ElfDynamicMetadata> {
  if (!section) return { status: "not-applicable", reason: "No .dynamic section." };
  if (section.type !== SHT_DYNAMIC) {
    return { status: "not-applicable", reason: `Section "${section.name}" is not SHT_DYNAMIC (type ${section.type}).` };
  }
  if (!table) return { status: "not-applicable", reason: "Dynamic table could not be decoded." };
  return {
    status: "ok",
    value: {
      soname: table.soname ? table.soname : fallbackName,
      needed: [...table.needed].sort(compareByteOrder)
    }
  };
}
