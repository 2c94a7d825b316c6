"use strict";

import type { ElfAbiMetadata } from "../../analyzers/elf/types.js";

export interface AbiJsonRecord {
  fileName: string;
  buildId: string;
  soname: string;
  needed: string[];
  exported: string[];
  imported: string[];
}

export const toAbiJsonRecord = (meta: ElfAbiMetadata): AbiJsonRecord => ({
  fileName: meta.fileName,
  buildId: meta.buildId,
  soname: meta.soname,
  needed: meta.needed,
  exported: meta.exported,
  imported: meta.imported
});

export const renderAbiJson = (records: ElfAbiMetadata[]): string =>
  JSON.stringify(records.map(toAbiJsonRecord), null, 2);
