"use strict";

import type { ElfAbiMetadata } from "../../analyzers/elf/types.js";

const pushList = (out: string[], title: string, values: string[]): void => {
  out.push(`${title}:`);
  values.forEach(value => out.push(`\t${value}`));
};

/** Appends the per-file ABI block: build-id, dependencies, exports, imports. */
export function renderAbiReport(meta: ElfAbiMetadata, out: string[]): void {
  out.push("");
  out.push(`${meta.fileName}:`);
  pushList(out, "Build_ID", [meta.buildId]);
  pushList(out, "NEEDED_libs", meta.needed);
  pushList(out, "ABI_exports", meta.exported);
  pushList(out, "ABI_imports", meta.imported);
}
