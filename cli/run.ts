"use strict";

import { renderAbiJson } from "../renderers/elf/abi-json.js";
import { renderAbiReport } from "../renderers/elf/abi-report.js";
import { renderElfDetails } from "../renderers/elf/details.js";
import { collectInputFiles } from "../scan/file-walker.js";
import type { ScanOutcome } from "../scan/scan-files.js";
import { scanElfFiles } from "../scan/scan-files.js";
import type { CliOptions } from "./args.js";
import type { Logger } from "./logger.js";

export function renderOutcomes(outcomes: ScanOutcome[], options: Pick<CliOptions, "format" | "details">): string {
  const records = outcomes.flatMap(outcome => (outcome.kind === "elf" ? [outcome.metadata] : []));
  if (options.format === "json") return renderAbiJson(records);
  const out: string[] = [];
  for (const meta of records) {
    renderAbiReport(meta, out);
    if (options.details && meta.details) {
      out.push("");
      renderElfDetails(meta.details, out);
    }
  }
  return out.join("\n");
}

export async function runScan(options: CliOptions, logger: Logger, print: (text: string) => void): Promise<void> {
  const files = await collectInputFiles(options.paths, logger);
  logger.debug(`Scanning ${files.length} file(s) with ${options.jobs} job(s)`);
  const outcomes = await scanElfFiles(files, { concurrency: options.jobs, details: options.details, logger });
  const text = renderOutcomes(outcomes, options);
  if (text.length) print(text);
}
