"use strict";

import { openAsBlob } from "node:fs";
import { basename } from "node:path";
import { extractElfAbiMetadata } from "../analyzers/elf/abi-metadata.js";
import type { ElfAbiMetadata, ElfByteSource } from "../analyzers/elf/types.js";
import type { Logger } from "../cli/logger.js";
import { NullLogger } from "../cli/logger.js";

export type ScanOutcome =
  | { kind: "elf"; path: string; metadata: ElfAbiMetadata }
  | { kind: "not-elf"; path: string }
  | { kind: "error"; path: string; message: string };

export interface ScanOptions {
  concurrency?: number;
  details?: boolean;
  logger?: Logger;
  openSource?: (path: string) => Promise<ElfByteSource>;
}

export const DEFAULT_CONCURRENCY = 4;

/** Runs `worker` over `items` with at most `concurrency` in flight; results keep input order. */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let next = 0;
  const lane = async (): Promise<void> => {
    while (next < items.length) {
      const index = next;
      next += 1;
      results[index] = await worker(items[index], index);
    }
  };
  const laneCount = Math.max(1, Math.min(Math.floor(concurrency) || 1, items.length));
  await Promise.all(Array.from({ length: laneCount }, lane));
  return results;
}

async function scanOne(
  path: string,
  details: boolean,
  logger: Logger,
  openSource: (path: string) => Promise<ElfByteSource>
): Promise<ScanOutcome> {
  try {
    const source = await openSource(path);
    const metadata = await extractElfAbiMetadata(source, basename(path), { details });
    if (!metadata) {
      logger.info(`Not an ELF file: ${path}`);
      return { kind: "not-elf", path };
    }
    metadata.issues.forEach(issue => logger.debug(`${path}: ${issue}`));
    metadata.skippedSymbols.forEach(skipped =>
      logger.warn(`${path}: ${skipped.source} symbol #${skipped.index} skipped: ${skipped.reason}`)
    );
    return { kind: "elf", path, metadata };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error(`${path}: ${message}`);
    return { kind: "error", path, message };
  }
}

/**
 * Extracts ABI metadata from every path. Files are independent, so they are
 * processed in parallel; the returned outcomes follow the order of `paths`.
 */
export async function scanElfFiles(paths: readonly string[], options: ScanOptions = {}): Promise<ScanOutcome[]> {
  const logger = options.logger ?? new NullLogger();
  const openSource = options.openSource ?? (path => openAsBlob(path));
  const details = options.details ?? false;
  return mapWithConcurrency(paths, options.concurrency ?? DEFAULT_CONCURRENCY, path =>
    scanOne(path, details, logger, openSource)
  );
}
