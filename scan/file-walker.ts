"use strict";

import type { Dirent, Stats } from "node:fs";
import { readdir, stat } from "node:fs/promises";
import { join } from "node:path";
import type { Logger } from "../cli/logger.js";
import { NullLogger } from "../cli/logger.js";

const describeError = (error: unknown): string => (error instanceof Error ? error.message : String(error));

const listDirectory = async (root: string, logger: Logger): Promise<string[]> => {
  const files: string[] = [];
  const queue: string[] = [root];
  for (let cursor = 0; cursor < queue.length; cursor += 1) {
    const dir = queue[cursor];
    if (dir === undefined) break;
    let entries: Dirent[];
    try {
      entries = await readdir(dir, { withFileTypes: true });
    } catch (error) {
      logger.warn(`Cannot read directory ${dir}: ${describeError(error)}`);
      continue;
    }
    entries.sort((left, right) => (left.name < right.name ? -1 : left.name > right.name ? 1 : 0));
    for (const entry of entries) {
      const path = join(dir, entry.name);
      if (entry.isSymbolicLink()) {
        logger.debug(`Skipping symlink ${path}`);
      } else if (entry.isDirectory()) {
        queue.push(path);
      } else if (entry.isFile()) {
        files.push(path);
      }
    }
  }
  return files;
};

/**
 * Expands the command-line paths into regular files. Directories are walked
 * breadth-first; symlinks found inside them are not followed.
 */
export async function collectInputFiles(paths: string[], logger: Logger = new NullLogger()): Promise<string[]> {
  const files: string[] = [];
  for (const path of paths) {
    let info: Stats;
    try {
      info = await stat(path);
    } catch (error) {
      logger.warn(`Cannot access ${path}: ${describeError(error)}`);
      continue;
    }
    if (info.isFile()) files.push(path);
    else if (info.isDirectory()) files.push(...(await listDirectory(path, logger)));
    else logger.debug(`Skipping ${path}: not a regular file or directory`);
  }
  return files;
}
