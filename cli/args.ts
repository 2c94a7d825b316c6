"use strict";

import argparse from "argparse";
import type { ArgumentParser } from "argparse";
import { DEFAULT_CONCURRENCY } from "../scan/scan-files.js";

export type OutputFormat = "text" | "json";

export interface CliOptions {
  paths: string[];
  format: OutputFormat;
  jobs: number;
  details: boolean;
  verbose: boolean;
  color: boolean;
}

const isStringArray = (value: unknown): value is string[] =>
  Array.isArray(value) && value.every(item => typeof item === "string");

export const createArgumentParser = (): ArgumentParser => {
  const parser = new argparse.ArgumentParser({
    prog: "scanelf",
    description: "Print build-id, SONAME dependencies and ABI exports/imports of ELF shared objects."
  });
  parser.add_argument("paths", {
    nargs: "+",
    metavar: "path",
    help: "file or directory to scan recursively for ELF files"
  });
  parser.add_argument("-f", "--format", { choices: ["text", "json"], default: "text", help: "report format" });
  parser.add_argument("-j", "--jobs", {
    type: "int",
    default: DEFAULT_CONCURRENCY,
    help: "files to process in parallel"
  });
  parser.add_argument("-d", "--details", {
    action: "store_true",
    help: "also dump header properties, sections and symbol tables"
  });
  parser.add_argument("-v", "--verbose", { action: "store_true", help: "log per-file diagnostics to stderr" });
  parser.add_argument("--no-color", { action: "store_true", dest: "no_color", help: "disable colored diagnostics" });
  return parser;
};

/** Parses argv (without the node and script entries). argparse exits on usage errors. */
export function parseCliArgs(argv: string[]): CliOptions {
  const parsed: unknown = createArgumentParser().parse_args(argv);
  const raw = new Map<string, unknown>(typeof parsed === "object" && parsed !== null ? Object.entries(parsed) : []);
  const paths = raw.get("paths");
  const format = raw.get("format");
  const jobs = raw.get("jobs");
  return {
    paths: isStringArray(paths) ? paths : [],
    format: format === "json" ? "json" : "text",
    jobs: typeof jobs === "number" && jobs > 0 ? jobs : DEFAULT_CONCURRENCY,
    details: raw.get("details") === true,
    verbose: raw.get("verbose") === true,
    color: raw.get("no_color") !== true
  };
}
