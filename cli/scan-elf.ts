#!/usr/bin/env node
"use strict";

import { parseCliArgs } from "./args.js";
import { ConsoleLogger } from "./logger.js";
import { runScan } from "./run.js";

const main = async (argv: string[]): Promise<void> => {
  const options = parseCliArgs(argv);
  const logger = new ConsoleLogger({ verbose: options.verbose, color: options.color });
  await runScan(options, logger, text => console.log(text));
};

main(process.argv.slice(2)).catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
});
