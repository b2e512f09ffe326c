#!/usr/bin/env node
/**
 * declmap CLI - map declared types to their defining files
 */

import { runCli } from "./cli.js";

const args = process.argv.slice(2);

runCli(args)
  .then((exitCode) => {
    process.exit(exitCode);
  })
  .catch((error: unknown) => {
    console.error("Fatal error:", error);
    process.exit(1);
  });
