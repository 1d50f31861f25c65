#!/usr/bin/env node

import "dotenv/config";

import { runCli } from "./cli.js";
import { formatError } from "./errors.js";

async function main(): Promise<void> {
  process.exitCode = await runCli(process.argv.slice(2));
}

main().catch((error) => {
  console.error(`Error: ${formatError(error)}`);
  process.exit(1);
});
