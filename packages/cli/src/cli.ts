#!/usr/bin/env node
/**
 * CLI entry point
 *
 * Usage:
 *   opendata-linker --config ./config.json [--dry-run] [--format json]
 */

import 'dotenv/config';
import { runCli } from './run.js';

async function main(): Promise<void> {
  process.exitCode = await runCli(process.argv.slice(2));
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
