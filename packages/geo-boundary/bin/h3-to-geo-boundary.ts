#!/usr/bin/env tsx
/**
 * h3-to-geo-boundary CLI Entry Point
 *
 * stdin/stdout filter that converts H3 indexes to cell boundaries.
 *
 *   usage: h3-to-geo-boundary [options] [outputMode [kmlName [kmlDesc]]]
 *
 * @module h3-to-geo-boundary-cli
 */

import { guardOutputStream, runCli } from '../src/cli/program.js';
import { EXIT_CODES } from '../src/core/constants.js';

async function main(): Promise<void> {
  const finish = guardOutputStream(process.stdout, process.stderr, (exitCode) => {
    process.exitCode = exitCode;
  });

  const exitCode = await runCli(process.argv.slice(2), {
    stdin: process.stdin,
    stdout: process.stdout,
    stderr: process.stderr,
  });
  process.exitCode = finish(exitCode);
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exitCode = EXIT_CODES.ERRORS;
});
