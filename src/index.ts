#!/usr/bin/env node
/**
 * Main entry point for the pwage CLI.
 */

import { run } from './cli.js';

function main(): void {
  process.exitCode = run(process.argv.slice(2), {
    stdout: process.stdout,
    stderr: process.stderr,
  });
}

main();
