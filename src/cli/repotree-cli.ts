#!/usr/bin/env node
/**
 * repotree CLI
 * Usage: repotree [layout-file] <--clone|--pull|--status|--history [limit]> [--force]
 */

import { runCli } from './program.js';

try {
  process.exitCode = runCli(process.argv.slice(2));
} catch (error) {
  console.error(error);
  process.exitCode = 1;
}
