#!/usr/bin/env node
/**
 * @fileoverview Action Engine CLI
 *
 * Commands:
 *   action-engine stats                      - Show learner statistics
 *   action-engine prune [--days N]           - Delete records past the retention window
 *   action-engine suggest <situation> ...    - Run a decision
 *   action-engine record <situation> <action> - Learn from an outcome
 *   action-engine workflow                   - Suggest the usual next action
 *   action-engine reset-values               - Clear the value table
 *
 * @packageDocumentation
 */

import { runCli } from './run.js';

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  });
