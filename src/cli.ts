#!/usr/bin/env node
/**
 * textbase CLI entry point. See `commands.ts` for the commands.
 */

import { run } from './commands.js';

try {
  process.exitCode = run(process.argv.slice(2));
} catch (err) {
  console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
}
