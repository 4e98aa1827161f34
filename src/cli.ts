#!/usr/bin/env node
import { main } from './cli/index.js';

main(process.argv.slice(2)).catch((error: unknown) => {
  console.error('Fatal error:', error instanceof Error ? error.message : error);
  process.exit(1);
});
