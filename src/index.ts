#!/usr/bin/env node
/**
 * Bookshelf DB - Reading Log Database Builder
 * Normalizes the reading log and writes books_database.json for the display page
 */

import { main } from './cli.js';

main(process.argv.slice(2))
  .then(code => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error('\n[Bookshelf] Unexpected failure:', error);
    process.exitCode = 1;
  });
