#!/usr/bin/env node
/**
 * pandoc-table-attr
 *
 * Pandoc JSON filter: `pandoc --filter pandoc-table-attr input.md`
 */

import { text } from 'node:stream/consumers';
import { run } from './run.js';

run({
  argv: process.argv.slice(2),
  env: process.env,
  readInput: () => text(process.stdin),
  writeOutput: output => {
    process.stdout.write(output);
  },
}).then(
  code => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(err);
    process.exitCode = 1;
  }
);
