#!/usr/bin/env tsx
/**
 * Research query CLI entry
 * Usage:
 *  npm run query -- "most cited machine learning papers since 2018"
 *  npm run query -- --json "papers about robotics"
 *  npm run query -- --save=json "top 10 papers on nlp"
 */

import { runCli } from '../src/cli';

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  });
