#!/usr/bin/env node
/**
 * Regenerates the typescript-fetch client in ../src/api/generated from ../openapi.json.
 * Takes no arguments; all paths are relative to this file's directory.
 */

import { main } from '../src/cli.js';

main({ scriptDir: __dirname })
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    console.error('Client generation failed:', error);
    process.exit(1);
  });
