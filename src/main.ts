#!/usr/bin/env node

import { createProgram } from './cli.js';
import { isTxCodecError } from './errors.js';

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    if (isTxCodecError(error)) {
      console.error(`${error.code}: ${error.message}${error.detail ? ` (${error.detail})` : ''}`);
    } else {
      console.error('Unexpected error:', error);
    }
    process.exitCode = 1;
  });
