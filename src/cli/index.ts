#!/usr/bin/env tsx
/**
 * nullmodem-harness CLI
 * Drives the emulated synthesizer console over its null-modem line and
 * writes the result artifact.
 */

import { describeError } from '@nullmodem/utils/errors';
import { createProgram } from './program.js';

createProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    console.error(describeError(err));
    process.exit(1);
  });
