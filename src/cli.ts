#!/usr/bin/env node
/**
 * msftool - CLI Interface
 *
 * Command-line interface for packing directories into MSF archives and unpacking them.
 */

import { createProgram } from './program.js';

createProgram()
  .parseAsync()
  .catch((error: unknown) => {
    console.error('❌', error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  });
