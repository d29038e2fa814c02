#!/usr/bin/env node
/**
 * generate-docs CLI - Build project documentation with doxygen.
 *
 *   generate-docs [--html] [--rtf] [--version <string>] [-h]
 */

import { createProgram } from './program';

createProgram()
  .parseAsync()
  .catch((error: unknown) => {
    console.error(error);
    process.exit(1);
  });
