#!/usr/bin/env tsx
/**
 * CLI entry point: parses process.argv with the full command tree.
 */

import { createProgram } from './program.js';

await createProgram().parseAsync();
