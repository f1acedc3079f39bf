#!/usr/bin/env -S node --import tsx
/**
 * cmdrecall CLI
 *
 * Main entry point for the cmdrecall command.
 */

import { createProgram } from './program.js';

await createProgram().parseAsync();
