#!/usr/bin/env tsx

/**
 * honeyport command entry point
 */

import { createProgram } from './program.js';

await createProgram().parseAsync(process.argv);
