#!/usr/bin/env node
/**
 * sightcheck: command-line entry point.
 */

import { createProgram } from './program.js';

await createProgram().parseAsync();
