#!/usr/bin/env node

/**
 * chplan entrypoint.
 */

import { createProgram } from "./program.js";

await createProgram().parseAsync(process.argv);
