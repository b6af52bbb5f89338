#!/usr/bin/env tsx

/**
 * CLI entry point for the snippet index generator
 */

import { createProgram } from "./program";

await createProgram().parseAsync();
