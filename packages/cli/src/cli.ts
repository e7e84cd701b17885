#!/usr/bin/env node

/**
 * strata CLI entry point
 */

import { run } from "./program.js";

process.exitCode = await run(process.argv);
