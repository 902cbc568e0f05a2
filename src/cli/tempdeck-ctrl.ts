#!/usr/bin/env node
/**
 * tempdeck-ctrl entry point
 *
 * Usage: npx tsx src/cli/tempdeck-ctrl.ts [options]
 */

import { cliMain } from "./main";

process.exitCode = await cliMain(process.argv.slice(2));
