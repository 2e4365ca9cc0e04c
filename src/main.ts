#!/usr/bin/env node
/**
 * Device Inventory - Entry Point
 */

import { runCli } from "./cli";

process.exitCode = await runCli(process.argv.slice(2));
