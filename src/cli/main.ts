#!/usr/bin/env node
/**
 * @file vdf-tree entry point
 *
 * Usage:
 *   vdf-tree Mod.vdf -v
 *   vdf-tree Mod.vdf -a ./scripts _work/data/scripts -o build/
 *
 * @module
 */

import { cli_run } from './run.js';

process.exitCode = cli_run(process.argv.slice(2));
