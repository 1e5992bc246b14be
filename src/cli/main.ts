#!/usr/bin/env node
/**
 * @file analysis-flow CLI entry point
 *
 * @module cli/main
 */

import { env_load } from '../config/settings.js';
import { cli_run } from './commands.js';

env_load();

cli_run(process.argv.slice(2))
    .then((code: number): void => {
        process.exitCode = code;
    })
    .catch((error: unknown): void => {
        console.error(error);
        process.exitCode = 1;
    });
