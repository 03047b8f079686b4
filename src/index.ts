#!/usr/bin/env node

import { main } from './cli.js';
import { logToStderr } from './utils/logger.js';

main(process.argv.slice(2)).then(
    (code) => {
        process.exitCode = code;
    },
    (error: unknown) => {
        logToStderr('error', `Unexpected failure: ${error instanceof Error ? error.message : String(error)}`);
        process.exitCode = 1;
    },
);
