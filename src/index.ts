#!/usr/bin/env node
// Cold Email Agent - Main Entry Point
import { runCli } from './cli.js';
import { logger } from './utils/logger.js';

runCli(process.argv.slice(2))
    .then(code => {
        process.exitCode = code;
    })
    .catch(error => {
        logger.error('Cold email generator crashed', { metadata: error });
        process.exitCode = 1;
    });
