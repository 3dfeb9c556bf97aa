#!/usr/bin/env node
// src/cli.ts

import { logger } from './utils/logger';
import { createServices } from './container';
import { runTerminal } from './terminal';
import { errorMessage } from './errors';

// Keep the prompt readable unless the operator asked for more.
if (!process.env.LOG_LEVEL) logger.level = 'warn';

const filePath = process.argv[2];
if (!filePath) {
    console.error('Usage: doc-qa <file.pdf>');
    process.exit(1);
}

const { credentialResolver, documentQA } = createServices();

runTerminal({ filePath, credentialResolver, documentQA }).catch((error: unknown) => {
    console.error(`\nFATAL: ${errorMessage(error)}`);
    process.exit(1);
});
