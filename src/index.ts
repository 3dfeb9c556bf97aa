// src/index.ts

import { CONFIG } from './config';
import { logger } from './utils/logger';
import { createServices } from './container';
import { startServer } from './server';

const { credentialResolver, documentQA } = createServices();

const server = startServer({
    credentialResolver,
    documentQA,
    logger,
    port: CONFIG.PORT,
    maxUploadBytes: CONFIG.MAX_UPLOAD_BYTES,
    onListening: () =>
        logger.info('Answer settings', { model: CONFIG.MODEL_NAME, maxTokens: CONFIG.MAX_TOKENS, env: CONFIG.NODE_ENV }),
});

if (server) {
    const shutdown = (signal: string) => {
        logger.info(`Received ${signal}, shutting down`);
        server.close(() => process.exit(0));
    };

    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));
}
