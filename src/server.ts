// src/server.ts

import type { Server } from 'http';
import { createApp } from './app';
import { ensureCredential } from './container';
import type { CredentialResolver } from './services/credential.service';
import type { DocumentQAService } from './services/document-qa.service';
import type { Logger } from './services/base/types';

interface StartServerOptions {
    credentialResolver: CredentialResolver;
    documentQA: DocumentQAService;
    logger: Logger;
    port: number;
    maxUploadBytes: number;
    exit?: (code: number) => void;
    onListening?: () => void;
}

/** Returns null without listening when no credential resolves. */
export const startServer = (options: StartServerOptions): Server | null => {
    const { credentialResolver, documentQA, logger, port, maxUploadBytes } = options;

    if (!ensureCredential(credentialResolver, (message) => logger.error(message), options.exit)) {
        return null;
    }

    const app = createApp({ documentQA, logger, maxUploadBytes });
    return app.listen(port, () => {
        logger.info(`Document Q&A server listening on port ${port}`);
        options.onListening?.();
    });
};
