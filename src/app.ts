// src/app.ts

import express, { NextFunction, Request, Response } from 'express';
import type { DocumentQAService } from './services/document-qa.service';
import type { Logger } from './services/base/types';
import { createSessionsRouter } from './routes/sessions';
import { createDocumentsRouter } from './routes/documents';
import { sendError } from './routes/respond';

export interface AppDependencies {
    documentQA: DocumentQAService;
    logger: Logger;
    maxUploadBytes: number;
}

export const createApp = ({ documentQA, logger, maxUploadBytes }: AppDependencies) => {
    const app = express();

    app.use(express.json({ limit: '1mb' }));

    app.use('/api/sessions', createSessionsRouter(documentQA, logger));
    app.use('/api/sessions/:sessionId/document', createDocumentsRouter(documentQA, logger, { maxUploadBytes }));

    app.get('/health', (req: Request, res: Response) => {
        res.json({ status: 'ok', timestamp: new Date().toISOString() });
    });

    // Upload rejections (wrong type, too large, extra files) and malformed JSON land here.
    app.use((error: unknown, req: Request, res: Response, next: NextFunction) => {
        if (res.headersSent) {
            next(error);
            return;
        }
        sendError(res, logger, error, 'Request failed');
    });

    return app;
};
