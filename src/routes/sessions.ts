// src/routes/sessions.ts

import express, { Request, Response } from 'express';
import { z } from 'zod';
import type { DocumentQAService } from '../services/document-qa.service';
import type { Logger } from '../services/base/types';
import { type SessionState, sessionPhase } from '../models/session.model';
import { computeDocumentStats } from '../models/document.model';
import { SessionNotFoundError } from '../errors';
import { sendError } from './respond';

const questionSchema = z.object({
    question: z.string().default(''),
});

export const toSessionView = (session: SessionState) => {
    const phase = sessionPhase(session);
    return {
        id: session.id,
        state: phase,
        documentName: session.documentName,
        stats: phase === 'document_loaded' ? computeDocumentStats(session.documentText) : null,
        createdAt: session.createdAt.toISOString(),
        lastAccessedAt: session.lastAccessedAt.toISOString(),
    };
};

export const createSessionsRouter = (documentQA: DocumentQAService, logger: Logger) => {
    const router = express.Router();

    router.post('/', (req: Request, res: Response) => {
        try {
            const session = documentQA.createSession();
            res.status(201).json(toSessionView(session));
        } catch (error) {
            sendError(res, logger, error, 'Failed to create session');
        }
    });

    router.get('/:sessionId', (req: Request, res: Response) => {
        const session = documentQA.getSession(req.params.sessionId);
        if (!session) {
            sendError(res, logger, new SessionNotFoundError(req.params.sessionId), 'Failed to fetch session');
            return;
        }
        res.json(toSessionView(session));
    });

    router.delete('/:sessionId', (req: Request, res: Response) => {
        if (!documentQA.deleteSession(req.params.sessionId)) {
            sendError(res, logger, new SessionNotFoundError(req.params.sessionId), 'Failed to delete session');
            return;
        }
        res.json({ success: true });
    });

    router.post('/:sessionId/questions', async (req: Request, res: Response) => {
        const parsed = questionSchema.safeParse(req.body ?? {});
        if (!parsed.success) {
            res.status(400).json({ error: parsed.error.issues.map((issue) => issue.message).join('; ') });
            return;
        }

        try {
            const outcome = await documentQA.askQuestion(req.params.sessionId, parsed.data.question);
            switch (outcome.status) {
                case 'answered':
                    res.json({ answer: outcome.answer, model: outcome.model });
                    return;
                case 'input_required':
                    res.status(400).json({ notice: outcome.notice });
                    return;
                case 'failed':
                    res.status(outcome.kind === 'missing_credential' ? 503 : 502).json({
                        error: outcome.message,
                        kind: outcome.kind,
                    });
                    return;
            }
        } catch (error) {
            sendError(res, logger, error, 'Failed to answer question');
        }
    });

    return router;
};
