// src/services/document-qa.service.ts

import { BaseService } from './base/BaseService';
import type { ServiceConfig } from './base/types';
import type { SessionService } from './session.service';
import type { TextExtractorService } from './text-extractor.service';
import { describeAnswerFailure } from './anthropic.service';
import type { AnswerResult } from '../models/answer.model';
import type { SessionState } from '../models/session.model';
import {
    PREVIEW_LENGTH,
    type QuestionOutcome,
    type UploadedFile,
    type UploadOutcome,
    computeDocumentStats,
} from '../models/document.model';

export const NO_DOCUMENT_NOTICE = 'Please upload a PDF document before asking questions.';
export const EMPTY_QUESTION_NOTICE = 'Please enter a question!';
export const NO_TEXT_WARNING =
    'No extractable text was found in this document. It may be a scanned image; answers will not be able to draw on its content.';

/** Anything that can answer a question about a document. */
export interface Answerer {
    answer(documentText: string, question: string): Promise<AnswerResult>;
}

interface DocumentQAConfig extends ServiceConfig {
    sessions: SessionService;
    extractor: TextExtractorService;
    answerer: Answerer;
}

/**
 * Sequences uploads and questions for a session. A session moves from
 * no_document to document_loaded on its first successful upload and never
 * moves back; later uploads replace the document.
 */
export class DocumentQAService extends BaseService {
    private sessions: SessionService;
    private extractor: TextExtractorService;
    private answerer: Answerer;

    constructor(config: DocumentQAConfig) {
        super(config);
        this.sessions = config.sessions;
        this.extractor = config.extractor;
        this.answerer = config.answerer;
    }

    public createSession(): SessionState {
        const session = this.sessions.createSession();
        this.logger.info('[DocumentQAService] Session created', { sessionId: session.id });
        return session;
    }

    public getSession(sessionId: string): SessionState | null {
        return this.sessions.getSession(sessionId);
    }

    public deleteSession(sessionId: string): boolean {
        const deleted = this.sessions.deleteSession(sessionId);
        if (deleted) this.logger.info('[DocumentQAService] Session deleted', { sessionId });
        return deleted;
    }

    /**
     * Extraction errors propagate and leave the session as it was; the name
     * and text are only written once both are known.
     */
    public async uploadDocument(sessionId: string, file: UploadedFile): Promise<UploadOutcome> {
        this.sessions.requireSession(sessionId);

        const { text, pageCount } = await this.extractor.parse(file.data, file.name);
        this.sessions.replaceDocument(sessionId, { documentName: file.name, documentText: text });

        const outcome: UploadOutcome = {
            documentName: file.name,
            pageCount,
            stats: computeDocumentStats(text),
            preview: text.slice(0, PREVIEW_LENGTH),
        };

        if (text.trim() === '') {
            outcome.warning = NO_TEXT_WARNING;
            this.logger.warn('[DocumentQAService] Document has no extractable text', {
                sessionId,
                documentName: file.name,
                pageCount,
            });
        }

        this.logger.info('[DocumentQAService] Document loaded', {
            sessionId,
            documentName: file.name,
            ...outcome.stats,
        });
        return outcome;
    }

    public async askQuestion(sessionId: string, question: string): Promise<QuestionOutcome> {
        const session = this.sessions.requireSession(sessionId);

        // Notices leave the session record untouched.
        if (session.documentText === '') {
            return { status: 'input_required', notice: NO_DOCUMENT_NOTICE };
        }
        if (question.trim() === '') {
            return { status: 'input_required', notice: EMPTY_QUESTION_NOTICE };
        }

        this.sessions.touch(sessionId);
        const result = await this.answerer.answer(session.documentText, question);
        if (!result.ok) {
            this.logger.warn('[DocumentQAService] Question could not be answered', {
                sessionId,
                kind: result.kind,
            });
            return { status: 'failed', kind: result.kind, message: describeAnswerFailure(result.message) };
        }

        return { status: 'answered', answer: result.answer, model: result.model };
    }
}
