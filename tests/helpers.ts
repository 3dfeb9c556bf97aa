import { vi } from 'vitest';
import { PDFParser, type PageTextLoader } from '../src/utils/pdf-parser';
import { TextExtractorService } from '../src/services/text-extractor.service';
import { SessionService } from '../src/services/session.service';
import { DocumentQAService, type Answerer } from '../src/services/document-qa.service';
import type { AnswerResult } from '../src/models/answer.model';
import { createTestLogger } from './test-logger';

export { createTestLogger };

/**
 * Stands in for the PDF library: the upload bytes, read as UTF-8, pick the
 * pages to return. Unknown bytes fail the way a corrupt file would.
 */
export const fakePageLoader = (documents: Record<string, string[]>): PageTextLoader => async (data) => {
    const pages = documents[data.toString('utf8')];
    if (!pages) throw new Error('Invalid PDF structure');
    return pages;
};

export const pdfBytes = (key: string): Buffer => Buffer.from(key, 'utf8');

export const answeredWith = (answer: string, model = 'claude-3-haiku-20240307') =>
    vi.fn(async (documentText: string, question: string): Promise<AnswerResult> => ({
        ok: true,
        answer,
        model,
        usage: { inputTokens: documentText.length + question.length, outputTokens: answer.length },
    }));

export const buildDocumentQA = (documents: Record<string, string[]>, answerer: Answerer) => {
    const logger = createTestLogger();
    const sessions = new SessionService();
    const extractor = new TextExtractorService({ logger, pdfParser: new PDFParser(fakePageLoader(documents)) });
    const documentQA = new DocumentQAService({ logger, sessions, extractor, answerer });
    return { documentQA, sessions, logger };
};
