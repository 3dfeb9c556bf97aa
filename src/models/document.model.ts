// src/models/document.model.ts

import type { AnswerFailureKind } from './answer.model';

export interface DocumentStats {
    wordCount: number;
    charCount: number;
}

export interface UploadedFile {
    name: string;
    data: Buffer;
}

export interface UploadOutcome {
    documentName: string;
    pageCount: number;
    stats: DocumentStats;
    preview: string;
    warning?: string;
}

export type QuestionOutcome =
    | { status: 'answered'; answer: string; model: string }
    | { status: 'input_required'; notice: string }
    | { status: 'failed'; kind: AnswerFailureKind; message: string };

export const PREVIEW_LENGTH = 500;

export const computeDocumentStats = (text: string): DocumentStats => ({
    wordCount: text.split(/\s+/).filter((word) => word.length > 0).length,
    charCount: text.length,
});

export const isPdfUpload = (filename: string, mimetype?: string): boolean =>
    mimetype === 'application/pdf' || filename.toLowerCase().endsWith('.pdf');
