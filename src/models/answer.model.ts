// src/models/answer.model.ts

export interface AnswerRequest {
    documentText: string;
    question: string;
}

export interface TokenUsage {
    inputTokens: number;
    outputTokens: number;
}

export type AnswerFailureKind = 'missing_credential' | 'request_failed' | 'invalid_response';

export type AnswerResult =
    | { ok: true; answer: string; model: string; usage: TokenUsage }
    | { ok: false; kind: AnswerFailureKind; message: string };
