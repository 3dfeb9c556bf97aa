// src/models/session.model.ts

export type SessionPhase = 'no_document' | 'document_loaded';

export interface SessionState {
    id: string;
    /** Full extracted text of the latest upload; '' until a document is loaded. */
    documentText: string;
    documentName: string;
    createdAt: Date;
    lastAccessedAt: Date;
}

export interface LoadedDocument {
    documentName: string;
    documentText: string;
}

export const sessionPhase = (session: Pick<SessionState, 'documentText'>): SessionPhase =>
    session.documentText === '' ? 'no_document' : 'document_loaded';
