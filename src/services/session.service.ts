// src/services/session.service.ts

import { v4 as uuidv4 } from 'uuid';
import type { LoadedDocument, SessionState } from '../models/session.model';
import { SessionNotFoundError } from '../errors';

/**
 * In-memory session store. Each session is its own record and nothing
 * outlives the process.
 */
export class SessionService {
    private sessions: Map<string, SessionState> = new Map();

    public createSession(): SessionState {
        const now = new Date();
        const session: SessionState = {
            id: uuidv4(),
            documentText: '',
            documentName: '',
            createdAt: now,
            lastAccessedAt: now,
        };

        this.sessions.set(session.id, session);
        return session;
    }

    public getSession(sessionId: string): SessionState | null {
        return this.sessions.get(sessionId) ?? null;
    }

    public requireSession(sessionId: string): SessionState {
        const session = this.getSession(sessionId);
        if (!session) throw new SessionNotFoundError(sessionId);
        return session;
    }

    /** Replaces the document name and text together in a fresh record. */
    public replaceDocument(sessionId: string, document: LoadedDocument): SessionState {
        const session = this.requireSession(sessionId);
        const updated: SessionState = {
            ...session,
            documentName: document.documentName,
            documentText: document.documentText,
            lastAccessedAt: new Date(),
        };

        this.sessions.set(sessionId, updated);
        return updated;
    }

    public touch(sessionId: string): SessionState {
        const session = this.requireSession(sessionId);
        const updated = { ...session, lastAccessedAt: new Date() };
        this.sessions.set(sessionId, updated);
        return updated;
    }

    public deleteSession(sessionId: string): boolean {
        return this.sessions.delete(sessionId);
    }

    public get size(): number {
        return this.sessions.size;
    }
}
