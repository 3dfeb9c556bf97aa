// src/errors.ts

export class AppError extends Error {
    constructor(message: string, public readonly statusCode: number = 500, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

export class MissingCredentialError extends AppError {
    constructor(key: string) {
        super(`${key} not found. Please set it in your config.env/.env file or in the secrets file.`, 500);
    }
}

export class ExtractionError extends AppError {
    constructor(filename: string, cause: unknown) {
        super(`Failed to extract text from '${filename}': ${errorMessage(cause)}`, 422, { cause });
    }
}

export class SessionNotFoundError extends AppError {
    constructor(sessionId: string) {
        super(`Session not found: ${sessionId}`, 404);
    }
}

export class UnsupportedFileError extends AppError {
    constructor(filename: string) {
        super(`Only PDF files are accepted, got '${filename}'`, 415);
    }
}

export const errorMessage = (error: unknown): string =>
    error instanceof Error ? error.message : String(error ?? 'Unknown error');
