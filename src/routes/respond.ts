// src/routes/respond.ts

import type { Response } from 'express';
import { MulterError } from 'multer';
import { AppError, errorMessage } from '../errors';
import type { Logger } from '../services/base/types';

const MULTER_STATUS: Partial<Record<MulterError['code'], number>> = {
    LIMIT_FILE_SIZE: 413,
    LIMIT_FILE_COUNT: 400,
    LIMIT_UNEXPECTED_FILE: 400,
};

export const statusForError = (error: unknown): number => {
    if (error instanceof AppError) return error.statusCode;
    if (error instanceof MulterError) return MULTER_STATUS[error.code] ?? 400;
    return 500;
};

export const sendError = (res: Response, logger: Logger, error: unknown, fallback: string): void => {
    const status = statusForError(error);
    const message = error instanceof Error ? error.message : fallback;
    if (status >= 500) {
        logger.error(fallback, { error: errorMessage(error) });
    } else {
        logger.warn(fallback, { status, error: message });
    }
    res.status(status).json({ error: message });
};
