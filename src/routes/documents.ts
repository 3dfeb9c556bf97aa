// src/routes/documents.ts

import express, { Request, Response } from 'express';
import multer from 'multer';
import type { DocumentQAService } from '../services/document-qa.service';
import type { Logger } from '../services/base/types';
import { isPdfUpload } from '../models/document.model';
import { UnsupportedFileError } from '../errors';
import { sendError } from './respond';

interface DocumentsRouterOptions {
    maxUploadBytes: number;
}

export const createDocumentsRouter = (documentQA: DocumentQAService, logger: Logger, options: DocumentsRouterOptions) => {
    // One PDF per upload, held in memory; nothing is written to disk.
    const upload = multer({
        storage: multer.memoryStorage(),
        limits: { fileSize: options.maxUploadBytes, files: 1 },
        fileFilter: (req, file, cb) => {
            if (isPdfUpload(file.originalname, file.mimetype)) {
                cb(null, true);
            } else {
                cb(new UnsupportedFileError(file.originalname));
            }
        },
    });

    const router = express.Router({ mergeParams: true });

    router.post('/', upload.single('file'), async (req: Request, res: Response) => {
        try {
            const file = req.file;
            if (!file) {
                res.status(400).json({ error: 'No file uploaded' });
                return;
            }

            const outcome = await documentQA.uploadDocument(req.params.sessionId, {
                name: file.originalname,
                data: file.buffer,
            });
            res.json(outcome);
        } catch (error) {
            sendError(res, logger, error, 'Failed to process document');
        }
    });

    return router;
};
