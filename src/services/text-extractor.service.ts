// src/services/text-extractor.service.ts

import { BaseService } from './base/BaseService';
import type { ServiceConfig } from './base/types';
import { PDFParser, type PDFResult } from '../utils/pdf-parser';
import { ExtractionError } from '../errors';

interface TextExtractorConfig extends ServiceConfig {
    pdfParser?: PDFParser;
}

export class TextExtractorService extends BaseService {
    private pdfParser: PDFParser;

    constructor(config: TextExtractorConfig) {
        super(config);
        this.pdfParser = config.pdfParser ?? new PDFParser();
    }

    /**
     * Parses the whole document in one go. Failures from the PDF library are
     * rethrown as ExtractionError; nothing is retried.
     */
    public async parse(document: Buffer, filename: string = 'document.pdf'): Promise<PDFResult> {
        const startTime = Date.now();
        try {
            const result = await this.pdfParser.parse(document);
            this.logger.info('[TextExtractor] Document extracted', {
                filename,
                pageCount: result.pageCount,
                charCount: result.text.length,
                durationMs: Date.now() - startTime,
            });
            return result;
        } catch (error) {
            const extractionError = new ExtractionError(filename, error);
            this.logger.error('[TextExtractor] Extraction failed', { filename, error: extractionError.message });
            throw extractionError;
        }
    }

    public async extractText(document: Buffer, filename?: string): Promise<string> {
        const { text } = await this.parse(document, filename);
        return text;
    }
}
