// src/utils/pdf-parser.ts

import { PDFParse } from 'pdf-parse';

/** Reads a PDF and returns one string per page, in page order. */
export type PageTextLoader = (data: Buffer) => Promise<string[]>;

export interface PDFResult {
    text: string;
    pageCount: number;
    pageTexts: string[];
}

export const loadPageTexts: PageTextLoader = async (data) => {
    // pdf.js wants a plain Uint8Array and may detach it, so hand it a copy.
    const parser = new PDFParse({ data: new Uint8Array(data) });
    try {
        const result = await parser.getText();
        return [...result.pages].sort((a, b) => a.num - b.num).map((page) => page.text);
    } finally {
        await parser.destroy();
    }
};

/** Every page's text followed by a newline: ["Hello", "World"] -> "Hello\nWorld\n". */
export const joinPageTexts = (pageTexts: string[]): string =>
    pageTexts.map((pageText) => `${pageText}\n`).join('');

export class PDFParser {
    constructor(private readonly loadPages: PageTextLoader = loadPageTexts) {}

    public async parse(data: Buffer): Promise<PDFResult> {
        const pageTexts = await this.loadPages(data);

        return {
            text: joinPageTexts(pageTexts),
            pageCount: pageTexts.length,
            pageTexts,
        };
    }
}
