// src/terminal.ts

import { promises as fs } from 'fs';
import path from 'path';
import readline from 'readline';
import type { DocumentQAService } from './services/document-qa.service';
import type { CredentialResolver } from './services/credential.service';
import { ensureCredential } from './container';
import { isPdfUpload } from './models/document.model';
import { errorMessage } from './errors';

export type LineResult = 'continue' | 'exit';

interface TerminalClientOptions {
    documentQA: DocumentQAService;
    readFile?: (filePath: string) => Promise<Buffer>;
    print?: (line: string) => void;
}

/**
 * Question loop over a PDF on disk. Owns one session for its lifetime.
 * Commands: `/load <path>` replaces the document, `/exit` quits; any other
 * line is a question.
 */
export class TerminalClient {
    private documentQA: DocumentQAService;
    private readFile: (filePath: string) => Promise<Buffer>;
    private print: (line: string) => void;
    public readonly sessionId: string;

    constructor(options: TerminalClientOptions) {
        this.documentQA = options.documentQA;
        this.readFile = options.readFile ?? ((filePath) => fs.readFile(filePath));
        this.print = options.print ?? ((line) => console.log(line));
        this.sessionId = this.documentQA.createSession().id;
    }

    public async load(filePath: string): Promise<boolean> {
        const name = path.basename(filePath);
        if (!isPdfUpload(name)) {
            this.print(`❌ Only PDF files are accepted, got '${name}'`);
            return false;
        }

        try {
            const data = await this.readFile(filePath);
            const outcome = await this.documentQA.uploadDocument(this.sessionId, { name, data });
            this.print(`✅ Document '${outcome.documentName}' processed successfully!`);
            this.print(`📊 Document stats: ${outcome.stats.wordCount} words, ${outcome.stats.charCount} characters`);
            if (outcome.warning) this.print(`⚠️  ${outcome.warning}`);
            return true;
        } catch (error) {
            this.print(`❌ Error: ${errorMessage(error)}`);
            return false;
        }
    }

    public async handleLine(line: string): Promise<LineResult> {
        const input = line.trim();

        if (input === '/exit') return 'exit';

        if (input === '/load' || input.startsWith('/load ')) {
            const target = input.slice('/load'.length).trim();
            if (!target) {
                this.print('Usage: /load <path/to/file.pdf>');
            } else {
                await this.load(target);
            }
            return 'continue';
        }

        const outcome = await this.documentQA.askQuestion(this.sessionId, input);
        switch (outcome.status) {
            case 'answered':
                this.print('🎯 Answer:');
                this.print(outcome.answer);
                break;
            case 'input_required':
                this.print(`⚠️  ${outcome.notice}`);
                break;
            case 'failed':
                this.print(`❌ ${outcome.message}`);
                if (outcome.kind === 'missing_credential') {
                    this.print('💡 Make sure you have set your ANTHROPIC_API_KEY in the config.env file');
                }
                break;
        }
        return 'continue';
    }
}

interface RunTerminalOptions {
    filePath: string;
    credentialResolver: CredentialResolver;
    documentQA: DocumentQAService;
    input?: NodeJS.ReadableStream;
    output?: NodeJS.WritableStream;
    readFile?: (filePath: string) => Promise<Buffer>;
    exit?: (code: number) => void;
}

/** Checks the credential, loads the file, then reads questions until `/exit` or end of input. */
export const runTerminal = async (options: RunTerminalOptions): Promise<void> => {
    const input = options.input ?? process.stdin;
    const output = options.output ?? process.stdout;
    const exit = options.exit ?? ((code: number) => process.exit(code));
    const print = (line: string) => {
        output.write(`${line}\n`);
    };

    if (!ensureCredential(options.credentialResolver, print, exit)) return;

    const client = new TerminalClient({ documentQA: options.documentQA, readFile: options.readFile, print });

    print('📄 Document Q&A');
    print('------------------------------------------');
    if (!(await client.load(options.filePath))) {
        exit(1);
        return;
    }
    print('Type a question and press Enter.');
    print('Type "/load <file.pdf>" to switch documents, "/exit" to quit.');
    print('------------------------------------------');

    const rl = readline.createInterface({ input, output, prompt: 'YOU> ' });

    rl.prompt();
    for await (const line of rl) {
        if ((await client.handleLine(line)) === 'exit') break;
        rl.prompt();
    }
    rl.close();
};
