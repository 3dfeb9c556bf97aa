// src/services/anthropic.service.ts

import Anthropic from '@anthropic-ai/sdk';
import { BaseService } from './base/BaseService';
import type { ServiceConfig } from './base/types';
import type { CredentialResolver } from './credential.service';
import type { AnswerRequest, AnswerResult, TokenUsage } from '../models/answer.model';
import { MissingCredentialError, errorMessage } from '../errors';

export const SERVICE_LABEL = 'Claude';

export interface CompletionParams {
    model: string;
    maxTokens: number;
    prompt: string;
}

export interface ContentSegment {
    type: string;
    text?: string;
}

export interface CompletionResponse {
    model: string;
    content: ContentSegment[];
    usage: TokenUsage;
}

export interface CompletionClient {
    createMessage(params: CompletionParams): Promise<CompletionResponse>;
}

export type CompletionClientFactory = (apiKey: string) => CompletionClient;

export const createAnthropicClient: CompletionClientFactory = (apiKey) => {
    // One request per question: the SDK's own retries are switched off.
    const client = new Anthropic({ apiKey, maxRetries: 0 });

    return {
        async createMessage({ model, maxTokens, prompt }) {
            const message = await client.messages.create({
                model,
                max_tokens: maxTokens,
                messages: [{ role: 'user', content: prompt }],
            });

            return {
                model: message.model,
                content: message.content.map((block) =>
                    block.type === 'text' ? { type: block.type, text: block.text } : { type: block.type },
                ),
                usage: {
                    inputTokens: message.usage.input_tokens,
                    outputTokens: message.usage.output_tokens,
                },
            };
        },
    };
};

export const buildAnswerPrompt = ({ documentText, question }: AnswerRequest): string =>
    `Based on the following document content, please answer the question. If the answer cannot be found in the document, please say so.

Document content:
${documentText}

Question: ${question}

Answer:`;

/** Display form of a failed answer, e.g. "Error querying Claude: socket hang up". */
export const describeAnswerFailure = (message: string): string => `Error querying ${SERVICE_LABEL}: ${message}`;

interface AnthropicServiceConfig extends ServiceConfig {
    credentialResolver: CredentialResolver;
    model: string;
    maxTokens: number;
    clientFactory?: CompletionClientFactory;
}

export class AnthropicAnswerService extends BaseService {
    private credentialResolver: CredentialResolver;
    private clientFactory: CompletionClientFactory;
    private model: string;
    private maxTokens: number;

    constructor(config: AnthropicServiceConfig) {
        super(config);
        this.credentialResolver = config.credentialResolver;
        this.clientFactory = config.clientFactory ?? createAnthropicClient;
        this.model = config.model;
        this.maxTokens = config.maxTokens;
    }

    /**
     * One non-streaming request per call. Never rejects: every failure comes
     * back as `{ ok: false }` with the kind of failure and its message.
     */
    public async answer(documentText: string, question: string): Promise<AnswerResult> {
        const apiKey = this.credentialResolver.resolve();
        if (apiKey === null) {
            const { message } = new MissingCredentialError(this.credentialResolver.credentialKey);
            this.logger.error('[AnthropicAnswerService] No credential available', { message });
            return { ok: false, kind: 'missing_credential', message };
        }

        const prompt = buildAnswerPrompt({ documentText, question });
        const startTime = Date.now();

        let response: CompletionResponse;
        try {
            const client = this.clientFactory(apiKey);
            response = await client.createMessage({ model: this.model, maxTokens: this.maxTokens, prompt });
        } catch (error) {
            const message = errorMessage(error);
            this.logger.error('[AnthropicAnswerService] Request failed', {
                model: this.model,
                error: message,
                durationMs: Date.now() - startTime,
            });
            return { ok: false, kind: 'request_failed', message };
        }

        const first = response.content[0];
        if (!first || first.type !== 'text' || typeof first.text !== 'string') {
            const message = `Unexpected response: first content segment is ${first ? `of type '${first.type}'` : 'missing'}`;
            this.logger.error('[AnthropicAnswerService] Invalid response', { model: response.model, message });
            return { ok: false, kind: 'invalid_response', message };
        }

        this.logger.info('[AnthropicAnswerService] Answer received', {
            model: response.model,
            inputTokens: response.usage.inputTokens,
            outputTokens: response.usage.outputTokens,
            durationMs: Date.now() - startTime,
        });

        return { ok: true, answer: first.text, model: response.model, usage: response.usage };
    }
}
