import { beforeEach, describe, expect, it, vi } from 'vitest';

const sdkMock = vi.hoisted(() => ({
    options: [] as unknown[],
    create: vi.fn(),
}));

vi.mock('@anthropic-ai/sdk', () => ({
    default: class {
        messages = { create: sdkMock.create };
        constructor(options: unknown) {
            sdkMock.options.push(options);
        }
    },
}));

import {
    AnthropicAnswerService,
    buildAnswerPrompt,
    createAnthropicClient,
    describeAnswerFailure,
    type CompletionClientFactory,
    type CompletionParams,
    type CompletionResponse,
} from '../src/services/anthropic.service';
import { CredentialResolver, EnvironmentSource } from '../src/services/credential.service';
import { createTestLogger } from './test-logger';

const KEY = 'ANTHROPIC_API_KEY';

const buildService = (
    env: NodeJS.ProcessEnv,
    createMessage: (params: CompletionParams) => Promise<CompletionResponse>,
) => {
    const logger = createTestLogger();
    const apiKeys: string[] = [];
    const requests: CompletionParams[] = [];
    const clientFactory: CompletionClientFactory = (apiKey) => {
        apiKeys.push(apiKey);
        return {
            createMessage: (params) => {
                requests.push(params);
                return createMessage(params);
            },
        };
    };
    const service = new AnthropicAnswerService({
        logger,
        credentialResolver: new CredentialResolver({ logger, key: KEY, sources: [new EnvironmentSource(env)] }),
        model: 'claude-3-haiku-20240307',
        maxTokens: 1000,
        clientFactory,
    });
    return { service, apiKeys, requests, logger };
};

const textResponse = (text: string): CompletionResponse => ({
    model: 'claude-3-haiku-20240307',
    content: [{ type: 'text', text }],
    usage: { inputTokens: 120, outputTokens: 8 },
});

describe('buildAnswerPrompt', () => {
    it('embeds the document and the question verbatim', () => {
        expect(buildAnswerPrompt({ documentText: 'The sky is blue.\n', question: 'What colour is the sky?' })).toBe(
            'Based on the following document content, please answer the question. ' +
                'If the answer cannot be found in the document, please say so.\n' +
                '\n' +
                'Document content:\n' +
                'The sky is blue.\n' +
                '\n' +
                '\n' +
                'Question: What colour is the sky?\n' +
                '\n' +
                'Answer:',
        );
    });
});

describe('describeAnswerFailure', () => {
    it('prefixes the message with the service name', () => {
        expect(describeAnswerFailure('socket hang up')).toBe('Error querying Claude: socket hang up');
    });
});

describe('AnthropicAnswerService', () => {
    it('sends one request with the configured model and token ceiling', async () => {
        const { service, apiKeys, requests } = buildService({ [KEY]: 'test-key' }, async () =>
            textResponse('The sky is blue.'),
        );

        const result = await service.answer('The sky is blue.', 'What colour is the sky?');

        expect(result).toEqual({
            ok: true,
            answer: 'The sky is blue.',
            model: 'claude-3-haiku-20240307',
            usage: { inputTokens: 120, outputTokens: 8 },
        });
        expect(apiKeys).toEqual(['test-key']);
        expect(requests).toEqual([
            {
                model: 'claude-3-haiku-20240307',
                maxTokens: 1000,
                prompt: buildAnswerPrompt({ documentText: 'The sky is blue.', question: 'What colour is the sky?' }),
            },
        ]);
    });

    it('uses the first content segment only', async () => {
        const { service } = buildService({ [KEY]: 'test-key' }, async () => ({
            ...textResponse('first'),
            content: [
                { type: 'text', text: 'first' },
                { type: 'text', text: 'second' },
            ],
        }));

        await expect(service.answer('doc', 'q')).resolves.toMatchObject({ ok: true, answer: 'first' });
    });

    it('reports transport failures instead of throwing', async () => {
        const { service, logger } = buildService({ [KEY]: 'test-key' }, async () => {
            throw new Error('connect ECONNREFUSED 127.0.0.1:443');
        });

        await expect(service.answer('The sky is blue.', 'What is this about?')).resolves.toEqual({
            ok: false,
            kind: 'request_failed',
            message: 'connect ECONNREFUSED 127.0.0.1:443',
        });
        expect(logger.error).toHaveBeenCalledWith(
            '[AnthropicAnswerService] Request failed',
            expect.objectContaining({ error: 'connect ECONNREFUSED 127.0.0.1:443' }),
        );
    });

    it('reports a missing credential without calling the endpoint', async () => {
        const createMessage = vi.fn(async () => textResponse('unused'));
        const { service, apiKeys } = buildService({}, createMessage);

        await expect(service.answer('doc', 'q')).resolves.toEqual({
            ok: false,
            kind: 'missing_credential',
            message: 'ANTHROPIC_API_KEY not found. Please set it in your config.env/.env file or in the secrets file.',
        });
        expect(apiKeys).toEqual([]);
        expect(createMessage).not.toHaveBeenCalled();
    });

    it('rejects a response whose first segment is not text', async () => {
        const { service } = buildService({ [KEY]: 'test-key' }, async () => ({
            ...textResponse('unused'),
            content: [{ type: 'tool_use' }],
        }));

        await expect(service.answer('doc', 'q')).resolves.toEqual({
            ok: false,
            kind: 'invalid_response',
            message: "Unexpected response: first content segment is of type 'tool_use'",
        });
    });

    it('rejects a response without content', async () => {
        const { service } = buildService({ [KEY]: 'test-key' }, async () => ({
            ...textResponse('unused'),
            content: [],
        }));

        await expect(service.answer('doc', 'q')).resolves.toEqual({
            ok: false,
            kind: 'invalid_response',
            message: 'Unexpected response: first content segment is missing',
        });
    });

    it('resolves the credential afresh for every question', async () => {
        const env: NodeJS.ProcessEnv = { [KEY]: 'first-key' };
        const { service, apiKeys } = buildService(env, async () => textResponse('ok'));

        await service.answer('doc', 'one');
        env[KEY] = 'second-key';
        await service.answer('doc', 'two');

        expect(apiKeys).toEqual(['first-key', 'second-key']);
    });
});

describe('createAnthropicClient', () => {
    beforeEach(() => {
        sdkMock.create.mockReset();
        sdkMock.options.length = 0;
    });

    it('builds the SDK client without retries', () => {
        createAnthropicClient('test-key');

        expect(sdkMock.options).toEqual([{ apiKey: 'test-key', maxRetries: 0 }]);
    });

    it('sends a single user message and maps the reply', async () => {
        sdkMock.create.mockResolvedValueOnce({
            model: 'claude-3-haiku-20240307',
            content: [
                { type: 'text', text: 'Blue.' },
                { type: 'tool_use', id: 'toolu_1', name: 'lookup', input: {} },
            ],
            usage: { input_tokens: 12, output_tokens: 3 },
        });

        const response = await createAnthropicClient('test-key').createMessage({
            model: 'claude-3-haiku-20240307',
            maxTokens: 1000,
            prompt: 'What colour is the sky?',
        });

        expect(sdkMock.create).toHaveBeenCalledTimes(1);
        expect(sdkMock.create).toHaveBeenCalledWith({
            model: 'claude-3-haiku-20240307',
            max_tokens: 1000,
            messages: [{ role: 'user', content: 'What colour is the sky?' }],
        });
        expect(response).toEqual({
            model: 'claude-3-haiku-20240307',
            content: [{ type: 'text', text: 'Blue.' }, { type: 'tool_use' }],
            usage: { inputTokens: 12, outputTokens: 3 },
        });
    });

    it('makes exactly one request when the endpoint fails', async () => {
        sdkMock.create.mockRejectedValue(new Error('500 Internal Server Error'));
        const logger = createTestLogger();
        const service = new AnthropicAnswerService({
            logger,
            credentialResolver: new CredentialResolver({
                logger,
                key: KEY,
                sources: [new EnvironmentSource({ [KEY]: 'test-key' })],
            }),
            model: 'claude-3-haiku-20240307',
            maxTokens: 1000,
        });

        await expect(service.answer('The sky is blue.', 'What is this about?')).resolves.toEqual({
            ok: false,
            kind: 'request_failed',
            message: '500 Internal Server Error',
        });
        expect(sdkMock.create).toHaveBeenCalledTimes(1);
        expect(sdkMock.options).toEqual([{ apiKey: 'test-key', maxRetries: 0 }]);
    });
});
