// src/container.ts

import { CONFIG, CREDENTIAL_KEY } from './config';
import { createServiceLogger } from './utils/logger';
import { CredentialResolver, EnvironmentSource, SecretsFileSource } from './services/credential.service';
import { TextExtractorService } from './services/text-extractor.service';
import { AnthropicAnswerService } from './services/anthropic.service';
import { SessionService } from './services/session.service';
import { DocumentQAService } from './services/document-qa.service';
import { MissingCredentialError } from './errors';

/** Wires the services the server and the terminal client share. */
export const createServices = () => {
    const credentialResolver = new CredentialResolver({
        logger: createServiceLogger('credentials'),
        key: CREDENTIAL_KEY,
        sources: [new SecretsFileSource(CONFIG.SECRETS_FILE), new EnvironmentSource()],
    });

    const answerService = new AnthropicAnswerService({
        logger: createServiceLogger('answers'),
        credentialResolver,
        model: CONFIG.MODEL_NAME,
        maxTokens: CONFIG.MAX_TOKENS,
    });

    const documentQA = new DocumentQAService({
        logger: createServiceLogger('document-qa'),
        sessions: new SessionService(),
        extractor: new TextExtractorService({ logger: createServiceLogger('extractor') }),
        answerer: answerService,
    });

    return { credentialResolver, answerService, documentQA };
};

/**
 * Startup gate for both entry points. Reports the missing credential, calls
 * `exit(1)` and returns false; callers must not go on to listen or prompt.
 */
export const ensureCredential = (
    credentialResolver: CredentialResolver,
    report: (message: string) => void,
    exit: (code: number) => void = (code) => process.exit(code),
): boolean => {
    try {
        credentialResolver.requireCredential();
        return true;
    } catch (error) {
        if (error instanceof MissingCredentialError) {
            report(`❌ ${error.message}`);
            exit(1);
            return false;
        }
        throw error;
    }
};
