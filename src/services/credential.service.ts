// src/services/credential.service.ts

import fs from 'fs';
import { z } from 'zod';
import { BaseService } from './base/BaseService';
import type { ServiceConfig } from './base/types';
import { MissingCredentialError, errorMessage } from '../errors';

export interface CredentialSource {
    readonly name: string;
    /** Returns the value for `key`, or undefined when this source does not have one. May throw. */
    lookup(key: string): string | undefined;
}

const secretsFileSchema = z.record(z.string(), z.unknown());

/**
 * Key/value secrets mounted as a JSON file, as managed hosts provide them.
 * Outside such a host the file is usually missing, which the resolver treats
 * as "not present".
 */
export class SecretsFileSource implements CredentialSource {
    public readonly name = 'secrets-file';

    constructor(private readonly filePath: string) {}

    public lookup(key: string): string | undefined {
        const raw = fs.readFileSync(this.filePath, 'utf8');
        const secrets = secretsFileSchema.parse(JSON.parse(raw));
        const value = secrets[key];
        if (value === undefined) return undefined;
        if (typeof value !== 'string') {
            throw new Error(`Secret ${key} in ${this.filePath} is not a string`);
        }
        return value;
    }
}

export class EnvironmentSource implements CredentialSource {
    public readonly name = 'environment';

    constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

    public lookup(key: string): string | undefined {
        return this.env[key];
    }
}

interface CredentialResolverConfig extends ServiceConfig {
    key: string;
    sources: CredentialSource[];
}

export class CredentialResolver extends BaseService {
    private readonly key: string;
    private readonly sources: CredentialSource[];

    constructor(config: CredentialResolverConfig) {
        super(config);
        this.key = config.key;
        this.sources = config.sources;
    }

    public get credentialKey(): string {
        return this.key;
    }

    /**
     * Walks the sources in order and returns the first non-empty value.
     * A source that throws is logged and skipped.
     */
    public resolve(): string | null {
        for (const source of this.sources) {
            let value: string | undefined;
            try {
                value = source.lookup(this.key);
            } catch (error) {
                this.logger.debug('[CredentialResolver] Source lookup failed, trying next source', {
                    source: source.name,
                    key: this.key,
                    error: errorMessage(error),
                });
                continue;
            }
            if (value) {
                this.logger.debug('[CredentialResolver] Credential resolved', { source: source.name, key: this.key });
                return value;
            }
        }
        return null;
    }

    public requireCredential(): string {
        const credential = this.resolve();
        if (credential === null) {
            throw new MissingCredentialError(this.key);
        }
        return credential;
    }
}
