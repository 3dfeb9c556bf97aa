// src/config/index.ts
import dotenv from 'dotenv';
import path from 'path';

const nodeEnv = process.env.NODE_ENV || 'development';
const quiet = nodeEnv === 'test';

const note = (message: string): void => {
  if (!quiet) console.log(`[config/index.ts] ${message}`);
};

// config.env first, then .env. dotenv never overrides a variable that is
// already set, so the process environment always wins.
const ENV_FILES = ['config.env', '.env'];

for (const file of ENV_FILES) {
  const envPath = path.resolve(process.cwd(), file);
  const result = dotenv.config({ path: envPath });
  if (result.error) {
    note(`${file} not loaded (${path.relative(process.cwd(), envPath)} missing or unreadable).`);
  } else if (result.parsed && Object.keys(result.parsed).length > 0) {
    note(`${file} loaded from ${envPath}.`);
  }
}

// Helper function to get environment variables with defaults
export const getEnvVar = (key: string, defaultValue: string = ''): string => {
  const value = process.env[key];
  if (value === undefined || value === '') {
    return defaultValue;
  }
  return value;
};

export const getIntEnvVar = (key: string, defaultValue: number): number => {
  const parsed = parseInt(getEnvVar(key, String(defaultValue)), 10);
  if (Number.isNaN(parsed) || parsed <= 0) {
    console.warn(`[config/index.ts] ${key} is not a positive integer, using default value: ${defaultValue}`);
    return defaultValue;
  }
  return parsed;
};

export const CONFIG = {
  PORT: getIntEnvVar('PORT', 3000),
  MODEL_NAME: getEnvVar('MODEL_NAME', 'claude-3-haiku-20240307'),
  MAX_TOKENS: getIntEnvVar('MAX_TOKENS', 1000),
  SECRETS_FILE: getEnvVar('SECRETS_FILE', 'secrets.json'),
  LOG_LEVEL: getEnvVar('LOG_LEVEL', 'info'),
  MAX_UPLOAD_BYTES: getIntEnvVar('MAX_UPLOAD_BYTES', 20 * 1024 * 1024),
  NODE_ENV: nodeEnv,
};

// Not part of CONFIG: CredentialResolver looks the key up on every use.
export const CREDENTIAL_KEY = 'ANTHROPIC_API_KEY';
