import { ConfigurationError } from '../errors';
import {
  InvokerConfig,
  LLMProviderName,
} from './interfaces/config.interface';

export const INVOKER_CONFIG = Symbol('INVOKER_CONFIG');

export const DEFAULT_TRIGGER_PHRASE = '/ai-review';

const PROVIDERS: readonly LLMProviderName[] = ['anthropic', 'openai', 'deepseek'];

export type EnvReader = (key: string) => string | undefined;

export const envReader =
  (env: NodeJS.ProcessEnv = process.env): EnvReader =>
  (key) =>
    env[key];

function readNumber(
  read: EnvReader,
  key: string,
  fallback: number,
  { min, integer }: { min: number; integer: boolean },
): number {
  const raw = read(key);
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isFinite(value) || value < min || (integer && !Number.isInteger(value))) {
    throw new ConfigurationError(`${key} must be ${integer ? 'an integer' : 'a number'} >= ${min}, got "${raw}"`, {
      key,
    });
  }
  return value;
}

function readProvider(read: EnvReader): LLMProviderName {
  const raw = (read('LLM_PROVIDER') || 'anthropic').toLowerCase();
  const provider = PROVIDERS.find((name) => name === raw);
  if (!provider) {
    throw new ConfigurationError(`Unknown LLM provider: ${raw}`, {
      key: 'LLM_PROVIDER',
      supported: PROVIDERS,
    });
  }
  return provider;
}

function nonEmpty(value: string | undefined): string | undefined {
  return value && value.trim() ? value.trim() : undefined;
}

/**
 * Resolves the invoker settings from environment-style keys. Malformed values
 * throw; missing secrets are left undefined for {@link assertCredentials}.
 */
export function loadInvokerConfig(read: EnvReader): InvokerConfig {
  const provider = readProvider(read);
  const prefix = provider.toUpperCase();

  const triggerPhrase = read('REVIEW_TRIGGER_PHRASE') ?? DEFAULT_TRIGGER_PHRASE;
  if (!triggerPhrase.trim()) {
    throw new ConfigurationError('REVIEW_TRIGGER_PHRASE must not be blank', {
      key: 'REVIEW_TRIGGER_PHRASE',
    });
  }

  const config: InvokerConfig = {
    provider,
    apiKey: nonEmpty(read('LLM_API_KEY')) ?? nonEmpty(read(`${prefix}_API_KEY`)),
    baseUrl: nonEmpty(read(`${prefix}_BASE_URL`)),
    model: nonEmpty(read('LLM_MODEL')) ?? nonEmpty(read(`${prefix}_MODEL`)),
    maxTokens: readNumber(read, 'REVIEW_MAX_TOKENS', 4000, { min: 1, integer: true }),
    temperature: readNumber(read, 'REVIEW_TEMPERATURE', 0.2, { min: 0, integer: false }),
    timeoutMs: readNumber(read, 'REVIEW_TIMEOUT_MS', 60_000, { min: 1, integer: true }),
    retry: Object.freeze({
      maxRetries: readNumber(read, 'REVIEW_MAX_RETRIES', 2, { min: 0, integer: true }),
      backoffMs: readNumber(read, 'REVIEW_RETRY_BACKOFF_MS', 2000, { min: 0, integer: true }),
    }),
    maxDiffChars: readNumber(read, 'REVIEW_MAX_DIFF_CHARS', 60_000, { min: 1000, integer: true }),
    triggerPhrase,
    github: Object.freeze({
      token: nonEmpty(read('GITHUB_TOKEN')) ?? nonEmpty(read('GITHUB_ACCESS_TOKEN')),
      url: nonEmpty(read('GITHUB_URL')) ?? 'https://api.github.com',
    }),
  };

  return Object.freeze(config);
}

/**
 * Throws when a secret the requested operation needs is absent.
 * `platform` also requires the hosting platform token.
 */
export function assertCredentials(
  config: InvokerConfig,
  { platform }: { platform: boolean },
): void {
  const missing: string[] = [];
  if (!config.apiKey) {
    missing.push(`LLM_API_KEY (or ${config.provider.toUpperCase()}_API_KEY)`);
  }
  if (platform && !config.github.token) {
    missing.push('GITHUB_TOKEN');
  }
  if (missing.length > 0) {
    throw new ConfigurationError(`Missing required secret: ${missing.join(', ')}`, {
      missing,
    });
  }
}
