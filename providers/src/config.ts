import process from 'node:process';
import { RuntimeErrorCode, type Logger } from '@vidbridge/core';
import type { ProviderConfig, ProviderType, SecretResolver } from './types.js';
import { MAX_TIMER_DELAY_MS } from './sdk/abort.js';
import { ConfigurationError } from './sdk/errors.js';

/**
 * Client-level behavior. `timeoutMs` bounds each individual createGeneration /
 * getGeneration call, never a whole waitForCompletion run.
 */
export interface ClientConfig {
  timeoutMs: number;
  maxRetries: number;
  retryDelayMs: number;
  /** Installs a debug console logger when no `logger` is given. */
  debug: boolean;
  logger?: Logger;
}

export const DEFAULT_CLIENT_CONFIG: Readonly<ClientConfig> = {
  timeoutMs: 30_000,
  maxRetries: 3,
  retryDelayMs: 1_000,
  debug: false,
};

function requireInRange(name: string, value: number): number {
  if (!Number.isFinite(value) || value < 0) {
    throw new ConfigurationError(`invalid client config: ${name} must be a non-negative number, got ${value}`, {
      code: RuntimeErrorCode.INVALID_CLIENT_CONFIG,
    });
  }
  if (value > MAX_TIMER_DELAY_MS) {
    throw new ConfigurationError(`invalid client config: ${name} must be at most ${MAX_TIMER_DELAY_MS}, got ${value}`, {
      code: RuntimeErrorCode.INVALID_CLIENT_CONFIG,
    });
  }
  return value;
}

/**
 * Fills unset fields from DEFAULT_CLIENT_CONFIG. Numbers must be finite,
 * non-negative and within the timer range.
 */
export function resolveClientConfig(partial: Partial<ClientConfig> = {}): ClientConfig {
  return {
    timeoutMs: requireInRange('timeoutMs', partial.timeoutMs ?? DEFAULT_CLIENT_CONFIG.timeoutMs),
    maxRetries: Math.floor(requireInRange('maxRetries', partial.maxRetries ?? DEFAULT_CLIENT_CONFIG.maxRetries)),
    retryDelayMs: requireInRange('retryDelayMs', partial.retryDelayMs ?? DEFAULT_CLIENT_CONFIG.retryDelayMs),
    debug: partial.debug ?? DEFAULT_CLIENT_CONFIG.debug,
    logger: partial.logger,
  };
}

export function createEnvSecretResolver(env: NodeJS.ProcessEnv = process.env): SecretResolver {
  return {
    async getSecret(key: string): Promise<string | null> {
      const value = env[key];
      return value && value.trim() ? value : null;
    },
  };
}

const ENV_PREFIXES: Record<ProviderType, string> = {
  kling: 'KLING',
  jimeng: 'JIMENG',
  vidu: 'VIDU',
};

/**
 * Builds a ProviderConfig from `<PREFIX>_API_KEY`, `<PREFIX>_SECRET_KEY` and
 * `<PREFIX>_BASE_URL`. Only the API key is required.
 */
export async function resolveProviderConfig(
  providerType: ProviderType,
  secretResolver: SecretResolver,
): Promise<ProviderConfig> {
  const prefix = ENV_PREFIXES[providerType];
  const apiKeyName = `${prefix}_API_KEY`;

  const apiKey = await secretResolver.getSecret(apiKeyName);
  if (!apiKey) {
    throw new ConfigurationError(`${apiKeyName} is required to use the ${providerType} provider.`, {
      code: RuntimeErrorCode.MISSING_SECRET,
      provider: providerType,
      suggestion: `Set ${apiKeyName} in the environment or in a .env file at the workspace root.`,
    });
  }

  const config: ProviderConfig = { apiKey };
  const secretKey = await secretResolver.getSecret(`${prefix}_SECRET_KEY`);
  if (secretKey) {
    config.secretKey = secretKey;
  }
  const baseUrl = await secretResolver.getSecret(`${prefix}_BASE_URL`);
  if (baseUrl) {
    config.baseUrl = baseUrl;
  }
  return config;
}
