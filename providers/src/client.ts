import process from 'node:process';
import { createConsoleLogger, loadEnv, resolveLogLevel, type Logger } from '@vidbridge/core';
import type {
  GenerationRequest,
  GenerationResponse,
  ProviderCallOptions,
  ProviderConfig,
  ProviderType,
  TaskResult,
  VideoProvider,
} from './types.js';
import { isProviderType } from './types.js';
import { createEnvSecretResolver, resolveClientConfig, resolveProviderConfig, type ClientConfig } from './config.js';
import { createProvider } from './registry.js';
import { withTimeout } from './sdk/abort.js';
import { UnsupportedProviderError, ValidationError, ValidationErrorCode } from './sdk/errors.js';
import { pollForCompletion } from './sdk/polling.js';
import { runWithRetries } from './sdk/retry.js';

export interface WaitForCompletionOptions {
  /** Delay before each status check. Non-positive or unset means 5000. */
  pollIntervalMs?: number;
  /** The only bound on the wait: polling has no deadline of its own. */
  signal?: AbortSignal;
}

export interface VideoClient {
  createGeneration(request: GenerationRequest, options?: ProviderCallOptions): Promise<GenerationResponse>;
  getGeneration(taskId: string, options?: ProviderCallOptions): Promise<TaskResult>;
  waitForCompletion(taskId: string, options?: WaitForCompletionOptions): Promise<TaskResult>;
  getProviderName(): string;
  getSupportedModels(): string[];
}

/**
 * Canonical pre-flight checks shared by every vendor. Runs before any
 * network call.
 */
export function validateGenerationRequest(request: GenerationRequest | null | undefined): asserts request is GenerationRequest {
  if (!request) {
    throw new ValidationError('request', 'request cannot be empty', ValidationErrorCode.MISSING_REQUEST);
  }
  if (!request.prompt && !request.image) {
    throw new ValidationError('prompt', 'either prompt or image must be provided', ValidationErrorCode.MISSING_PROMPT_OR_IMAGE);
  }
  // `!(x > 0)` also rejects NaN.
  if (!(request.duration > 0)) {
    throw new ValidationError('duration', 'duration must be positive', ValidationErrorCode.INVALID_DURATION);
  }
  if (!(request.width > 0)) {
    throw new ValidationError('width', 'width must be positive', ValidationErrorCode.INVALID_WIDTH);
  }
  if (!(request.height > 0)) {
    throw new ValidationError('height', 'height must be positive', ValidationErrorCode.INVALID_HEIGHT);
  }
}

function requireTaskId(taskId: string): void {
  if (!taskId) {
    throw new ValidationError('taskId', 'task ID cannot be empty', ValidationErrorCode.MISSING_TASK_ID);
  }
}

function resolveLogger(config: Partial<ClientConfig>): Logger | undefined {
  if (config.logger) {
    return config.logger;
  }
  return config.debug ? createConsoleLogger('debug') : undefined;
}

/**
 * Client over an already constructed adapter. Use this for custom vendors or
 * test doubles; `createClient` covers the built-in ones.
 */
export function createClientWithProvider(provider: VideoProvider, clientConfig: Partial<ClientConfig> = {}): VideoClient {
  const config = resolveClientConfig(clientConfig);
  const logger = resolveLogger(config);

  /**
   * One timeout spans the whole retry sequence of a single call; the
   * caller's signal aborts it at any point.
   */
  async function invoke<T>(
    operation: string,
    signal: AbortSignal | undefined,
    fn: (signal: AbortSignal) => Promise<T>,
  ): Promise<T> {
    const linked = withTimeout(signal, config.timeoutMs);
    try {
      return await runWithRetries(() => fn(linked.signal), {
        maxRetries: config.maxRetries,
        retryDelayMs: config.retryDelayMs,
        signal: linked.signal,
        logger,
        operation,
        provider: provider.name,
      });
    } finally {
      linked.dispose();
    }
  }

  const client: VideoClient = {
    async createGeneration(request, options = {}) {
      validateGenerationRequest(request);
      provider.validateRequest(request);

      const response = await invoke('createGeneration', options.signal, (signal) =>
        provider.createGeneration(request, { signal }),
      );
      logger?.info('providers.client.generationCreated', { provider: provider.name, taskId: response.taskId });
      return response;
    },

    async getGeneration(taskId, options = {}) {
      requireTaskId(taskId);
      return invoke('getGeneration', options.signal, (signal) => provider.getGeneration(taskId, { signal }));
    },

    // The task id is checked by the first getGeneration, after the signal.
    async waitForCompletion(taskId, options = {}) {
      return pollForCompletion(
        (id, signal) => client.getGeneration(id, { signal }),
        taskId,
        {
          intervalMs: options.pollIntervalMs,
          signal: options.signal,
          logger,
          provider: provider.name,
        },
      );
    },

    getProviderName() {
      return provider.name;
    },

    getSupportedModels() {
      return provider.supportedModels();
    },
  };

  return client;
}

/**
 * Client over one of the built-in vendors. `ProviderConfig.retryCount` is the
 * retry budget when `clientConfig.maxRetries` is unset.
 */
export function createClient(
  providerType: ProviderType | string,
  providerConfig: ProviderConfig,
  clientConfig: Partial<ClientConfig> = {},
): VideoClient {
  const merged: Partial<ClientConfig> = {
    ...clientConfig,
    maxRetries: clientConfig.maxRetries ?? providerConfig.retryCount,
  };
  const logger = resolveLogger(merged);
  const provider = createProvider(providerType, providerConfig, { logger });
  return createClientWithProvider(provider, { ...merged, logger });
}

export interface ClientFromEnvOptions {
  /** Where the .env lookup starts. Defaults to the working directory. */
  cwd?: string;
  /** Variables to read after `.env` loading. Defaults to `process.env`. */
  env?: NodeJS.ProcessEnv;
  clientConfig?: Partial<ClientConfig>;
}

/**
 * Loads `.env`, reads `<PREFIX>_API_KEY` and friends, and builds a client.
 * `VIDBRIDGE_LOG_LEVEL` installs a console logger unless one is given.
 */
export async function createClientFromEnv(
  providerType: ProviderType | string,
  options: ClientFromEnvOptions = {},
): Promise<VideoClient> {
  if (!isProviderType(providerType)) {
    throw new UnsupportedProviderError(providerType);
  }

  const clientConfig: Partial<ClientConfig> = { ...options.clientConfig };
  loadEnv({ cwd: options.cwd, logger: clientConfig.logger });

  const env = options.env ?? process.env;
  if (!clientConfig.logger && env.VIDBRIDGE_LOG_LEVEL) {
    clientConfig.logger = createConsoleLogger(resolveLogLevel(env.VIDBRIDGE_LOG_LEVEL));
  }
  const providerConfig = await resolveProviderConfig(providerType, createEnvSecretResolver(env));
  return createClient(providerType, providerConfig, clientConfig);
}
