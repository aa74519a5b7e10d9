export * from './types.js';
export {
  createClient,
  createClientFromEnv,
  createClientWithProvider,
  validateGenerationRequest,
  type ClientFromEnvOptions,
  type VideoClient,
  type WaitForCompletionOptions,
} from './client.js';
export {
  createEnvSecretResolver,
  DEFAULT_CLIENT_CONFIG,
  resolveClientConfig,
  resolveProviderConfig,
  type ClientConfig,
} from './config.js';
export { createProvider } from './registry.js';
export {
  ApiError,
  ConfigurationError,
  isProviderError,
  isRetryableError,
  LocalError,
  NetworkError,
  NotImplementedError,
  ProviderError,
  RateLimitError,
  TimeoutError,
  UnsupportedProviderError,
  ValidationError,
  type ProviderErrorKind,
} from './sdk/errors.js';
export { runWithRetries, type RetryOptions } from './sdk/retry.js';
export { DEFAULT_POLL_INTERVAL_MS, pollForCompletion, type PollingOptions } from './sdk/polling.js';
export * from './sdk/kling/index.js';
export { createJimengProvider, JIMENG_MODELS } from './sdk/jimeng/adapter.js';
export { createViduProvider, VIDU_MODELS } from './sdk/vidu/adapter.js';
export { createUnimplementedProvider } from './sdk/unimplemented.js';
export * from './sdk/relay/index.js';
