import type { ProviderConfig, ProviderFactoryOptions, ProviderType, VideoProvider } from './types.js';
import { createKlingProvider } from './sdk/kling/adapter.js';
import { createJimengProvider } from './sdk/jimeng/adapter.js';
import { createViduProvider } from './sdk/vidu/adapter.js';
import { UnsupportedProviderError } from './sdk/errors.js';

/**
 * Create the adapter for a provider type.
 *
 * The config is copied field for field, so later changes to the caller's
 * object never reach the adapter. Unknown types fail with
 * UnsupportedProviderError; Kling also fails here on a malformed API key.
 */
export function createProvider(
  providerType: ProviderType | string,
  config: ProviderConfig,
  options: ProviderFactoryOptions = {},
): VideoProvider {
  const providerConfig = copyProviderConfig(config);

  switch (providerType) {
    case 'kling':
      return createKlingProvider(providerConfig, options);
    case 'jimeng':
      return createJimengProvider(providerConfig);
    case 'vidu':
      return createViduProvider(providerConfig);
    default:
      throw new UnsupportedProviderError(providerType);
  }
}

function copyProviderConfig(config: ProviderConfig): ProviderConfig {
  return {
    baseUrl: config.baseUrl,
    apiKey: config.apiKey,
    secretKey: config.secretKey,
    timeoutMs: config.timeoutMs,
    retryCount: config.retryCount,
    extra: config.extra ? { ...config.extra } : undefined,
    fetch: config.fetch,
  };
}
