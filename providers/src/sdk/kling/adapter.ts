import { WarningCode } from '@vidbridge/core';
import type {
  FetchLike,
  GenerationRequest,
  GenerationResponse,
  PhasedProvider,
  ProviderCallOptions,
  ProviderConfig,
  ProviderFactoryOptions,
  TaskResult,
} from '../../types.js';
import { LocalError, SdkErrorCode, ValidationError, ValidationErrorCode } from '../errors.js';
import { requestJson } from '../http.js';
import {
  decodeGenerationResponse,
  decodeTaskData,
  DEFAULT_KLING_MODEL,
  isKnownKlingStatus,
  KLING_DURATIONS,
  KLING_MODELS,
  KLING_PROVIDER_NAME,
  toKlingBody,
  toTaskResult,
} from './mapping.js';
import { parseKlingApiKey, signKlingToken } from './signing.js';

export const DEFAULT_KLING_BASE_URL = 'https://api.klingai.com';
export const DEFAULT_KLING_GENERATION_PATH = '/api/open/v1/video/generation';
export const DEFAULT_USER_AGENT = 'vidbridge-sdk/1.0';
export const DEFAULT_PROVIDER_TIMEOUT_MS = 30_000;

/**
 * Kling adapter. The API key is split once here; an invalid key fails
 * construction. Every HTTP call signs a fresh token.
 */
export function createKlingProvider(
  config: ProviderConfig,
  options: ProviderFactoryOptions = {},
): PhasedProvider {
  const { logger, now = Date.now } = options;
  const credentials = parseKlingApiKey(config.apiKey, config.secretKey);

  const baseUrl = (config.baseUrl || DEFAULT_KLING_BASE_URL).replace(/\/+$/, '');
  const generationPath = config.extra?.generationPath || DEFAULT_KLING_GENERATION_PATH;
  const userAgent = config.extra?.userAgent || DEFAULT_USER_AGENT;
  const timeoutMs = config.timeoutMs ?? DEFAULT_PROVIDER_TIMEOUT_MS;
  const transport: FetchLike = config.fetch ?? ((input, init) => globalThis.fetch(input, init));

  const provider: PhasedProvider = {
    name: KLING_PROVIDER_NAME,

    supportedModels() {
      return [...KLING_MODELS];
    },

    validateRequest(request: GenerationRequest) {
      if (request.model && !KLING_MODELS.includes(request.model)) {
        throw new ValidationError('model', `unsupported model: ${request.model}`, ValidationErrorCode.UNSUPPORTED_MODEL);
      }
      if (!KLING_DURATIONS.includes(request.duration)) {
        throw new ValidationError(
          'duration',
          'Kling only supports 5s or 10s duration',
          ValidationErrorCode.UNSUPPORTED_DURATION,
        );
      }
    },

    buildGenerationUrl() {
      return `${baseUrl}${generationPath}`;
    },

    buildTaskUrl(taskId: string) {
      return `${baseUrl}${generationPath}/${encodeURIComponent(taskId)}`;
    },

    buildHeaders() {
      return {
        Authorization: `Bearer ${signKlingToken(credentials, now())}`,
        'Content-Type': 'application/json',
        'User-Agent': userAgent,
      };
    },

    buildGenerationBody(request: GenerationRequest) {
      try {
        return JSON.stringify(toKlingBody(request));
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new LocalError(SdkErrorCode.REQUEST_ENCODING_FAILED, `failed to marshal request: ${message}`, {
          provider: KLING_PROVIDER_NAME,
          cause: error,
        });
      }
    },

    parseGenerationResponse(payload: unknown): GenerationResponse {
      return decodeGenerationResponse(payload);
    },

    parseTaskResponse(payload: unknown): TaskResult {
      const data = decodeTaskData(payload);
      if (!isKnownKlingStatus(data.status)) {
        logger?.warn?.('providers.kling.unknownStatus', {
          code: WarningCode.UNKNOWN_VENDOR_STATUS,
          taskId: data.id,
          status: data.status,
        });
      }
      return toTaskResult(data, {
        onUnparsableDuration(video) {
          logger?.warn?.('providers.kling.unparsableDuration', {
            code: WarningCode.UNPARSABLE_RESULT_DURATION,
            taskId: data.id,
            duration: video.duration,
          });
        },
      });
    },

    async createGeneration(request: GenerationRequest, callOptions: ProviderCallOptions = {}) {
      const body = provider.buildGenerationBody(request);
      const headers = provider.buildHeaders();

      logger?.debug?.('providers.kling.createGeneration', {
        model: request.model || DEFAULT_KLING_MODEL,
        hasImage: Boolean(request.image),
        duration: request.duration,
      });

      const { payload } = await requestJson({
        method: 'POST',
        url: provider.buildGenerationUrl(),
        headers,
        body,
        provider: KLING_PROVIDER_NAME,
        fetch: transport,
        timeoutMs,
        signal: callOptions.signal,
        logger,
      });
      return provider.parseGenerationResponse(payload);
    },

    async getGeneration(taskId: string, callOptions: ProviderCallOptions = {}) {
      const headers = provider.buildHeaders();
      const { payload } = await requestJson({
        method: 'GET',
        url: provider.buildTaskUrl(taskId),
        headers,
        provider: KLING_PROVIDER_NAME,
        fetch: transport,
        timeoutMs,
        signal: callOptions.signal,
        logger,
      });
      return provider.parseTaskResponse(payload);
    },
  };

  return provider;
}
