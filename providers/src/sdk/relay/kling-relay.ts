import type {
  FetchLike,
  GenerationRequest,
  KlingTier,
  PhasedProvider,
  ProviderFactoryOptions,
  QualityLevel,
  TaskResult,
} from '../../types.js';
import { withTimeout } from '../abort.js';
import { ApiError } from '../errors.js';
import { createKlingProvider, DEFAULT_KLING_BASE_URL, DEFAULT_PROVIDER_TIMEOUT_MS } from '../kling/adapter.js';
import { KLING_MODELS } from '../kling/mapping.js';
import { localRelayError, RelayError } from './errors.js';
import { checkRelayPayload } from './schema.js';
import type { RelayCallOptions, RelaySubmitRequest, TaskRelayAdaptor, TaskRelayInfo } from './types.js';

export const KLING_RELAY_GENERATION_PATH = '/v1/videos/image2video';
export const RELAY_DEFAULT_MODEL = 'kling-v1';
export const RELAY_DEFAULT_CFG_SCALE = 0.5;
export const RELAY_DEFAULT_SIZE = { width: 1024, height: 1024 } as const;

const GENERATE_ACTION = 'generate';

/**
 * `WIDTHxHEIGHT` to pixel dimensions; anything else gives 1024x1024.
 */
export function parseRelaySize(size: string | undefined): { width: number; height: number } {
  const match = /^(\d+)x(\d+)$/.exec(size?.trim() ?? '');
  if (!match) {
    return { ...RELAY_DEFAULT_SIZE };
  }
  const width = Number(match[1]);
  const height = Number(match[2]);
  return width > 0 && height > 0 ? { width, height } : { ...RELAY_DEFAULT_SIZE };
}

function resolveRelayMode(request: RelaySubmitRequest): string {
  if (request.mode) {
    return request.mode;
  }
  const fromMetadata = request.metadata?.mode;
  return typeof fromMetadata === 'string' && fromMetadata ? fromMetadata : 'std';
}

/**
 * Relay submission to the canonical request the Kling adapter consumes. The
 * std/pro tier goes on the wire as `mode`; any other mode string counts as std.
 */
export function toGenerationRequest(request: RelaySubmitRequest): GenerationRequest {
  const mode = resolveRelayMode(request);
  const tier: KlingTier = mode === 'pro' ? 'pro' : 'std';
  const quality: QualityLevel = tier === 'pro' ? 'high' : 'standard';
  return {
    prompt: request.prompt,
    image: request.image,
    duration: request.duration === 10 ? 10 : 5,
    ...parseRelaySize(request.size),
    model: request.model || RELAY_DEFAULT_MODEL,
    quality,
    metadata: { ...request.metadata, mode },
    providerOptions: { kling: { cfgScale: RELAY_DEFAULT_CFG_SCALE, mode: tier } },
  };
}

function invalidRequest(message: string): RelayError {
  return new RelayError(400, 'invalid_request', message, true);
}

/**
 * Maps an adapter error raised while decoding a vendor payload.
 */
function toResponseError(error: unknown, statusCode: number): RelayError {
  if (error instanceof ApiError) {
    return new RelayError(statusCode, `kling_error_${error.apiCode}`, error.apiMessage, false, { cause: error });
  }
  return localRelayError('unmarshal_response_body_failed', error);
}

type UnknownRecord = Record<string, unknown>;

function isRecord(value: unknown): value is UnknownRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Relay binding for Kling. Request building, signing and response decoding
 * all go through the Kling adapter; only the endpoint path differs.
 */
export function createKlingRelayAdaptor(options: ProviderFactoryOptions = {}): TaskRelayAdaptor {
  const { logger } = options;
  let binding: PhasedProvider | undefined;
  let timeoutMs = DEFAULT_PROVIDER_TIMEOUT_MS;
  const defaultTransport: FetchLike = (input, init) => globalThis.fetch(input, init);
  let transport = defaultTransport;

  function bind(info: Pick<TaskRelayInfo, 'baseUrl' | 'apiKey' | 'timeoutMs' | 'fetch'>): PhasedProvider {
    try {
      return createKlingProvider(
        {
          baseUrl: info.baseUrl || DEFAULT_KLING_BASE_URL,
          apiKey: info.apiKey,
          timeoutMs: info.timeoutMs,
          extra: { generationPath: KLING_RELAY_GENERATION_PATH },
          fetch: info.fetch,
        },
        options,
      );
    } catch (error) {
      throw localRelayError('init_failed', error);
    }
  }

  function requireBinding(): PhasedProvider {
    if (!binding) {
      throw new RelayError(500, 'not_initialized', 'relay adaptor used before init', true);
    }
    return binding;
  }

  function signedHeaders(provider: PhasedProvider): Record<string, string> {
    try {
      return { ...provider.buildHeaders(), Accept: 'application/json' };
    } catch (error) {
      throw localRelayError('sign_request_failed', error);
    }
  }

  async function send(
    url: string,
    init: { method: 'GET' | 'POST'; headers: Record<string, string>; body?: string },
    callOptions: RelayCallOptions,
  ): Promise<Response> {
    const linked = withTimeout(callOptions.signal, timeoutMs);
    try {
      return await transport(url, { ...init, signal: linked.signal });
    } catch (error) {
      if (callOptions.signal?.aborted) {
        throw callOptions.signal.reason;
      }
      throw localRelayError('request_failed', error);
    } finally {
      linked.dispose();
    }
  }

  async function readJson(response: Response): Promise<{ text: string; payload: unknown }> {
    let text: string;
    try {
      text = await response.text();
    } catch (error) {
      throw localRelayError('read_response_body_failed', error);
    }
    try {
      return { text, payload: JSON.parse(text) };
    } catch (error) {
      logger?.warn?.('providers.relay.unmarshalFailed', { status: response.status, body: text });
      const message = error instanceof Error ? error.message : String(error);
      throw new RelayError(500, 'unmarshal_response_body_failed', `${message}; body: ${text}`, true, { cause: error });
    }
  }

  const adaptor: TaskRelayAdaptor = {
    init(info) {
      binding = bind(info);
      timeoutMs = info.timeoutMs ?? DEFAULT_PROVIDER_TIMEOUT_MS;
      transport = info.fetch ?? defaultTransport;
    },

    validateRequestAndSetAction(requestBody, action) {
      let payload: unknown;
      try {
        payload = JSON.parse(requestBody);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw invalidRequest(`Failed to parse request: ${message}`);
      }

      const checked = checkRelayPayload(payload);
      if (!checked.valid) {
        throw invalidRequest(`Failed to parse request: ${checked.message}`);
      }
      const request = checked.request;

      const normalizedAction = action.toLowerCase();
      if (normalizedAction !== GENERATE_ACTION) {
        throw invalidRequest(`unsupported action: ${normalizedAction}`);
      }
      if (!request.prompt) {
        throw invalidRequest('prompt is required');
      }
      if (request.model && !KLING_MODELS.includes(request.model)) {
        throw invalidRequest(`unsupported model: ${request.model}`);
      }

      return { ...request, model: request.model || RELAY_DEFAULT_MODEL };
    },

    buildRequestUrl() {
      return requireBinding().buildGenerationUrl();
    },

    buildRequestHeader() {
      return signedHeaders(requireBinding());
    },

    buildRequestBody(request) {
      try {
        return requireBinding().buildGenerationBody(toGenerationRequest(request));
      } catch (error) {
        if (error instanceof RelayError) {
          throw error;
        }
        throw localRelayError('build_body_failed', error);
      }
    },

    async doRequest(url, headers, body, callOptions = {}) {
      logger?.debug?.('providers.relay.request', { url });
      return send(url, { method: 'POST', headers, body }, callOptions);
    },

    async doResponse(response) {
      const { text, payload } = await readJson(response);

      // Kling-native envelope: numeric code, 0 on success.
      if (isRecord(payload) && typeof payload.code === 'number') {
        try {
          const { taskId } = requireBinding().parseGenerationResponse(payload);
          return { taskId, body: text };
        } catch (error) {
          if (error instanceof RelayError) {
            throw error;
          }
          throw toResponseError(error, response.status);
        }
      }

      // Generic relay envelope: string code, "success" on success.
      logger?.debug?.('providers.relay.envelopeFallback', { status: response.status });
      if (isRecord(payload) && typeof payload.code === 'string') {
        const message = typeof payload.message === 'string' ? payload.message : '';
        if (payload.code !== 'success') {
          throw new RelayError(response.status, payload.code, message, false);
        }
        if (typeof payload.data === 'string' && payload.data) {
          return { taskId: payload.data, body: text };
        }
      }
      throw new RelayError(500, 'unmarshal_response_body_failed', `unrecognized response body: ${text}`, true);
    },

    async fetchTask(baseUrl, apiKey, taskId, callOptions = {}) {
      const provider = bind({ baseUrl, apiKey, timeoutMs, fetch: transport });
      const headers = signedHeaders(provider);
      delete headers['Content-Type'];
      return send(provider.buildTaskUrl(taskId), { method: 'GET', headers }, callOptions);
    },

    async parseTaskResponse(response): Promise<TaskResult> {
      const { payload } = await readJson(response);
      try {
        return requireBinding().parseTaskResponse(payload);
      } catch (error) {
        if (error instanceof RelayError) {
          throw error;
        }
        throw toResponseError(error, response.status);
      }
    },

    getModelList() {
      return [...KLING_MODELS];
    },

    getChannelName() {
      return 'kling';
    },
  };

  return adaptor;
}
