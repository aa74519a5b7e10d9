import type { FetchLike, ProviderLogger } from '../types.js';
import { withTimeout } from './abort.js';
import { ApiError, LocalError, NetworkError, RateLimitError, SdkErrorCode } from './errors.js';

export interface JsonRequest {
  method: 'GET' | 'POST';
  url: string;
  headers: Record<string, string>;
  body?: string;
  provider: string;
  fetch: FetchLike;
  /** Transport timeout for this single request, body included. */
  timeoutMs: number;
  signal?: AbortSignal;
  logger?: ProviderLogger;
}

export interface JsonResponse {
  status: number;
  payload: unknown;
}

/**
 * Sends one request and decodes the JSON body.
 *
 * Aborts coming from the caller's signal surface as the signal's reason,
 * untouched. Transport failures (including the transport timeout) become a
 * NetworkError. An HTTP error status whose body is not a vendor envelope
 * (non-JSON, or JSON without a numeric `code`) becomes an ApiError keyed by the
 * HTTP status, or a RateLimitError for 429.
 */
export async function requestJson(request: JsonRequest): Promise<JsonResponse> {
  const { method, url, headers, body, provider, logger, signal } = request;
  const linked = withTimeout(signal, request.timeoutMs);

  logger?.debug?.('providers.http.request', { provider, method, url });

  try {
    let response: Response;
    let text: string;
    try {
      response = await request.fetch(url, { method, headers, body, signal: linked.signal });
      text = await response.text();
    } catch (error) {
      if (signal?.aborted) {
        throw signal.reason;
      }
      throw new NetworkError(`failed to make request: ${describe(error)}`, { provider, cause: error });
    }

    logger?.debug?.('providers.http.response', { provider, method, url, status: response.status });

    let payload: unknown;
    try {
      payload = JSON.parse(text);
    } catch (error) {
      if (!response.ok) {
        throw statusError(response, text, provider, error);
      }
      throw new LocalError(SdkErrorCode.RESPONSE_DECODING_FAILED, `failed to decode response: ${describe(error)}`, {
        provider,
        cause: error,
      });
    }

    // Vendor envelopes carry a numeric code; anything else on an error status is a gateway body.
    if (!response.ok && !hasNumericCode(payload)) {
      throw statusError(response, text, provider);
    }
    return { status: response.status, payload };
  } finally {
    linked.dispose();
  }
}

function statusError(response: Response, text: string, provider: string, cause?: unknown): Error {
  if (response.status === 429) {
    return new RateLimitError(`[${provider}] rate limit exceeded (HTTP 429)`, { provider, cause });
  }
  return new ApiError(response.status, text.trim() || response.statusText, provider);
}

function hasNumericCode(payload: unknown): boolean {
  return typeof payload === 'object' && payload !== null && 'code' in payload && typeof payload.code === 'number';
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
