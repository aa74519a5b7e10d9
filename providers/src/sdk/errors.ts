import {
  getErrorCategory,
  getErrorSeverity,
  SdkErrorCode,
  ValidationErrorCode,
  type ErrorCategory,
  type ErrorSeverity,
  type VidbridgeError,
} from '@vidbridge/core';

export { SdkErrorCode, ValidationErrorCode };

export type ProviderErrorKind =
  | 'validation'
  | 'api'
  | 'network'
  | 'rate_limited'
  | 'timeout'
  | 'configuration'
  | 'unsupported_provider'
  | 'not_implemented'
  | 'local';

export interface ProviderErrorOptions {
  kind: ProviderErrorKind;
  provider?: string;
  retryable?: boolean;
  context?: string;
  suggestion?: string;
  cause?: unknown;
}

/**
 * Base class of every error raised by adapters, the client and the relay.
 * Subclasses keep their identity through the retry loop so callers can
 * branch on `instanceof` or on `kind`.
 */
export class ProviderError extends Error implements VidbridgeError {
  readonly code: string;
  readonly category: ErrorCategory;
  readonly severity: ErrorSeverity;
  readonly kind: ProviderErrorKind;
  readonly provider?: string;
  readonly retryable: boolean;
  readonly context?: string;
  readonly suggestion?: string;

  constructor(code: string, message: string, options: ProviderErrorOptions) {
    super(message, { cause: options.cause });
    this.name = 'ProviderError';
    this.code = code;
    this.category = getErrorCategory(code);
    this.severity = getErrorSeverity(code);
    this.kind = options.kind;
    this.provider = options.provider;
    this.retryable = options.retryable ?? false;
    this.context = options.context;
    this.suggestion = options.suggestion;
  }
}

/**
 * Local, pre-flight request problem. Never sent over the wire, never retried.
 */
export class ValidationError extends ProviderError {
  readonly field: string;

  constructor(field: string, message: string, code: string = ValidationErrorCode.MISSING_REQUEST) {
    super(code, `validation error for field '${field}': ${message}`, {
      kind: 'validation',
      context: `field '${field}'`,
    });
    this.name = 'ValidationError';
    this.field = field;
  }
}

/**
 * The vendor answered but rejected the call. `apiCode` is the vendor's own code.
 */
export class ApiError extends ProviderError {
  readonly apiCode: number;
  readonly apiMessage: string;

  constructor(apiCode: number, apiMessage: string, provider?: string) {
    const prefix = provider ? `[${provider}] ` : '';
    super(SdkErrorCode.PROVIDER_API_ERROR, `${prefix}API error ${apiCode}: ${apiMessage}`, {
      kind: 'api',
      provider,
      retryable: apiCode >= 500 || apiCode === 429,
    });
    this.name = 'ApiError';
    this.apiCode = apiCode;
    this.apiMessage = apiMessage;
  }
}

export class NetworkError extends ProviderError {
  constructor(message: string, options: { provider?: string; cause?: unknown } = {}) {
    super(SdkErrorCode.NETWORK_ERROR, message, { kind: 'network', retryable: true, ...options });
    this.name = 'NetworkError';
  }
}

export class RateLimitError extends ProviderError {
  constructor(message: string, options: { provider?: string; cause?: unknown } = {}) {
    super(SdkErrorCode.RATE_LIMITED, message, { kind: 'rate_limited', retryable: true, ...options });
    this.name = 'RateLimitError';
  }
}

export class TimeoutError extends ProviderError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number, message = `operation timed out after ${timeoutMs}ms`) {
    super(SdkErrorCode.TIMEOUT, message, { kind: 'timeout' });
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export class ConfigurationError extends ProviderError {
  constructor(message: string, options: { code?: string; provider?: string; suggestion?: string; cause?: unknown } = {}) {
    const { code = SdkErrorCode.INVALID_CONFIG, ...rest } = options;
    super(code, message, { kind: 'configuration', ...rest });
    this.name = 'ConfigurationError';
  }
}

export class UnsupportedProviderError extends ProviderError {
  constructor(providerType: string) {
    super(SdkErrorCode.UNSUPPORTED_PROVIDER, `unsupported provider: ${providerType}`, {
      kind: 'unsupported_provider',
      provider: providerType,
      suggestion: 'Use one of: kling, jimeng, vidu.',
    });
    this.name = 'UnsupportedProviderError';
  }
}

export class NotImplementedError extends ProviderError {
  constructor(provider: string) {
    super(SdkErrorCode.NOT_IMPLEMENTED, `${provider} provider not yet implemented`, {
      kind: 'not_implemented',
      provider,
    });
    this.name = 'NotImplementedError';
  }
}

/**
 * Deterministic local failure: encoding, decoding or token signing.
 */
export class LocalError extends ProviderError {
  constructor(code: string, message: string, options: { provider?: string; cause?: unknown } = {}) {
    super(code, message, { kind: 'local', ...options });
    this.name = 'LocalError';
  }
}

export function isProviderError(error: unknown): error is ProviderError {
  return error instanceof ProviderError;
}

/**
 * Server-side overload (5xx), rate limiting (429) and transport failures are
 * worth another attempt; everything else reproduces the same failure.
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof ApiError) {
    return error.apiCode >= 500 || error.apiCode === 429;
  }
  return error instanceof NetworkError || error instanceof RateLimitError;
}
