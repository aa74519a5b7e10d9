/**
 * Relay-surface failure. `code` is a snake_case identifier for the relay
 * host (e.g. `invalid_request`, `kling_error_1102`); `localError` tells
 * whether the vendor was ever reached.
 */
export class RelayError extends Error {
  readonly statusCode: number;
  readonly code: string;
  readonly localError: boolean;

  constructor(statusCode: number, code: string, message: string, localError: boolean, options: { cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'RelayError';
    this.statusCode = statusCode;
    this.code = code;
    this.localError = localError;
  }
}

export function isRelayError(error: unknown): error is RelayError {
  return error instanceof RelayError;
}

export function localRelayError(code: string, error: unknown, statusCode = 500): RelayError {
  const message = error instanceof Error ? error.message : String(error);
  return new RelayError(statusCode, code, message, true, { cause: error });
}
