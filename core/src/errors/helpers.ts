/**
 * Error creation helpers for the vidbridge error system.
 */

import type { ErrorCategory, ErrorSeverity, VidbridgeError } from './types.js';
import { getErrorCategory, getErrorSeverity } from './codes.js';

/**
 * Options for creating a vidbridge error.
 */
export interface CreateErrorOptions {
  /** Error code (e.g., 'V002', 'R001') */
  code: string;
  /** Error message */
  message: string;
  /** Element context */
  context?: string;
  /** Suggested fix */
  suggestion?: string;
  /** Original error that caused this error */
  cause?: unknown;
}

class CodedError extends Error implements VidbridgeError {
  readonly code: string;
  readonly category: ErrorCategory;
  readonly severity: ErrorSeverity;
  readonly context?: string;
  readonly suggestion?: string;

  constructor(options: CreateErrorOptions) {
    super(options.message, { cause: options.cause });
    this.name = 'VidbridgeError';
    this.code = options.code;
    this.category = getErrorCategory(options.code);
    this.severity = getErrorSeverity(options.code);
    this.context = options.context;
    this.suggestion = options.suggestion;
  }
}

/**
 * Creates a VidbridgeError with the given options.
 *
 * The category and severity are inferred from the error code.
 */
export function createVidbridgeError(options: CreateErrorOptions): VidbridgeError {
  return new CodedError(options);
}

/**
 * Creates a runtime error (R-code).
 */
export function createRuntimeError(
  code: string,
  message: string,
  options: {
    context?: string;
    suggestion?: string;
    cause?: unknown;
  } = {},
): VidbridgeError {
  return createVidbridgeError({ code, message, ...options });
}

// =============================================================================
// Error Formatting
// =============================================================================

/**
 * Formats a VidbridgeError for display.
 */
export function formatError(error: VidbridgeError): string {
  const parts: string[] = [];

  parts.push(`[${error.code}] ${error.message}`);

  if (error.context) {
    parts.push(`  Context: ${error.context}`);
  }

  if (error.suggestion) {
    parts.push(`  Suggestion: ${error.suggestion}`);
  }

  return parts.join('\n');
}
