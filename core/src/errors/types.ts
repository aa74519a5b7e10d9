/**
 * Shared error types for the vidbridge error system.
 *
 * - V (Validation): request checks done before any network call
 * - R (Runtime): configuration and environment problems
 * - S (SDK/Provider): adapter, transport and vendor failures
 * - W (Warnings): degraded results that did not fail the call
 */

/**
 * Error categories in vidbridge.
 */
export type ErrorCategory = 'validation' | 'runtime' | 'sdk';

/**
 * Severity level for issues.
 */
export type ErrorSeverity = 'error' | 'warning';

/**
 * Base interface for all vidbridge errors.
 */
export interface VidbridgeError extends Error {
  /** Unique error code (e.g., 'V002', 'S020') */
  code: string;
  /** Error category for routing and display */
  category: ErrorCategory;
  /** Severity level */
  severity: ErrorSeverity;
  /** Element context (e.g., "field 'duration'", "provider Kling") */
  context?: string;
  /** Suggested fix (optional) */
  suggestion?: string;
}

/**
 * Type guard to check if an error is a VidbridgeError.
 */
export function isVidbridgeError(error: unknown): error is VidbridgeError {
  if (!(error instanceof Error)) {
    return false;
  }
  const candidate: Error & Partial<Record<'code' | 'category' | 'severity', unknown>> = error;
  return (
    typeof candidate.code === 'string' &&
    typeof candidate.category === 'string' &&
    typeof candidate.severity === 'string'
  );
}
