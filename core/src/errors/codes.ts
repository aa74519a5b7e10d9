/**
 * Unified error code constants for vidbridge.
 *
 * Code format: {Category}{Number}
 * - V: Validation errors (V001-V099)
 * - R: Runtime errors (R001-R099)
 * - S: SDK/Provider errors (S001-S099)
 * - W: Warnings (W001-W099)
 */

// =============================================================================
// Validation Error Codes (V001-V099)
// =============================================================================

export const ValidationErrorCode = {
  // V001-V009: Canonical request
  MISSING_REQUEST: 'V001',
  MISSING_PROMPT_OR_IMAGE: 'V002',
  INVALID_DURATION: 'V003',
  INVALID_WIDTH: 'V004',
  INVALID_HEIGHT: 'V005',
  MISSING_TASK_ID: 'V006',

  // V010-V019: Vendor rules
  UNSUPPORTED_MODEL: 'V010',
  UNSUPPORTED_DURATION: 'V011',
} as const;

export type ValidationErrorCodeValue = (typeof ValidationErrorCode)[keyof typeof ValidationErrorCode];

// =============================================================================
// Runtime Error Codes (R001-R099)
// =============================================================================

export const RuntimeErrorCode = {
  // R001-R009: Configuration
  INVALID_CLIENT_CONFIG: 'R001',
  MISSING_SECRET: 'R002',
  INVALID_LOG_LEVEL: 'R003',
} as const;

export type RuntimeErrorCodeValue = (typeof RuntimeErrorCode)[keyof typeof RuntimeErrorCode];

// =============================================================================
// SDK/Provider Error Codes (S001-S099)
// =============================================================================

export const SdkErrorCode = {
  // S001-S009: Configuration
  INVALID_CONFIG: 'S001',
  INVALID_API_KEY: 'S002',
  UNSUPPORTED_PROVIDER: 'S003',
  NOT_IMPLEMENTED: 'S004',

  // S010-S019: Local failures
  TOKEN_SIGNING_FAILED: 'S010',
  REQUEST_ENCODING_FAILED: 'S011',
  RESPONSE_DECODING_FAILED: 'S012',

  // S020-S029: Remote failures
  PROVIDER_API_ERROR: 'S020',
  RATE_LIMITED: 'S021',
  NETWORK_ERROR: 'S022',
  TIMEOUT: 'S023',
} as const;

export type SdkErrorCodeValue = (typeof SdkErrorCode)[keyof typeof SdkErrorCode];

// =============================================================================
// Warning Codes (W001-W099)
// =============================================================================

export const WarningCode = {
  UNPARSABLE_RESULT_DURATION: 'W001',
  UNKNOWN_VENDOR_STATUS: 'W002',
  UNKNOWN_TERMINAL_STATUS: 'W003',
} as const;

export type WarningCodeValue = (typeof WarningCode)[keyof typeof WarningCode];

// =============================================================================
// Combined Types
// =============================================================================

/**
 * All error codes in the system.
 */
export type ErrorCode =
  | ValidationErrorCodeValue
  | RuntimeErrorCodeValue
  | SdkErrorCodeValue
  | WarningCodeValue;

/**
 * Maps error code prefixes to their categories.
 */
export const ERROR_CODE_CATEGORIES = {
  V: 'validation',
  R: 'runtime',
  S: 'sdk',
  W: 'sdk',
} as const;

export type ErrorCodePrefix = keyof typeof ERROR_CODE_CATEGORIES;

function isErrorCodePrefix(value: string): value is ErrorCodePrefix {
  return value in ERROR_CODE_CATEGORIES;
}

/**
 * Gets the category for an error code.
 */
export function getErrorCategory(code: string): 'validation' | 'runtime' | 'sdk' {
  const prefix = code.charAt(0);
  return isErrorCodePrefix(prefix) ? ERROR_CODE_CATEGORIES[prefix] : 'runtime';
}

/**
 * Gets the severity for an error code.
 */
export function getErrorSeverity(code: string): 'error' | 'warning' {
  return code.startsWith('W') ? 'warning' : 'error';
}
