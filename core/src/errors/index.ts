/**
 * vidbridge error system
 *
 * - V (Validation): request validation errors
 * - R (Runtime): configuration and environment errors
 * - S (SDK/Provider): provider-level errors
 * - W (Warnings): soft warnings
 */

// Types
export type {
  ErrorCategory,
  ErrorSeverity,
  VidbridgeError,
} from './types.js';
export { isVidbridgeError } from './types.js';

// Error Codes
export {
  ValidationErrorCode,
  RuntimeErrorCode,
  SdkErrorCode,
  WarningCode,
  ERROR_CODE_CATEGORIES,
  getErrorCategory,
  getErrorSeverity,
} from './codes.js';
export type {
  ValidationErrorCodeValue,
  RuntimeErrorCodeValue,
  SdkErrorCodeValue,
  WarningCodeValue,
  ErrorCode,
  ErrorCodePrefix,
} from './codes.js';

// Helpers
export type { CreateErrorOptions } from './helpers.js';
export {
  createVidbridgeError,
  createRuntimeError,
  formatError,
} from './helpers.js';
