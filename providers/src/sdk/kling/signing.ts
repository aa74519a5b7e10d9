import jwt from 'jsonwebtoken';
import { ConfigurationError, LocalError, SdkErrorCode } from '../errors.js';

export const TOKEN_TTL_SECONDS = 1800;
export const TOKEN_NOT_BEFORE_SKEW_SECONDS = 5;

export interface KlingCredentials {
  accessKey: string;
  secretKey: string;
}

const KEY_FORMAT_MESSAGE = "invalid API key format for Kling, expected 'access_key,secret_key'";

/**
 * Splits the composite `access_key,secret_key` string. A separate `secretKey`
 * is accepted when `apiKey` holds only the access key.
 */
export function parseKlingApiKey(apiKey: string, secretKey?: string): KlingCredentials {
  const composite = secretKey && !apiKey.includes(',') ? `${apiKey},${secretKey}` : apiKey;
  const parts = composite.split(',').map((part) => part.trim());
  if (parts.length !== 2 || !parts[0] || !parts[1]) {
    throw new ConfigurationError(KEY_FORMAT_MESSAGE, {
      code: SdkErrorCode.INVALID_API_KEY,
      provider: 'Kling',
    });
  }
  return { accessKey: parts[0], secretKey: parts[1] };
}

/**
 * Short-lived HS256 bearer token: issuer is the access key, valid from five
 * seconds ago for thirty minutes.
 */
export function signKlingToken(credentials: KlingCredentials, nowMs: number = Date.now()): string {
  const now = Math.floor(nowMs / 1000);
  try {
    return jwt.sign(
      {
        iss: credentials.accessKey,
        exp: now + TOKEN_TTL_SECONDS,
        nbf: now - TOKEN_NOT_BEFORE_SKEW_SECONDS,
      },
      credentials.secretKey,
      {
        algorithm: 'HS256',
        header: { alg: 'HS256', typ: 'JWT' },
        noTimestamp: true,
      },
    );
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new LocalError(SdkErrorCode.TOKEN_SIGNING_FAILED, `failed to create JWT token: ${message}`, {
      provider: 'Kling',
      cause: error,
    });
  }
}
