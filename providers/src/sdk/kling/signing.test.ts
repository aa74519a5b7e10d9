import jwt, { type JwtPayload } from 'jsonwebtoken';
import { describe, expect, it } from 'vitest';
import { ConfigurationError } from '../errors.js';
import { parseKlingApiKey, signKlingToken } from './signing.js';

function decodePayload(token: string): JwtPayload {
  const decoded = jwt.decode(token, { complete: true });
  if (!decoded || typeof decoded.payload === 'string') {
    throw new Error('expected a JSON token payload');
  }
  return decoded.payload;
}

describe('parseKlingApiKey', () => {
  it('splits the composite key', () => {
    expect(parseKlingApiKey('ak,sk')).toEqual({ accessKey: 'ak', secretKey: 'sk' });
  });

  it('trims whitespace around both parts', () => {
    expect(parseKlingApiKey(' ak , sk ')).toEqual({ accessKey: 'ak', secretKey: 'sk' });
  });

  it('joins a separate secret key onto a bare access key', () => {
    expect(parseKlingApiKey('ak', 'sk')).toEqual({ accessKey: 'ak', secretKey: 'sk' });
  });

  it.each(['ak', 'ak,sk,extra', ',sk', 'ak,', ''])('rejects %j', (apiKey) => {
    expect(() => parseKlingApiKey(apiKey)).toThrow(ConfigurationError);
    expect(() => parseKlingApiKey(apiKey)).toThrow(
      "invalid API key format for Kling, expected 'access_key,secret_key'",
    );
  });

  it('tags the format error with the invalid-key code', () => {
    try {
      parseKlingApiKey('ak');
      expect.unreachable();
    } catch (error) {
      expect(error).toMatchObject({ code: 'S002', kind: 'configuration', provider: 'Kling' });
    }
  });
});

describe('signKlingToken', () => {
  const nowMs = 1_700_000_000_000;
  const nowSeconds = 1_700_000_000;

  it('uses the access key as issuer', () => {
    const token = signKlingToken({ accessKey: 'ak', secretKey: 'sk' }, nowMs);
    expect(decodePayload(token).iss).toBe('ak');
  });

  it('sets not-before five seconds back and expiry thirty minutes ahead', () => {
    const payload = decodePayload(signKlingToken({ accessKey: 'ak', secretKey: 'sk' }, nowMs));
    expect(payload.nbf).toBe(nowSeconds - 5);
    expect(payload.exp).toBe(nowSeconds + 1800);
    expect(payload.iat).toBeUndefined();
  });

  it('writes an HS256 JWT header', () => {
    const decoded = jwt.decode(signKlingToken({ accessKey: 'ak', secretKey: 'sk' }, nowMs), { complete: true });
    expect(decoded?.header).toEqual({ alg: 'HS256', typ: 'JWT' });
  });

  it('produces a token that verifies with the secret key', () => {
    const token = signKlingToken({ accessKey: 'ak', secretKey: 'test-secret' });
    const verified = jwt.verify(token, 'test-secret', { algorithms: ['HS256'] });
    expect(typeof verified === 'string' ? verified : verified.iss).toBe('ak');
  });
});
