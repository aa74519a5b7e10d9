import { describe, expect, it } from 'vitest';
import {
  createEnvSecretResolver,
  DEFAULT_CLIENT_CONFIG,
  resolveClientConfig,
  resolveProviderConfig,
} from './config.js';
import { ConfigurationError } from './sdk/errors.js';

describe('resolveClientConfig', () => {
  it('returns the defaults for an empty config', () => {
    expect(resolveClientConfig()).toEqual({ ...DEFAULT_CLIENT_CONFIG, logger: undefined });
    expect(DEFAULT_CLIENT_CONFIG).toEqual({ timeoutMs: 30000, maxRetries: 3, retryDelayMs: 1000, debug: false });
  });

  it('merges a partial config over the defaults', () => {
    expect(resolveClientConfig({ maxRetries: 0, debug: true })).toMatchObject({
      timeoutMs: 30000,
      maxRetries: 0,
      retryDelayMs: 1000,
      debug: true,
    });
  });

  it.each([
    [{ timeoutMs: -1 }, 'timeoutMs'],
    [{ maxRetries: Number.NaN }, 'maxRetries'],
    [{ retryDelayMs: Number.POSITIVE_INFINITY }, 'retryDelayMs'],
  ])('rejects %o', (partial, field) => {
    expect(() => resolveClientConfig(partial)).toThrow(ConfigurationError);
    expect(() => resolveClientConfig(partial)).toThrow(`${field} must be a non-negative number`);
  });

  it.each([
    [{ timeoutMs: 3_000_000_000 }, 'timeoutMs'],
    [{ retryDelayMs: 2_147_483_648 }, 'retryDelayMs'],
  ])('rejects %o beyond the timer range', (partial, field) => {
    expect(() => resolveClientConfig(partial)).toThrow(ConfigurationError);
    expect(() => resolveClientConfig(partial)).toThrow(`${field} must be at most 2147483647`);
  });

  it('accepts the largest timer delay', () => {
    expect(resolveClientConfig({ timeoutMs: 2_147_483_647 }).timeoutMs).toBe(2_147_483_647);
  });

  it('rejects an infinite timeout', () => {
    expect(() => resolveClientConfig({ timeoutMs: Number.POSITIVE_INFINITY })).toThrow(
      'timeoutMs must be a non-negative number',
    );
  });
});

describe('createEnvSecretResolver', () => {
  it('reads values and treats blanks as missing', async () => {
    const resolver = createEnvSecretResolver({ PRESENT: 'value', BLANK: '  ' });
    await expect(resolver.getSecret('PRESENT')).resolves.toBe('value');
    await expect(resolver.getSecret('BLANK')).resolves.toBeNull();
    await expect(resolver.getSecret('ABSENT')).resolves.toBeNull();
  });
});

describe('resolveProviderConfig', () => {
  it('reads the prefixed variables of the provider', async () => {
    const resolver = createEnvSecretResolver({
      KLING_API_KEY: 'ak',
      KLING_SECRET_KEY: 'sk',
      KLING_BASE_URL: 'https://kling.test',
      VIDU_API_KEY: 'test-key',
    });
    await expect(resolveProviderConfig('kling', resolver)).resolves.toEqual({
      apiKey: 'ak',
      secretKey: 'sk',
      baseUrl: 'https://kling.test',
    });
    await expect(resolveProviderConfig('vidu', resolver)).resolves.toEqual({ apiKey: 'test-key' });
  });

  it('requires the API key', async () => {
    const error = await resolveProviderConfig('jimeng', createEnvSecretResolver({})).catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error).toMatchObject({
      code: 'R002',
      message: 'JIMENG_API_KEY is required to use the jimeng provider.',
    });
  });
});
