import { describe, expect, it, vi } from 'vitest';
import { createProvider } from './registry.js';
import { ConfigurationError, UnsupportedProviderError } from './sdk/errors.js';
import { isPhasedProvider } from './types.js';

describe('createProvider', () => {
  it('creates each known vendor', () => {
    expect(createProvider('kling', { apiKey: 'ak,sk' }).name).toBe('Kling');
    expect(createProvider('jimeng', { apiKey: 'test-key' }).name).toBe('Jimeng');
    expect(createProvider('vidu', { apiKey: 'test-key' }).name).toBe('Vidu');
  });

  it('rejects unknown provider types', () => {
    expect(() => createProvider('sora', { apiKey: 'test-key' })).toThrow(UnsupportedProviderError);
    expect(() => createProvider('sora', { apiKey: 'test-key' })).toThrow('unsupported provider: sora');
  });

  it('propagates construction failures', () => {
    expect(() => createProvider('kling', { apiKey: 'ak' })).toThrow(ConfigurationError);
  });

  it('only exposes the phased view on Kling', () => {
    expect(isPhasedProvider(createProvider('kling', { apiKey: 'ak,sk' }))).toBe(true);
    expect(isPhasedProvider(createProvider('vidu', { apiKey: 'test-key' }))).toBe(false);
  });

  it('snapshots the config at construction', () => {
    const extra: Record<string, string> = { generationPath: '/v1/first' };
    const provider = createProvider('kling', { apiKey: 'ak,sk', extra, fetch: vi.fn() });
    extra.generationPath = '/v1/second';

    if (!isPhasedProvider(provider)) {
      throw new Error('expected a phased provider');
    }
    expect(provider.buildGenerationUrl()).toBe('https://api.klingai.com/v1/first');
  });
});
