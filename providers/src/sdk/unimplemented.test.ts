import { describe, expect, it } from 'vitest';
import { isRetryableError, NotImplementedError, ValidationError } from './errors.js';
import { createJimengProvider } from './jimeng/adapter.js';
import { createViduProvider } from './vidu/adapter.js';

describe('stub vendors', () => {
  const jimeng = createJimengProvider({ apiKey: 'test-key' });
  const vidu = createViduProvider({ apiKey: 'test-key' });

  it('report their names and model lists', () => {
    expect(jimeng.name).toBe('Jimeng');
    expect(jimeng.supportedModels()).toEqual(['jimeng-v1', 'jimeng-v2']);
    expect(vidu.name).toBe('Vidu');
    expect(vidu.supportedModels()).toEqual(['vidu-v1', 'vidu-v2']);
  });

  it('validate models against their own list', () => {
    const request = { prompt: 'p', duration: 4, width: 640, height: 480 };
    expect(() => vidu.validateRequest(request)).not.toThrow();
    expect(() => vidu.validateRequest({ ...request, model: 'vidu-v2' })).not.toThrow();
    expect(() => vidu.validateRequest({ ...request, model: 'jimeng-v1' })).toThrow(ValidationError);
  });

  it('reject generation calls as not implemented', async () => {
    const request = { prompt: 'p', duration: 5, width: 640, height: 480 };
    await expect(jimeng.createGeneration(request)).rejects.toThrow('Jimeng provider not yet implemented');
    const error = await vidu.getGeneration('task').catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(NotImplementedError);
    expect(isRetryableError(error)).toBe(false);
  });
});
