import type { ProviderConfig, VideoProvider } from '../../types.js';
import { createUnimplementedProvider } from '../unimplemented.js';

export const JIMENG_MODELS: readonly string[] = ['jimeng-v1', 'jimeng-v2'];

export function createJimengProvider(_config: ProviderConfig): VideoProvider {
  return createUnimplementedProvider('Jimeng', JIMENG_MODELS);
}
