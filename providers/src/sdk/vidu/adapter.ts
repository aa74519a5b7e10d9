import type { ProviderConfig, VideoProvider } from '../../types.js';
import { createUnimplementedProvider } from '../unimplemented.js';

export const VIDU_MODELS: readonly string[] = ['vidu-v1', 'vidu-v2'];

export function createViduProvider(_config: ProviderConfig): VideoProvider {
  return createUnimplementedProvider('Vidu', VIDU_MODELS);
}
