import type { GenerationRequest, VideoProvider } from '../types.js';
import { NotImplementedError, ValidationError, ValidationErrorCode } from './errors.js';

/**
 * Adapter shell for a vendor whose wire protocol is not wired up yet.
 * Validation works against the declared model list; generation calls reject
 * with NotImplementedError, which the client never retries.
 */
export function createUnimplementedProvider(name: string, models: readonly string[]): VideoProvider {
  return {
    name,
    supportedModels() {
      return [...models];
    },
    validateRequest(request: GenerationRequest) {
      if (request.model && !models.includes(request.model)) {
        throw new ValidationError('model', `unsupported model: ${request.model}`, ValidationErrorCode.UNSUPPORTED_MODEL);
      }
    },
    async createGeneration() {
      throw new NotImplementedError(name);
    },
    async getGeneration() {
      throw new NotImplementedError(name);
    },
  };
}
