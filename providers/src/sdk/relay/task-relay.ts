import type { ProviderFactoryOptions } from '../../types.js';
import { UnsupportedProviderError } from '../errors.js';
import { createKlingRelayAdaptor } from './kling-relay.js';
import type { TaskRelay, TaskRelayAdaptor } from './types.js';

export const SUPPORTED_RELAY_VENDORS: readonly string[] = ['kling'];

function createRelayAdaptor(vendor: string, options: ProviderFactoryOptions): TaskRelayAdaptor {
  switch (vendor) {
    case 'kling':
      return createKlingRelayAdaptor(options);
    default:
      throw new UnsupportedProviderError(vendor);
  }
}

/**
 * Relay front for a vendor. Exposes every phase of the adaptor plus the two
 * end-to-end workflows built from them.
 */
export function createTaskRelay(vendor = 'kling', options: ProviderFactoryOptions = {}): TaskRelay {
  const adaptor = createRelayAdaptor(vendor, options);
  const { logger } = options;

  return {
    ...adaptor,
    vendor,

    async processVideoGeneration(info, requestBody, callOptions = {}) {
      adaptor.init(info);
      const request = adaptor.validateRequestAndSetAction(requestBody, info.action);
      const url = adaptor.buildRequestUrl();
      const headers = adaptor.buildRequestHeader();
      const body = adaptor.buildRequestBody(request);

      const response = await adaptor.doRequest(url, headers, body, callOptions);
      const result = await adaptor.doResponse(response);
      logger?.debug?.('providers.relay.submitted', { vendor, channelType: info.channelType, taskId: result.taskId });
      return result;
    },

    async processTaskFetch(info, taskId, callOptions = {}) {
      adaptor.init(info);
      return adaptor.fetchTask(info.baseUrl, info.apiKey, taskId, callOptions);
    },
  };
}
