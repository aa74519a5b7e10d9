export { createTaskRelay, SUPPORTED_RELAY_VENDORS } from './task-relay.js';
export {
  createKlingRelayAdaptor,
  KLING_RELAY_GENERATION_PATH,
  parseRelaySize,
  RELAY_DEFAULT_MODEL,
  toGenerationRequest,
} from './kling-relay.js';
export { isRelayError, RelayError } from './errors.js';
export { checkRelayPayload, relaySubmitRequestSchema } from './schema.js';
export type * from './types.js';
