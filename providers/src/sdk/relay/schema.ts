import AjvModule, { type ValidateFunction } from 'ajv';
import type { RelaySubmitRequest } from './types.js';

// ajv ships CommonJS; under NodeNext the class sits on the default export's `default`.
const Ajv = AjvModule.default;

const ajv = new Ajv({ allErrors: true, strict: false });

export const relaySubmitRequestSchema = {
  type: 'object',
  properties: {
    prompt: { type: 'string' },
    model: { type: 'string' },
    mode: { type: 'string' },
    image: { type: 'string' },
    size: { type: 'string' },
    duration: { type: 'integer' },
    metadata: { type: 'object' },
  },
} as const;

type RelayPayload = Omit<RelaySubmitRequest, 'prompt'> & { prompt?: string };

const validateSubmitRequest: ValidateFunction<RelayPayload> = ajv.compile<RelayPayload>(relaySubmitRequestSchema);

export type RelayPayloadCheck =
  | { valid: true; request: RelaySubmitRequest }
  | { valid: false; message: string };

/**
 * Structural check of a decoded relay payload. Unknown fields are ignored and
 * a missing prompt is left for the action rules.
 */
export function checkRelayPayload(payload: unknown): RelayPayloadCheck {
  if (validateSubmitRequest(payload)) {
    return { valid: true, request: { ...payload, prompt: payload.prompt ?? '' } };
  }
  const messages = (validateSubmitRequest.errors ?? []).map((err) => `${err.instancePath || '/'} ${err.message ?? ''}`.trim());
  return { valid: false, message: messages.join('; ') };
}
