export { createKlingProvider, DEFAULT_KLING_BASE_URL, DEFAULT_KLING_GENERATION_PATH } from './adapter.js';
export {
  DEFAULT_KLING_MODEL,
  KLING_MODELS,
  mapKlingStatus,
  resolveAspectRatio,
  toKlingBody,
  toTaskResult,
} from './mapping.js';
export { parseKlingApiKey, signKlingToken, TOKEN_TTL_SECONDS } from './signing.js';
export type { KlingCredentials } from './signing.js';
export type * from './types.js';
