import type { Logger } from '@vidbridge/core';

export type TaskStatus = 'queued' | 'processing' | 'succeeded' | 'failed';

export const TaskStatuses = {
  QUEUED: 'queued',
  PROCESSING: 'processing',
  SUCCEEDED: 'succeeded',
  FAILED: 'failed',
} as const satisfies Record<string, TaskStatus>;

export type ResponseFormat = 'url' | 'b64_json';

export type QualityLevel = 'low' | 'standard' | 'high';

export type ProviderType = 'kling' | 'jimeng' | 'vidu';

export const SUPPORTED_PROVIDERS: readonly ProviderType[] = ['kling', 'jimeng', 'vidu'];

export function isProviderType(value: string): value is ProviderType {
  return SUPPORTED_PROVIDERS.some((provider) => provider === value);
}

/**
 * Extra knobs understood by the Kling adapter. Only fields that are set are
 * added to the wire body.
 */
export interface KlingRequestOptions {
  cfgScale?: number;
  negativePrompt?: string;
  /** Generation tier sent as the wire `mode` in place of txt2video/img2video. */
  mode?: KlingTier;
}

export type KlingTier = 'std' | 'pro';

/**
 * Typed, per-vendor extension point of the canonical request.
 */
export interface ProviderRequestOptions {
  kling?: KlingRequestOptions;
}

/**
 * Canonical, vendor-neutral generation request. At least one of `prompt` or
 * `image` must be non-empty. Treated as immutable once submitted.
 */
export interface GenerationRequest {
  readonly prompt?: string;
  /** Image URL or base64 payload for image-to-video. */
  readonly image?: string;
  readonly style?: string;
  /** Seconds. */
  readonly duration: number;
  readonly fps?: number;
  readonly width: number;
  readonly height: number;
  readonly responseFormat?: ResponseFormat;
  readonly quality?: QualityLevel;
  readonly seed?: number;
  readonly model?: string;
  /** Free-form passthrough values (e.g. the relay's `mode`). */
  readonly metadata?: Readonly<Record<string, unknown>>;
  readonly providerOptions?: ProviderRequestOptions;
}

export interface GenerationResponse {
  taskId: string;
  status: TaskStatus;
}

export interface VideoMetadata {
  duration?: number;
  fps?: number;
  width?: number;
  height?: number;
  seed?: number;
  format?: string;
}

export interface TaskError {
  code: number;
  message: string;
}

/**
 * Snapshot of a remote task. `url` and `metadata` are expected when the task
 * succeeded, `error` when it failed.
 */
export interface TaskResult {
  taskId: string;
  status: TaskStatus;
  url?: string;
  format?: string;
  metadata?: VideoMetadata;
  error?: TaskError;
}

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface ProviderConfig {
  baseUrl?: string;
  /** Vendor specific; Kling expects `access_key,secret_key`. */
  apiKey: string;
  secretKey?: string;
  /** Per-request transport timeout. Defaults to 30000. */
  timeoutMs?: number;
  retryCount?: number;
  extra?: Readonly<Record<string, string>>;
  /** Transport override; defaults to the global `fetch`. */
  fetch?: FetchLike;
}

export interface ProviderLogger extends Partial<Logger> {}

export interface ProviderCallOptions {
  signal?: AbortSignal;
}

/**
 * Capability set every vendor adapter implements.
 */
export interface VideoProvider {
  readonly name: string;
  supportedModels(): string[];
  /** Vendor rules only; canonical checks happen in the client. */
  validateRequest(request: GenerationRequest): void;
  createGeneration(request: GenerationRequest, options?: ProviderCallOptions): Promise<GenerationResponse>;
  getGeneration(taskId: string, options?: ProviderCallOptions): Promise<TaskResult>;
}

/**
 * Phase-by-phase view of an adapter, for integrations that run each HTTP step
 * themselves (see the task relay).
 */
export interface PhasedProvider extends VideoProvider {
  buildGenerationUrl(): string;
  buildTaskUrl(taskId: string): string;
  /** Signs a fresh bearer token on every call. */
  buildHeaders(): Record<string, string>;
  buildGenerationBody(request: GenerationRequest): string;
  parseGenerationResponse(payload: unknown): GenerationResponse;
  parseTaskResponse(payload: unknown): TaskResult;
}

export function isPhasedProvider(provider: VideoProvider): provider is PhasedProvider {
  const candidate: Partial<PhasedProvider> = provider;
  return (
    typeof candidate.buildGenerationUrl === 'function' &&
    typeof candidate.buildTaskUrl === 'function' &&
    typeof candidate.buildHeaders === 'function' &&
    typeof candidate.buildGenerationBody === 'function' &&
    typeof candidate.parseGenerationResponse === 'function' &&
    typeof candidate.parseTaskResponse === 'function'
  );
}

export interface SecretResolver {
  getSecret(key: string): Promise<string | null>;
}

export interface ProviderFactoryOptions {
  logger?: ProviderLogger;
  /** Clock used for token timestamps, in milliseconds. */
  now?: () => number;
}
