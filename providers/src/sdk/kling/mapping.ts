import type { GenerationRequest, GenerationResponse, TaskResult, TaskStatus } from '../../types.js';
import { ApiError, LocalError, SdkErrorCode } from '../errors.js';
import type {
  KlingAspectRatio,
  KlingGenerationBody,
  KlingTaskData,
  KlingVideo,
} from './types.js';

export const KLING_PROVIDER_NAME = 'Kling';

export const KLING_MODELS: readonly string[] = ['kling-v1', 'kling-v1-6', 'kling-v2-master'];

export const DEFAULT_KLING_MODEL = 'kling-v2-master';

export const KLING_DURATIONS: readonly number[] = [5, 10];

export const KLING_VIDEO_FORMAT = 'mp4';

export function resolveAspectRatio(width: number, height: number): KlingAspectRatio {
  const ratio = width / height;
  if (ratio > 1.5) {
    return '16:9';
  }
  if (ratio < 0.7) {
    return '9:16';
  }
  return '1:1';
}

/**
 * Vendor status vocabulary to the canonical one. Unrecognized values map to
 * `queued` so polling keeps going.
 */
export function mapKlingStatus(status: string): TaskStatus {
  switch (status) {
    case 'submitted':
    case 'queued':
      return 'queued';
    case 'processing':
      return 'processing';
    case 'succeed':
      return 'succeeded';
    case 'failed':
      return 'failed';
    default:
      return 'queued';
  }
}

export function isKnownKlingStatus(status: string): boolean {
  return ['submitted', 'queued', 'processing', 'succeed', 'failed'].includes(status);
}

export function toKlingBody(request: GenerationRequest): KlingGenerationBody {
  const options = request.providerOptions?.kling;
  const body: KlingGenerationBody = {
    prompt: request.prompt || undefined,
    image: request.image || undefined,
    mode: options?.mode ?? (request.image ? 'img2video' : 'txt2video'),
    duration: request.duration === 10 ? '10' : '5',
    aspect_ratio: resolveAspectRatio(request.width, request.height),
    model: request.model || DEFAULT_KLING_MODEL,
  };

  if (options?.cfgScale !== undefined) {
    body.cfg_scale = options.cfgScale;
  }
  if (options?.negativePrompt) {
    body.negative_prompt = options.negativePrompt;
  }
  return body;
}

/**
 * Strict decimal parse: empty or non-numeric text yields undefined.
 */
export function parseVideoDuration(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

export interface TaskConversionHooks {
  onUnparsableDuration?(video: KlingVideo): void;
}

export function toTaskResult(data: KlingTaskData, hooks: TaskConversionHooks = {}): TaskResult {
  const result: TaskResult = {
    taskId: data.id,
    status: mapKlingStatus(data.status),
  };

  const video = data.task_result?.videos?.[0];
  if (video) {
    result.url = video.url;
    result.format = KLING_VIDEO_FORMAT;

    const duration = parseVideoDuration(video.duration);
    if (duration !== undefined) {
      result.metadata = { duration, format: KLING_VIDEO_FORMAT };
    } else {
      hooks.onUnparsableDuration?.(video);
    }
  }

  if (result.status === 'failed') {
    // Kling reports no numeric code for failed tasks.
    result.error = { code: 0, message: data.task_status_msg || 'video generation failed' };
  }

  return result;
}

// =============================================================================
// Envelope decoding
// =============================================================================

type UnknownRecord = Record<string, unknown>;

function isRecord(value: unknown): value is UnknownRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function decodeError(detail: string): LocalError {
  return new LocalError(SdkErrorCode.RESPONSE_DECODING_FAILED, `failed to decode response: ${detail}`, {
    provider: KLING_PROVIDER_NAME,
  });
}

/**
 * Checks the `{ code, message, data }` envelope and returns `data`. A non-zero
 * code becomes an ApiError tagged with the provider name.
 */
function unwrapEnvelope(payload: unknown): UnknownRecord {
  if (!isRecord(payload) || typeof payload.code !== 'number') {
    throw decodeError('missing numeric "code" in envelope');
  }
  if (payload.code !== 0) {
    const message = typeof payload.message === 'string' ? payload.message : '';
    throw new ApiError(payload.code, message, KLING_PROVIDER_NAME);
  }
  if (!isRecord(payload.data)) {
    throw decodeError('missing "data" object in envelope');
  }
  return payload.data;
}

export function decodeGenerationResponse(payload: unknown): GenerationResponse {
  const data = unwrapEnvelope(payload);
  if (typeof data.task_id !== 'string' || data.task_id === '') {
    throw decodeError('missing "data.task_id"');
  }
  return { taskId: data.task_id, status: 'queued' };
}

function decodeVideo(value: unknown): KlingVideo | undefined {
  if (!isRecord(value) || typeof value.url !== 'string') {
    return undefined;
  }
  return {
    id: typeof value.id === 'string' ? value.id : undefined,
    url: value.url,
    duration: typeof value.duration === 'string' ? value.duration : undefined,
  };
}

export function decodeTaskData(payload: unknown): KlingTaskData {
  const data = unwrapEnvelope(payload);
  if (typeof data.id !== 'string' || typeof data.status !== 'string') {
    throw decodeError('missing "data.id" or "data.status"');
  }

  const task: KlingTaskData = { id: data.id, status: data.status };
  if (typeof data.task_status_msg === 'string') {
    task.task_status_msg = data.task_status_msg;
  }
  if (isRecord(data.task_result) && Array.isArray(data.task_result.videos)) {
    const videos: KlingVideo[] = [];
    for (const entry of data.task_result.videos) {
      const video = decodeVideo(entry);
      if (video) {
        videos.push(video);
      }
    }
    task.task_result = { videos };
  }
  return task;
}
