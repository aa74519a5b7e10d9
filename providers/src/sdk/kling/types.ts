/**
 * Kling wire shapes for the open video-generation API.
 *
 * POST {baseUrl}/api/open/v1/video/generation
 * GET  {baseUrl}/api/open/v1/video/generation/{task_id}
 */

export type KlingMode = 'txt2video' | 'img2video' | 'std' | 'pro';

export type KlingDuration = '5' | '10';

export type KlingAspectRatio = '16:9' | '9:16' | '1:1';

export interface KlingGenerationBody {
  prompt?: string;
  image?: string;
  mode: KlingMode;
  duration: KlingDuration;
  aspect_ratio: KlingAspectRatio;
  model: string;
  cfg_scale?: number;
  negative_prompt?: string;
}

export interface KlingEnvelope<T> {
  code: number;
  message: string;
  data?: T;
}

export interface KlingSubmitData {
  task_id: string;
}

export interface KlingVideo {
  id?: string;
  url: string;
  duration?: string;
}

export interface KlingTaskData {
  id: string;
  status: string;
  task_status_msg?: string;
  task_result?: {
    videos?: KlingVideo[];
  };
}
