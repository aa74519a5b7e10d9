import type { FetchLike, TaskResult } from '../../types.js';

/**
 * Per-call routing data handed over by the relay host.
 */
export interface TaskRelayInfo {
  channelType: number;
  /** Defaults to https://api.klingai.com. */
  baseUrl?: string;
  /** `access_key,secret_key` for Kling. */
  apiKey: string;
  /** Only `generate` is accepted (case-insensitive). */
  action: string;
  timeoutMs?: number;
  fetch?: FetchLike;
}

/**
 * Vendor-neutral submission accepted on the relay surface.
 */
export interface RelaySubmitRequest {
  prompt: string;
  model?: string;
  /** `std` or `pro`. */
  mode?: string;
  image?: string;
  /** `WIDTHxHEIGHT`, e.g. `1280x720`. */
  size?: string;
  duration?: number;
  metadata?: Record<string, unknown>;
}

export interface RelaySubmitResult {
  taskId: string;
  /** Raw vendor response text, passed through to the relay host. */
  body: string;
}

export interface RelayCallOptions {
  signal?: AbortSignal;
}

/**
 * Phase-by-phase binding for relay hosts that run each HTTP step themselves.
 * Every phase throws a RelayError on failure.
 */
export interface TaskRelayAdaptor {
  init(info: TaskRelayInfo): void;
  validateRequestAndSetAction(requestBody: string, action: string): RelaySubmitRequest;
  buildRequestUrl(): string;
  /** Signs a fresh bearer token; signing failure is fatal. */
  buildRequestHeader(): Record<string, string>;
  buildRequestBody(request: RelaySubmitRequest): string;
  doRequest(url: string, headers: Record<string, string>, body: string, options?: RelayCallOptions): Promise<Response>;
  doResponse(response: Response): Promise<RelaySubmitResult>;
  fetchTask(baseUrl: string | undefined, apiKey: string, taskId: string, options?: RelayCallOptions): Promise<Response>;
  /** Decodes a fetched task into the canonical result. */
  parseTaskResponse(response: Response): Promise<TaskResult>;
  getModelList(): string[];
  getChannelName(): string;
}

export interface TaskRelay extends TaskRelayAdaptor {
  readonly vendor: string;
  /** init, validate, URL, headers, body, request, response. */
  processVideoGeneration(info: TaskRelayInfo, requestBody: string, options?: RelayCallOptions): Promise<RelaySubmitResult>;
  processTaskFetch(info: TaskRelayInfo, taskId: string, options?: RelayCallOptions): Promise<Response>;
}
