import type { Logger } from '@tunecast/shared-infrastructure';

/**
 * Caller-facing input for one generation job.
 */
export interface JobRequestInput {
  description: string;
  title?: string;
  tags?: readonly string[];
  instrumental?: boolean;
  model?: string;
}

/**
 * Validated, frozen request. Built once per generation call.
 */
export interface JobRequest {
  readonly description: string;
  readonly title: string;
  readonly tags: readonly string[];
  readonly instrumental: boolean;
  readonly model: string;
}

/**
 * Wire body of `POST /api/v1/suno/create` (description mode).
 */
export interface CreateJobPayload {
  custom_mode: false;
  gpt_description_prompt: string;
  make_instrumental: boolean;
  mv: string;
}

/**
 * Opaque task identifier issued by the music service.
 */
export type JobHandle = string;

export interface Clip {
  clipId: string | null;
  audioUrl: string | null;
  imageUrl: string | null;
  title: string | null;
  tags: string | null;
  duration: number | null;
  /** Clip object exactly as the service sent it. */
  raw: Record<string, unknown>;
}

export type JobStatus =
  | { kind: 'pending'; reason: 'processing' | 'no-result' }
  | { kind: 'succeeded'; clip: Clip }
  | { kind: 'failed'; clip: Clip }
  | { kind: 'unknown'; state: string | null };

export type FetchLike = typeof fetch;

export interface MusicServiceConfig {
  apiKey: string | undefined;
  baseUrl: string;
  requestTimeoutMs?: number;
  fetch?: FetchLike;
  logger?: Logger;
}

export type PollOutcome = 'transport-error' | JobStatus['kind'];

export interface PollAttemptEvent {
  handle: JobHandle;
  attempt: number;
  elapsedMs: number;
  outcome: PollOutcome;
}

export interface PollOptions {
  maxWaitMs?: number;
  intervalMs?: number;
}

export interface PollDependencies {
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
  onAttempt?: (event: PollAttemptEvent) => void;
}

export interface RetrieveOptions {
  outputDir: string;
  fetch?: FetchLike;
  downloadTimeoutMs?: number;
  logger?: Logger;
}
