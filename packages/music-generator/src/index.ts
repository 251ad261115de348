import { resolve } from 'node:path';

import type { GenerationResult } from '@tunecast/contracts';
import { logger as rootLogger } from '@tunecast/shared-infrastructure';

import { retrieveArtifacts } from './artefacts.js';
import { createMusicServiceClient } from './client.js';
import { pollJob } from './poll.js';
import { DEFAULT_TRACK_TITLE, buildJobRequest } from './request.js';
import { audioFileNameFor } from './slug.js';
import type {
  JobHandle,
  JobRequest,
  JobRequestInput,
  JobStatus,
  MusicServiceConfig,
  PollAttemptEvent,
  PollDependencies,
  PollOptions,
} from './types.js';

export type GeneratorStage = 'submit' | 'poll' | 'download';

export type GeneratorStageEvent = {
  stage: GeneratorStage;
  status: 'start' | 'success';
  detail?: Record<string, unknown>;
};

export type GeneratorCallbacks = {
  onStage?: (event: GeneratorStageEvent) => void;
  onPollAttempt?: (event: PollAttemptEvent) => void;
};

export interface MusicGeneratorConfig extends MusicServiceConfig {
  /** Directory that receives `{slug}.mp3` and `{slug}_cover.jpg`. */
  outputDir: string;
  /** Model version used when a request does not name one. */
  model?: string;
  downloadTimeoutMs?: number;
  now?: PollDependencies['now'];
  sleep?: PollDependencies['sleep'];
}

export type GenerateTrackOptions = JobRequestInput & PollOptions & GeneratorCallbacks;

export type SubmitTrackOptions = JobRequestInput & Pick<GeneratorCallbacks, 'onStage'>;

export type SubmittedTrack = {
  handle: JobHandle;
  request: JobRequest;
};

export type ResumeTrackOptions = PollOptions &
  GeneratorCallbacks & {
    /** Title the original request used; decides the output file names. */
    title?: string;
  };

export interface MusicGenerator {
  readonly outputDir: string;
  generateTrack(options: GenerateTrackOptions): Promise<GenerationResult>;
  /** Submission alone; pair with `resumeTrack` to finish the job. */
  submitTrack(options: SubmitTrackOptions): Promise<SubmittedTrack>;
  resumeTrack(handle: JobHandle, options?: ResumeTrackOptions): Promise<GenerationResult>;
  inspectJob(handle: JobHandle): Promise<JobStatus>;
}

/**
 * Builds a generator bound to one service configuration. Instances hold no state
 * between calls; each `generateTrack` runs submit → poll → download in sequence and
 * rethrows the first fatal error as is.
 * @throws ConfigurationError when the API key or base URL is missing
 */
export function createMusicGenerator(config: MusicGeneratorConfig): MusicGenerator {
  const client = createMusicServiceClient(config);
  const log = config.logger ?? rootLogger;
  const outputDir = resolve(config.outputDir);

  const collect = async (
    handle: JobHandle,
    fileName: string,
    options: PollOptions & GeneratorCallbacks,
  ): Promise<GenerationResult> => {
    options.onStage?.({ stage: 'poll', status: 'start', detail: { taskId: handle } });
    const clip = await pollJob(
      client,
      handle,
      { maxWaitMs: options.maxWaitMs, intervalMs: options.intervalMs },
      { now: config.now, sleep: config.sleep, logger: log, onAttempt: options.onPollAttempt },
    );
    options.onStage?.({ stage: 'poll', status: 'success', detail: { taskId: handle, clipId: clip.clipId } });

    options.onStage?.({ stage: 'download', status: 'start', detail: { fileName } });
    const result = await retrieveArtifacts(clip, fileName, {
      outputDir,
      fetch: config.fetch,
      downloadTimeoutMs: config.downloadTimeoutMs,
      logger: log.child({ taskId: handle }),
    });
    options.onStage?.({
      stage: 'download',
      status: 'success',
      detail: { audioPath: result.audioPath, coverPath: result.coverPath },
    });
    return result;
  };

  const submit = async (options: SubmitTrackOptions): Promise<SubmittedTrack> => {
    const request = buildJobRequest({ ...options, model: options.model ?? config.model });
    options.onStage?.({ stage: 'submit', status: 'start', detail: { title: request.title } });
    const handle = await client.submitJob(request);
    options.onStage?.({ stage: 'submit', status: 'success', detail: { taskId: handle } });
    return { handle, request };
  };

  return {
    outputDir,

    async generateTrack(options) {
      const { handle, request } = await submit(options);
      return collect(handle, audioFileNameFor(request.title), options);
    },

    submitTrack: submit,

    async resumeTrack(handle, options = {}) {
      return collect(handle, audioFileNameFor(options.title ?? DEFAULT_TRACK_TITLE), options);
    },

    inspectJob(handle) {
      return client.queryStatus(handle);
    },
  };
}

export { createMusicServiceClient, parseStatusBody, type MusicServiceClient } from './client.js';
export { pollJob, DEFAULT_MAX_WAIT_MS, DEFAULT_POLL_INTERVAL_MS } from './poll.js';
export { retrieveArtifacts, downloadArtifact, coverFileNameFor, COVER_SUFFIX } from './artefacts.js';
export {
  buildJobRequest,
  toCreatePayload,
  DEFAULT_MODEL_VERSION,
  DEFAULT_STYLE_TAGS,
  DEFAULT_TRACK_TITLE,
  MAX_DESCRIPTION_LENGTH,
} from './request.js';
export { slugifyTitle, audioFileNameFor, DEFAULT_TRACK_SLUG } from './slug.js';
export type * from './types.js';
