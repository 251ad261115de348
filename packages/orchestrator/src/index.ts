import { join } from 'node:path';
import { randomUUID } from 'node:crypto';

import type { GenerationResult, GenerationStage } from '@tunecast/contracts';
import {
  DEFAULT_TRACK_TITLE,
  audioFileNameFor,
  type GeneratorStageEvent,
  type JobStatus,
  type MusicGenerator,
  type PollAttemptEvent,
} from '@tunecast/music-generator';

import { type CoverSelection, selectCoverArt } from './cover.js';
import {
  CURRENT_MANIFEST_SCHEMA_VERSION,
  type GenerationManifest,
  type ManifestRequest,
  type ManifestStore,
  createFilesystemManifestStore,
} from './manifest.js';
import {
  noopLogger,
  noopMetrics,
  type PipelineLogger,
  type PipelineMetrics,
} from './observability.js';

export type GenerationStageStatus = 'start' | 'success' | 'skipped';

export type GenerationProgressEvent = {
  stage: GenerationStage;
  status: GenerationStageStatus;
  detail?: Record<string, unknown>;
};

export type GenerationProgressCallbacks = {
  onStage?: (event: GenerationProgressEvent) => void;
  onPollAttempt?: (event: PollAttemptEvent) => void;
};

const fallbackManifestStore = createFilesystemManifestStore();
const fallbackLogger = noopLogger;
const fallbackMetrics = noopMetrics;

export type OrchestratorDependencies = {
  generator: MusicGenerator;
  manifestStore?: ManifestStore;
  logger?: PipelineLogger;
  metrics?: PipelineMetrics;
  runId?: string;
  /** Cover used when the service supplies none or it could not be downloaded. */
  fallbackCoverPath?: string;
};

export {
  manifestPathFor,
  readManifest,
  writeManifest,
  createFilesystemManifestStore,
  CURRENT_MANIFEST_SCHEMA_VERSION,
} from './manifest.js';
export type { GenerationManifest, ManifestRequest, ManifestStore, CoverSource } from './manifest.js';
export { selectCoverArt, type CoverSelection } from './cover.js';
export {
  API_KEY_ENV_VARS,
  DEFAULT_BASE_URL,
  DEFAULT_FALLBACK_COVER,
  DEFAULT_OUTPUT_DIR,
  resolveGeneratorSettings,
} from './config.js';
export type { GeneratorSettings, GeneratorSettingsOverrides } from './config.js';
export { noopLogger, noopMetrics, createStructuredPipelineLogger } from './observability.js';
export type {
  PipelineLogger,
  PipelineMetrics,
  PipelineLogEvent,
  PipelineLogLevel,
} from './observability.js';
export { createPipeline, loadEnvFiles, loadEnvFilesWithSummary } from './pipeline.js';
export type { CreatePipelineOptions, OrchestratorPipeline } from './pipeline.js';
export type { GenerationResult, GenerationStage } from '@tunecast/contracts';

export type NewTrackFlags = {
  description: string;
  title?: string;
  tags?: string[];
  instrumental?: boolean;
  model?: string;
  maxWaitMs?: number;
  intervalMs?: number;
};

export type ResumeTrackFlags = {
  taskId: string;
  title?: string;
  maxWaitMs?: number;
  intervalMs?: number;
};

export type TrackRunResult = {
  taskId: string;
  result: GenerationResult;
  cover: CoverSelection;
  manifestPath: string;
  steps: string[];
};

type StageReporterOptions = {
  logger: PipelineLogger;
  metrics: PipelineMetrics;
  runId: string;
  callbacks: GenerationProgressCallbacks;
};

function createStageReporter({ logger, metrics, runId, callbacks }: StageReporterOptions) {
  const stageStartTimes = new Map<GenerationStage, number>();

  return (stage: GenerationStage, status: GenerationStageStatus, detail?: Record<string, unknown>) => {
    callbacks.onStage?.({ stage, status, detail });
    if (status === 'start') {
      stageStartTimes.set(stage, Date.now());
      logger.log({
        level: 'info',
        message: `stage.${stage}.start`,
        runId,
        stage,
        detail,
      });
      return;
    }

    const startedAt = stageStartTimes.get(stage);
    if (startedAt !== undefined) {
      stageStartTimes.delete(stage);
    }
    const durationMs = startedAt !== undefined ? Math.max(Date.now() - startedAt, 0) : undefined;
    const detailWithDuration =
      durationMs !== undefined ? { ...(detail ?? {}), durationMs } : detail;

    if (status === 'success') {
      logger.log({
        level: 'info',
        message: `stage.${stage}.success`,
        runId,
        stage,
        detail: detailWithDuration,
      });
      if (durationMs !== undefined) {
        metrics.timing('tunecast.stage.duration_ms', durationMs, { stage, status });
      }
      metrics.increment('tunecast.stage.success', 1, { stage });
    } else {
      logger.log({
        level: 'warn',
        message: `stage.${stage}.skipped`,
        runId,
        stage,
        detail: detailWithDuration,
      });
      metrics.increment('tunecast.stage.skipped', 1, { stage });
    }
  };
}

type RunContext = {
  manifestStore: ManifestStore;
  logger: PipelineLogger;
  metrics: PipelineMetrics;
  runId: string;
  emitStage: ReturnType<typeof createStageReporter>;
  steps: string[];
};

function createRunContext(
  callbacks: GenerationProgressCallbacks,
  dependencies: OrchestratorDependencies,
): RunContext {
  const logger = dependencies.logger ?? fallbackLogger;
  const metrics = dependencies.metrics ?? fallbackMetrics;
  const runId = dependencies.runId ?? randomUUID();
  return {
    manifestStore: dependencies.manifestStore ?? fallbackManifestStore,
    logger,
    metrics,
    runId,
    emitStage: createStageReporter({ logger, metrics, runId, callbacks }),
    steps: [],
  };
}

function generatorCallbacks(context: RunContext, callbacks: GenerationProgressCallbacks) {
  return {
    onStage: (event: GeneratorStageEvent) => {
      if (event.status === 'success') context.steps.push(event.stage);
      context.emitStage(event.stage, event.status, event.detail);
    },
    onPollAttempt: (event: PollAttemptEvent) => {
      context.metrics.increment('tunecast.poll.attempt', 1, { outcome: event.outcome });
      callbacks.onPollAttempt?.(event);
    },
  };
}

async function finishRun(
  context: RunContext,
  taskId: string,
  request: ManifestRequest | undefined,
  result: GenerationResult,
  fallbackCoverPath: string | undefined,
): Promise<TrackRunResult> {
  const { emitStage, steps } = context;

  emitStage('cover', 'start');
  const cover = await selectCoverArt(result, fallbackCoverPath);
  if (cover.source === 'none') {
    emitStage('cover', 'skipped', { reason: 'no generated or fallback cover on disk' });
    steps.push('skip:cover');
  } else {
    emitStage('cover', 'success', { path: cover.path, source: cover.source });
    steps.push(`cover:${cover.source}`);
  }

  emitStage('manifest', 'start');
  const manifest: GenerationManifest = {
    schemaVersion: CURRENT_MANIFEST_SCHEMA_VERSION,
    taskId,
    ...(request ? { request } : {}),
    result,
    cover,
    timestamp: new Date().toISOString(),
  };
  const manifestPath = await context.manifestStore.writeManifest(result.audioPath, manifest);
  steps.push('manifest');
  emitStage('manifest', 'success', { manifestPath });

  return { taskId, result, cover, manifestPath, steps };
}

function recordOutcome(
  context: RunContext,
  operation: string,
  startedAt: number,
  outcome: { taskId?: string; error?: unknown },
): void {
  const durationMs = Math.max(Date.now() - startedAt, 0);
  const metricName = operation.replace(/([A-Z])/g, '_$1').toLowerCase();
  const result = outcome.error === undefined ? 'success' : 'failure';

  if (outcome.error === undefined) {
    context.logger.log({
      level: 'info',
      message: `pipeline.${operation}.success`,
      runId: context.runId,
      stage: 'pipeline',
      detail: { durationMs, taskId: outcome.taskId, steps: context.steps },
    });
  } else {
    const error = outcome.error;
    context.logger.log({
      level: 'error',
      message: `pipeline.${operation}.failure`,
      runId: context.runId,
      stage: 'pipeline',
      detail: {
        durationMs,
        taskId: outcome.taskId,
        error: error instanceof Error ? error.message : String(error),
        errorName: error instanceof Error ? error.name : undefined,
      },
    });
  }
  context.metrics.timing(`tunecast.pipeline.${metricName}.duration_ms`, durationMs, { result });
  context.metrics.increment(`tunecast.pipeline.${metricName}.${result}`, 1, {});
}

/**
 * Submits a new generation job, waits for it, downloads the artefacts, selects the cover
 * and writes the manifest. Errors from any stage propagate unchanged.
 */
export async function newTrack(
  flags: NewTrackFlags,
  callbacks: GenerationProgressCallbacks = {},
  dependencies: OrchestratorDependencies,
): Promise<TrackRunResult> {
  const { generator } = dependencies;
  const context = createRunContext(callbacks, dependencies);
  const startedAt = Date.now();
  let taskId: string | undefined;

  context.logger.log({
    level: 'info',
    message: 'pipeline.newTrack.start',
    runId: context.runId,
    stage: 'pipeline',
    detail: { title: flags.title, model: flags.model },
  });

  try {
    const hooks = generatorCallbacks(context, callbacks);
    const submitted = await generator.submitTrack({ ...flags, onStage: hooks.onStage });
    taskId = submitted.handle;
    const { request } = submitted;

    const result = await generator.resumeTrack(submitted.handle, {
      title: request.title,
      maxWaitMs: flags.maxWaitMs,
      intervalMs: flags.intervalMs,
      ...hooks,
    });

    const run = await finishRun(
      context,
      submitted.handle,
      {
        description: request.description,
        title: request.title,
        tags: [...request.tags],
        instrumental: request.instrumental,
        model: request.model,
      },
      result,
      dependencies.fallbackCoverPath,
    );
    recordOutcome(context, 'newTrack', startedAt, { taskId });
    return run;
  } catch (error) {
    recordOutcome(context, 'newTrack', startedAt, { taskId, error });
    throw error;
  }
}

/**
 * Finishes a task submitted earlier, typically after a poll timeout. The request of a
 * previous manifest for the same task is carried over.
 */
export async function resumeTrack(
  flags: ResumeTrackFlags,
  callbacks: GenerationProgressCallbacks = {},
  dependencies: OrchestratorDependencies,
): Promise<TrackRunResult> {
  const { generator } = dependencies;
  const context = createRunContext(callbacks, dependencies);
  const startedAt = Date.now();
  const title = flags.title ?? DEFAULT_TRACK_TITLE;

  context.logger.log({
    level: 'info',
    message: 'pipeline.resumeTrack.start',
    runId: context.runId,
    stage: 'pipeline',
    detail: { taskId: flags.taskId, title },
  });

  try {
    const expectedAudioPath = join(generator.outputDir, audioFileNameFor(title));
    const previous = await context.manifestStore.readManifest(expectedAudioPath);
    const request = previous?.taskId === flags.taskId ? previous.request : undefined;

    context.emitStage('submit', 'skipped', { reason: 'resuming existing task', taskId: flags.taskId });
    context.steps.push('skip:submit');

    const result = await generator.resumeTrack(flags.taskId, {
      title,
      maxWaitMs: flags.maxWaitMs,
      intervalMs: flags.intervalMs,
      ...generatorCallbacks(context, callbacks),
    });

    const run = await finishRun(context, flags.taskId, request, result, dependencies.fallbackCoverPath);
    recordOutcome(context, 'resumeTrack', startedAt, { taskId: flags.taskId });
    return run;
  } catch (error) {
    recordOutcome(context, 'resumeTrack', startedAt, { taskId: flags.taskId, error });
    throw error;
  }
}

/**
 * One status query for a task; never waits.
 */
export async function getTaskStatus(
  taskId: string,
  dependencies: OrchestratorDependencies,
): Promise<JobStatus> {
  const context = createRunContext({}, dependencies);
  const startedAt = Date.now();
  try {
    const status = await dependencies.generator.inspectJob(taskId);
    recordOutcome(context, 'getTaskStatus', startedAt, { taskId });
    return status;
  } catch (error) {
    recordOutcome(context, 'getTaskStatus', startedAt, { taskId, error });
    throw error;
  }
}
