import { ConfigurationError } from '@tunecast/contracts';
import { logger as rootLogger, type Logger } from '@tunecast/shared-infrastructure';
import { type FetchLike, type MusicGenerator, createMusicGenerator } from '@tunecast/music-generator';

import {
  API_KEY_ENV_VARS,
  type GeneratorSettings,
  type GeneratorSettingsOverrides,
  resolveGeneratorSettings,
} from './config.js';
import type {
  GenerationProgressCallbacks,
  NewTrackFlags,
  ResumeTrackFlags,
} from './index.js';
import { createFilesystemManifestStore } from './manifest.js';
import type { ManifestStore } from './manifest.js';
import {
  type PipelineLogger,
  type PipelineMetrics,
  createStructuredPipelineLogger,
  noopMetrics,
} from './observability.js';

type OrchestratorModule = typeof import('./index.js');

const orchestratorModuleLoader = (() => {
  let cache: Promise<OrchestratorModule> | null = null;
  return () => {
    if (!cache) {
      cache = import('./index.js');
    }
    return cache;
  };
})();

export type CreatePipelineOptions = GeneratorSettingsOverrides & {
  manifestStore?: ManifestStore;
  logger?: PipelineLogger;
  metrics?: PipelineMetrics;
  /** Logger handed to the music service client and poller. */
  serviceLogger?: Logger;
  fetch?: FetchLike;
  requestTimeoutMs?: number;
  downloadTimeoutMs?: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
};

export interface OrchestratorPipeline {
  settings: GeneratorSettings;
  generator: MusicGenerator;
  manifestStore: ManifestStore;
  logger: PipelineLogger;
  metrics: PipelineMetrics;
  newTrack(
    flags: NewTrackFlags,
    callbacks?: GenerationProgressCallbacks,
  ): Promise<Awaited<ReturnType<OrchestratorModule['newTrack']>>>;
  resumeTrack(
    flags: ResumeTrackFlags,
    callbacks?: GenerationProgressCallbacks,
  ): Promise<Awaited<ReturnType<OrchestratorModule['resumeTrack']>>>;
  getTaskStatus(taskId: string): Promise<Awaited<ReturnType<OrchestratorModule['getTaskStatus']>>>;
}

/**
 * Resolves settings from overrides and the environment and binds one generator to them.
 * @throws ConfigurationError when no API key is configured
 */
export function createPipeline(options: CreatePipelineOptions = {}): OrchestratorPipeline {
  const settings = resolveGeneratorSettings(options);
  if (!settings.apiKey) {
    throw new ConfigurationError(
      `Missing music service API key. Set one of: ${API_KEY_ENV_VARS.join(', ')}`,
    );
  }

  const serviceLogger = options.serviceLogger ?? rootLogger;
  const generator = createMusicGenerator({
    apiKey: settings.apiKey,
    baseUrl: settings.baseUrl,
    outputDir: settings.outputDir,
    model: settings.model,
    requestTimeoutMs: options.requestTimeoutMs,
    downloadTimeoutMs: options.downloadTimeoutMs,
    fetch: options.fetch,
    logger: serviceLogger,
    now: options.now,
    sleep: options.sleep,
  });
  const manifestStore = options.manifestStore ?? createFilesystemManifestStore();
  const logger = options.logger ?? createStructuredPipelineLogger(serviceLogger);
  const metrics = options.metrics ?? noopMetrics;
  const dependencies = {
    generator,
    manifestStore,
    logger,
    metrics,
    fallbackCoverPath: settings.fallbackCoverPath,
  };

  return {
    settings,
    generator,
    manifestStore,
    logger,
    metrics,
    async newTrack(flags, callbacks) {
      const { newTrack } = await orchestratorModuleLoader();
      const merged: NewTrackFlags = {
        ...flags,
        model: flags.model ?? settings.model,
        instrumental: flags.instrumental ?? settings.instrumental,
        maxWaitMs: flags.maxWaitMs ?? settings.maxWaitMs,
        intervalMs: flags.intervalMs ?? settings.intervalMs,
      };
      return newTrack(merged, callbacks, dependencies);
    },
    async resumeTrack(flags, callbacks) {
      const { resumeTrack } = await orchestratorModuleLoader();
      const merged: ResumeTrackFlags = {
        ...flags,
        maxWaitMs: flags.maxWaitMs ?? settings.maxWaitMs,
        intervalMs: flags.intervalMs ?? settings.intervalMs,
      };
      return resumeTrack(merged, callbacks, dependencies);
    },
    async getTaskStatus(taskId) {
      const { getTaskStatus } = await orchestratorModuleLoader();
      return getTaskStatus(taskId, dependencies);
    },
  };
}

export {
  type LoadEnvOptions,
  type LoadEnvSummary,
  loadEnvFiles,
  loadEnvFilesWithSummary,
} from '@tunecast/shared-infrastructure';
