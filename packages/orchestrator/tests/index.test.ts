import { mkdtemp, readFile, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { beforeEach, describe, expect, it, vi } from 'vitest';

import { JobFailedError, PollTimeoutError, type GenerationResult } from '@tunecast/contracts';
import { buildJobRequest, type MusicGenerator } from '@tunecast/music-generator';

import {
  type GenerationProgressEvent,
  getTaskStatus,
  newTrack,
  resumeTrack,
} from '../src/index.js';
import { createFilesystemManifestStore } from '../src/manifest.js';
import type { PipelineLogEvent, PipelineLogger, PipelineMetrics } from '../src/observability.js';

function createFakeGenerator(outputDir: string, result: GenerationResult) {
  const generator = {
    outputDir,
    generateTrack: vi.fn<MusicGenerator['generateTrack']>(),
    submitTrack: vi.fn<MusicGenerator['submitTrack']>(async (options) => {
      options.onStage?.({ stage: 'submit', status: 'start' });
      options.onStage?.({ stage: 'submit', status: 'success', detail: { taskId: 'abc123' } });
      return { handle: 'abc123', request: buildJobRequest(options) };
    }),
    resumeTrack: vi.fn<MusicGenerator['resumeTrack']>(async (handle, options = {}) => {
      options.onStage?.({ stage: 'poll', status: 'start', detail: { taskId: handle } });
      options.onPollAttempt?.({ handle, attempt: 1, elapsedMs: 0, outcome: 'pending' });
      options.onPollAttempt?.({ handle, attempt: 2, elapsedMs: 15_000, outcome: 'succeeded' });
      options.onStage?.({ stage: 'poll', status: 'success', detail: { taskId: handle } });
      options.onStage?.({ stage: 'download', status: 'start' });
      options.onStage?.({ stage: 'download', status: 'success' });
      return result;
    }),
    inspectJob: vi.fn<MusicGenerator['inspectJob']>(),
  } satisfies MusicGenerator;
  return generator;
}

function createRecorders() {
  const logs: PipelineLogEvent[] = [];
  const timings: { metric: string; durationMs: number; tags?: Record<string, string> }[] = [];
  const increments: { metric: string; value?: number; tags?: Record<string, string> }[] = [];
  const logger: PipelineLogger = { log: (event) => logs.push(event) };
  const metrics: PipelineMetrics = {
    timing: (metric, durationMs, tags) => timings.push({ metric, durationMs, tags }),
    increment: (metric, value, tags) => increments.push({ metric, value, tags }),
  };
  return { logs, timings, increments, logger, metrics };
}

describe('newTrack', () => {
  let dir: string;
  let result: GenerationResult;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'tunecast-run-'));
    result = {
      audioPath: join(dir, 'Calm.mp3'),
      coverPath: join(dir, 'Calm_cover.jpg'),
      title: 'Calm',
      tags: 'piano',
      duration: 61.5,
      clipId: 'c1',
    };
    await writeFile(result.audioPath, 'audio');
    await writeFile(join(dir, 'Calm_cover.jpg'), 'cover');
  });

  it('submits, resumes with the normalized title and writes the manifest', async () => {
    const generator = createFakeGenerator(dir, result);

    const run = await newTrack(
      { description: ' calm piano ', title: 'Calm', tags: ['piano'], instrumental: true, maxWaitMs: 60_000 },
      {},
      { generator, runId: 'run-1' },
    );

    expect(generator.resumeTrack).toHaveBeenCalledWith(
      'abc123',
      expect.objectContaining({ title: 'Calm', maxWaitMs: 60_000 }),
    );
    expect(run).toEqual({
      taskId: 'abc123',
      result,
      cover: { path: join(dir, 'Calm_cover.jpg'), source: 'generated' },
      manifestPath: join(dir, 'Calm.manifest.json'),
      steps: ['submit', 'poll', 'download', 'cover:generated', 'manifest'],
    });

    const manifest = JSON.parse(await readFile(run.manifestPath, 'utf8'));
    expect(manifest).toMatchObject({
      schemaVersion: 1,
      taskId: 'abc123',
      request: {
        description: 'calm piano',
        title: 'Calm',
        tags: ['piano'],
        instrumental: true,
        model: 'chirp-v4',
      },
      result,
      cover: { source: 'generated' },
    });
  });

  it('emits start/success events for every stage with timings and counters', async () => {
    const generator = createFakeGenerator(dir, result);
    const recorders = createRecorders();
    const events: GenerationProgressEvent[] = [];

    await newTrack(
      { description: 'calm piano', title: 'Calm' },
      { onStage: (event) => events.push(event) },
      { generator, runId: 'run-1', logger: recorders.logger, metrics: recorders.metrics },
    );

    expect(events.map((event) => `${event.stage}:${event.status}`)).toEqual([
      'submit:start',
      'submit:success',
      'poll:start',
      'poll:success',
      'download:start',
      'download:success',
      'cover:start',
      'cover:success',
      'manifest:start',
      'manifest:success',
    ]);

    const stageMessages = recorders.logs
      .map((event) => event.message)
      .filter((message) => message.startsWith('stage.'));
    expect(stageMessages).toContain('stage.poll.success');
    expect(recorders.logs.every((event) => event.runId === 'run-1')).toBe(true);

    const stageTimings = recorders.timings.filter(
      (entry) => entry.metric === 'tunecast.stage.duration_ms',
    );
    expect(stageTimings.map((entry) => entry.tags?.stage)).toEqual([
      'submit',
      'poll',
      'download',
      'cover',
      'manifest',
    ]);

    expect(
      recorders.increments
        .filter((entry) => entry.metric === 'tunecast.poll.attempt')
        .map((entry) => entry.tags?.outcome),
    ).toEqual(['pending', 'succeeded']);
    expect(recorders.increments).toContainEqual({
      metric: 'tunecast.pipeline.new_track.success',
      value: 1,
      tags: {},
    });
  });

  it('forwards poll attempts to the caller', async () => {
    const generator = createFakeGenerator(dir, result);
    const onPollAttempt = vi.fn();

    await newTrack({ description: 'calm piano', title: 'Calm' }, { onPollAttempt }, { generator });

    expect(onPollAttempt).toHaveBeenCalledTimes(2);
  });

  it('falls back to the configured cover when none was downloaded', async () => {
    const fallback = join(dir, 'fallback.jpg');
    await writeFile(fallback, 'fallback');
    const generator = createFakeGenerator(dir, { ...result, coverPath: null });

    const run = await newTrack(
      { description: 'calm piano', title: 'Calm' },
      {},
      { generator, fallbackCoverPath: fallback },
    );

    expect(run.cover).toEqual({ path: fallback, source: 'fallback' });
    expect(run.steps).toContain('cover:fallback');
  });

  it('skips the cover stage when no image is available at all', async () => {
    const generator = createFakeGenerator(dir, { ...result, coverPath: null });
    const recorders = createRecorders();

    const run = await newTrack(
      { description: 'calm piano', title: 'Calm' },
      {},
      {
        generator,
        fallbackCoverPath: join(dir, 'missing.jpg'),
        logger: recorders.logger,
        metrics: recorders.metrics,
      },
    );

    expect(run.cover).toEqual({ path: null, source: 'none' });
    expect(run.steps).toContain('skip:cover');
    expect(recorders.increments).toContainEqual({
      metric: 'tunecast.stage.skipped',
      value: 1,
      tags: { stage: 'cover' },
    });
  });

  it('propagates generator errors unchanged and records the failure', async () => {
    const generator = createFakeGenerator(dir, result);
    const failure = new JobFailedError('abc123', { state: 'failed' });
    generator.resumeTrack.mockRejectedValueOnce(failure);
    const recorders = createRecorders();

    await expect(
      newTrack(
        { description: 'calm piano' },
        {},
        { generator, logger: recorders.logger, metrics: recorders.metrics },
      ),
    ).rejects.toBe(failure);

    const failureLog = recorders.logs.find((event) => event.message === 'pipeline.newTrack.failure');
    expect(failureLog?.level).toBe('error');
    expect(failureLog?.detail).toMatchObject({ taskId: 'abc123', errorName: 'JobFailedError' });
    expect(recorders.increments).toContainEqual({
      metric: 'tunecast.pipeline.new_track.failure',
      value: 1,
      tags: {},
    });
  });

  it('propagates validation errors from submission', async () => {
    const generator = createFakeGenerator(dir, result);

    await expect(newTrack({ description: '' }, {}, { generator })).rejects.toThrow(
      'Music description must not be empty',
    );
    expect(generator.resumeTrack).not.toHaveBeenCalled();
  });
});

describe('resumeTrack', () => {
  let dir: string;
  let result: GenerationResult;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'tunecast-resume-'));
    result = {
      audioPath: join(dir, 'Calm.mp3'),
      coverPath: null,
      title: 'Calm',
      tags: null,
      duration: null,
      clipId: 'c1',
    };
  });

  it('skips submission and keeps the request from an earlier manifest of the same task', async () => {
    const store = createFilesystemManifestStore();
    const request = {
      description: 'calm piano',
      title: 'Calm',
      tags: ['piano'],
      instrumental: false,
      model: 'chirp-v4',
    };
    await store.writeManifest(join(dir, 'Calm.mp3'), {
      schemaVersion: 1,
      taskId: 'abc123',
      request,
      result,
      cover: { path: null, source: 'none' },
      timestamp: '2026-01-01T00:00:00.000Z',
    });
    const generator = createFakeGenerator(dir, result);
    const events: GenerationProgressEvent[] = [];

    const run = await resumeTrack(
      { taskId: 'abc123', title: 'Calm', intervalMs: 5_000 },
      { onStage: (event) => events.push(event) },
      { generator, manifestStore: store },
    );

    expect(generator.submitTrack).not.toHaveBeenCalled();
    expect(generator.resumeTrack).toHaveBeenCalledWith(
      'abc123',
      expect.objectContaining({ title: 'Calm', intervalMs: 5_000 }),
    );
    expect(events[0]).toEqual({
      stage: 'submit',
      status: 'skipped',
      detail: { reason: 'resuming existing task', taskId: 'abc123' },
    });
    expect(run.steps[0]).toBe('skip:submit');
    await expect(store.readManifest(join(dir, 'Calm.mp3'))).resolves.toMatchObject({
      taskId: 'abc123',
      request,
    });
  });

  it('leaves the request out when no earlier manifest matches', async () => {
    const generator = createFakeGenerator(dir, result);

    const run = await resumeTrack({ taskId: 'abc123', title: 'Calm' }, {}, { generator });

    const manifest = JSON.parse(await readFile(run.manifestPath, 'utf8'));
    expect(manifest).not.toHaveProperty('request');
    expect(manifest.taskId).toBe('abc123');
  });

  it('uses the default title when none is given', async () => {
    const generator = createFakeGenerator(dir, { ...result, audioPath: join(dir, 'Generated_Track.mp3') });

    await resumeTrack({ taskId: 'abc123' }, {}, { generator });

    expect(generator.resumeTrack).toHaveBeenCalledWith(
      'abc123',
      expect.objectContaining({ title: 'Generated Track' }),
    );
  });

  it('propagates a poll timeout', async () => {
    const generator = createFakeGenerator(dir, result);
    const timeout = new PollTimeoutError('abc123', 45_000, 30_000);
    generator.resumeTrack.mockRejectedValueOnce(timeout);

    await expect(resumeTrack({ taskId: 'abc123' }, {}, { generator })).rejects.toBe(timeout);
  });
});

describe('getTaskStatus', () => {
  it('returns a single status query and records it', async () => {
    const generator = createFakeGenerator('/unused', {
      audioPath: '/unused/x.mp3',
      coverPath: null,
      title: null,
      tags: null,
      duration: null,
      clipId: null,
    });
    generator.inspectJob.mockResolvedValue({ kind: 'pending', reason: 'processing' });
    const recorders = createRecorders();

    await expect(
      getTaskStatus('abc123', { generator, metrics: recorders.metrics }),
    ).resolves.toEqual({ kind: 'pending', reason: 'processing' });
    expect(generator.inspectJob).toHaveBeenCalledWith('abc123');
    expect(recorders.increments).toContainEqual({
      metric: 'tunecast.pipeline.get_task_status.success',
      value: 1,
      tags: {},
    });
  });
});
