import { JobFailedError, PollTimeoutError, TransportError } from '@tunecast/contracts';
import { logger as rootLogger } from '@tunecast/shared-infrastructure';

import type { MusicServiceClient } from './client.js';
import type { Clip, JobHandle, JobStatus, PollDependencies, PollOptions } from './types.js';

export const DEFAULT_MAX_WAIT_MS = 360_000;
export const DEFAULT_POLL_INTERVAL_MS = 15_000;

const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

function assertNever(value: never): never {
  throw new Error(`Unhandled job status: ${JSON.stringify(value)}`);
}

/**
 * Polls a submitted job until it succeeds, fails or runs out of time.
 *
 * The deadline is checked once at the top of every iteration, before the status
 * query; the interval sleep follows the query. A job can therefore be observed as
 * succeeded up to one interval plus one round-trip after `maxWaitMs`.
 *
 * Connection-level failures ({@link TransportError}) are logged and retried on the
 * next interval; the handle stays valid across them. Every other error ends the loop.
 */
export async function pollJob(
  client: Pick<MusicServiceClient, 'queryStatus'>,
  handle: JobHandle,
  options: PollOptions = {},
  deps: PollDependencies = {},
): Promise<Clip> {
  const maxWaitMs = options.maxWaitMs ?? DEFAULT_MAX_WAIT_MS;
  const intervalMs = options.intervalMs ?? DEFAULT_POLL_INTERVAL_MS;
  const now = deps.now ?? Date.now;
  const sleep = deps.sleep ?? defaultSleep;
  const log = (deps.logger ?? rootLogger).child({ taskId: handle });

  const startedAt = now();
  let attempt = 0;

  for (;;) {
    const elapsedMs = now() - startedAt;
    if (elapsedMs > maxWaitMs) {
      log.warn('music.poll.timeout', { elapsedMs, maxWaitMs, attempts: attempt });
      throw new PollTimeoutError(handle, elapsedMs, maxWaitMs);
    }

    attempt += 1;
    let status: JobStatus;
    try {
      status = await client.queryStatus(handle);
    } catch (error: unknown) {
      if (!(error instanceof TransportError)) {
        throw error;
      }
      log.warn('music.poll.transport_error', { attempt, elapsedMs, error: error.message });
      deps.onAttempt?.({ handle, attempt, elapsedMs, outcome: 'transport-error' });
      await sleep(intervalMs);
      continue;
    }

    deps.onAttempt?.({ handle, attempt, elapsedMs, outcome: status.kind });

    switch (status.kind) {
      case 'succeeded':
        log.info('music.poll.succeeded', { attempt, elapsedMs, clipId: status.clip.clipId });
        return status.clip;
      case 'failed':
        log.error('music.poll.failed', { attempt, elapsedMs, clip: status.clip.raw });
        throw new JobFailedError(handle, status.clip.raw);
      case 'pending':
        log.info('music.poll.pending', { attempt, elapsedMs, reason: status.reason });
        break;
      case 'unknown':
        log.info('music.poll.pending', { attempt, elapsedMs, state: status.state });
        break;
      default:
        return assertNever(status);
    }

    await sleep(intervalMs);
  }
}
