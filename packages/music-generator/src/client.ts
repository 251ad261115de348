import {
  ConfigurationError,
  ProtocolError,
  ServiceError,
  ServiceRejectedError,
  TransportError,
} from '@tunecast/contracts';
import { logger as rootLogger } from '@tunecast/shared-infrastructure';

import { toCreatePayload } from './request.js';
import {
  ClipStateSchema,
  CreateAckSchema,
  STATUS_SUCCESS_CODE,
  StatusEnvelopeSchema,
  isRecord,
  parseClip,
} from './schemas.js';
import type { JobHandle, JobRequest, JobStatus, MusicServiceConfig } from './types.js';

const DEFAULT_REQUEST_TIMEOUT_MS = 60_000;
/** Reserved by the service for "accepted, not ready yet". */
const STILL_PROCESSING_STATUS = 202;

export interface MusicServiceClient {
  readonly baseUrl: string;
  submitJob(request: JobRequest): Promise<JobHandle>;
  queryStatus(handle: JobHandle): Promise<JobStatus>;
}

type SentRequest = { response: Response; text: string };

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Interprets the body of a 200 task-status response.
 * @throws ProtocolError when the body is not a JSON object or its first result is not an object
 */
export function parseStatusBody(text: string): JobStatus {
  let body: unknown;
  try {
    body = JSON.parse(text);
  } catch (error: unknown) {
    throw new ProtocolError(`Task status response is not JSON: ${text}`, text, { cause: error });
  }

  const envelope = StatusEnvelopeSchema.safeParse(body);
  if (!envelope.success) {
    throw new ProtocolError(`Task status response is not a JSON object: ${text}`, text);
  }

  const { code, data } = envelope.data;
  if (code !== STATUS_SUCCESS_CODE || !Array.isArray(data) || data.length === 0) {
    return { kind: 'pending', reason: 'no-result' };
  }

  const first: unknown = data[0];
  if (!isRecord(first)) {
    throw new ProtocolError(`Task status result is not an object: ${text}`, text);
  }

  const { state } = ClipStateSchema.parse(first);
  switch (state) {
    case 'succeeded':
      return { kind: 'succeeded', clip: parseClip(first) };
    case 'failed':
      return { kind: 'failed', clip: parseClip(first) };
    default:
      return { kind: 'unknown', state };
  }
}

export function createMusicServiceClient(config: MusicServiceConfig): MusicServiceClient {
  const apiKey = config.apiKey?.trim();
  if (!apiKey) {
    throw new ConfigurationError('Missing music service API key');
  }
  const baseUrl = config.baseUrl.trim().replace(/\/+$/, '');
  if (!baseUrl) {
    throw new ConfigurationError('Missing music service base URL');
  }

  const fetchImpl = config.fetch ?? globalThis.fetch;
  const timeoutMs = config.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
  const log = config.logger ?? rootLogger;
  const authorization = `Bearer ${apiKey}`;

  // Any failure to send the request or read its body is a transport failure.
  const send = async (url: string, init: RequestInit & { method: string }): Promise<SentRequest> => {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
    try {
      const response = await fetchImpl(url, { ...init, signal: controller.signal });
      const text = await response.text();
      return { response, text };
    } catch (error: unknown) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw new TransportError(`${init.method} ${url} timed out after ${timeoutMs}ms`, {}, {
          cause: error,
        });
      }
      throw new TransportError(`${init.method} ${url} failed: ${describeError(error)}`, {}, {
        cause: error,
      });
    } finally {
      clearTimeout(timeoutId);
    }
  };

  return {
    baseUrl,

    async submitJob(request) {
      const url = `${baseUrl}/api/v1/suno/create`;
      log.info('music.submit', { title: request.title, model: request.model });

      const { response, text } = await send(url, {
        method: 'POST',
        headers: {
          Authorization: authorization,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify(toCreatePayload(request)),
      });

      if (!response.ok) {
        throw new TransportError(
          `Job submission failed with HTTP ${response.status}: ${text}`,
          { status: response.status, body: text },
        );
      }

      let body: unknown;
      try {
        body = JSON.parse(text);
      } catch (error: unknown) {
        throw new TransportError(
          `Job submission returned a non-JSON body: ${text}`,
          { status: response.status, body: text },
          { cause: error },
        );
      }

      const ack = CreateAckSchema.safeParse(body);
      if (!ack.success) {
        throw new ServiceRejectedError(`Music service rejected the job: ${text}`, body);
      }

      log.info('music.submit.accepted', { taskId: ack.data.task_id });
      return ack.data.task_id;
    },

    async queryStatus(handle) {
      const url = `${baseUrl}/api/v1/suno/task/${encodeURIComponent(handle)}`;
      const { response, text } = await send(url, {
        method: 'GET',
        headers: { Authorization: authorization },
      });

      if (response.status === STILL_PROCESSING_STATUS) {
        return { kind: 'pending', reason: 'processing' };
      }
      if (response.status !== 200) {
        throw new ServiceError(response.status, text);
      }
      return parseStatusBody(text);
    },
  };
}
