import { vi } from 'vitest';

import { createLogger } from '@tunecast/shared-infrastructure';

export const TEST_API_KEY = 'test-secret';
export const TEST_BASE_URL = 'https://music.example.test';

export const silentLogger = createLogger({ level: 'silent' });

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

export function textResponse(body: string, status = 200): Response {
  return new Response(body, { status });
}

export function createFetchMock() {
  return vi.fn<typeof fetch>();
}

export function requestUrl(input: Parameters<typeof fetch>[0]): string {
  if (typeof input === 'string') return input;
  if (input instanceof URL) return input.toString();
  return input.url;
}

/**
 * Manual clock: `sleep` advances time instantly and records the requested delay.
 */
export function createFakeClock(start = 1_000) {
  let current = start;
  const sleeps: number[] = [];
  return {
    sleeps,
    now: () => current,
    advance: (ms: number) => {
      current += ms;
    },
    sleep: async (ms: number) => {
      sleeps.push(ms);
      current += ms;
    },
  };
}

export function succeededBody(clip: Record<string, unknown>) {
  return { code: 200, data: [{ state: 'succeeded', ...clip }] };
}
