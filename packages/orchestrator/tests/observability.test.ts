import { describe, expect, it } from 'vitest';

import { createLogger } from '@tunecast/shared-infrastructure';

import { createStructuredPipelineLogger, noopLogger, noopMetrics } from '../src/observability.js';

function captureLines() {
  const lines: Record<string, unknown>[] = [];
  const logger = createLogger({
    level: 'debug',
    destination: {
      write(chunk: string) {
        lines.push(JSON.parse(chunk) as Record<string, unknown>);
      },
    },
  });
  return { logger, lines };
}

describe('createStructuredPipelineLogger', () => {
  it('maps pipeline levels onto logger levels', () => {
    const { logger, lines } = captureLines();
    const pipelineLogger = createStructuredPipelineLogger(logger);

    pipelineLogger.log({ level: 'debug', message: 'a' });
    pipelineLogger.log({ level: 'info', message: 'b' });
    pipelineLogger.log({ level: 'warn', message: 'c' });
    pipelineLogger.log({ level: 'error', message: 'd' });

    expect(lines.map((line) => [line.level, line.msg])).toEqual([
      [20, 'a'],
      [30, 'b'],
      [40, 'c'],
      [50, 'd'],
    ]);
  });

  it('merges runId and stage into the detail fields', () => {
    const { logger, lines } = captureLines();
    const pipelineLogger = createStructuredPipelineLogger(logger);

    pipelineLogger.log({
      level: 'info',
      message: 'stage.poll.success',
      runId: 'run-1',
      stage: 'poll',
      detail: { durationMs: 15 },
    });

    expect(lines[0]).toMatchObject({
      msg: 'stage.poll.success',
      runId: 'run-1',
      stage: 'poll',
      durationMs: 15,
    });
  });

  it('leaves runId and stage out when absent', () => {
    const { logger, lines } = captureLines();

    createStructuredPipelineLogger(logger).log({ level: 'info', message: 'plain' });

    expect(lines[0]).not.toHaveProperty('runId');
    expect(lines[0]).not.toHaveProperty('stage');
  });
});

describe('noop observers', () => {
  it('accept every call', () => {
    expect(() => {
      noopLogger.log({ level: 'info', message: 'ignored' });
      noopMetrics.timing('metric', 1);
      noopMetrics.increment('metric');
    }).not.toThrow();
  });
});
