import type { Logger } from '@tunecast/shared-infrastructure';

export type PipelineLogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface PipelineLogEvent {
  level: PipelineLogLevel;
  message: string;
  runId?: string;
  stage?: string;
  detail?: Record<string, unknown>;
}

export interface PipelineLogger {
  log: (event: PipelineLogEvent) => void;
}

export interface PipelineMetrics {
  timing: (metric: string, durationMs: number, tags?: Record<string, string>) => void;
  increment: (metric: string, value?: number, tags?: Record<string, string>) => void;
}

export const noopLogger: PipelineLogger = {
  log: () => {
    /* noop */
  },
};

export const noopMetrics: PipelineMetrics = {
  timing: () => {
    /* noop */
  },
  increment: () => {
    /* noop */
  },
};

/**
 * Routes pipeline events into a structured logger; `runId` and `stage` become bindings.
 */
export function createStructuredPipelineLogger(logger: Logger): PipelineLogger {
  return {
    log({ level, message, runId, stage, detail }) {
      const fields = { ...(detail ?? {}), ...(runId ? { runId } : {}), ...(stage ? { stage } : {}) };
      switch (level) {
        case 'error':
          logger.error(message, fields);
          break;
        case 'warn':
          logger.warn(message, fields);
          break;
        case 'debug':
          logger.debug(message, fields);
          break;
        default:
          logger.info(message, fields);
          break;
      }
    },
  };
}
