import pc from 'picocolors';

type ReportLevel = 'info' | 'warn' | 'error' | 'success';

export type ReportEvent = {
  level: ReportLevel;
  message: string;
  details?: Record<string, unknown> | undefined;
  timestamp: string;
};

/**
 * Human-facing CLI output. In JSON mode nothing is printed until `flush`, which
 * writes every collected event plus the final result as one document.
 */
export type Reporter = {
  info: (message: string, details?: Record<string, unknown>) => void;
  warn: (message: string, details?: Record<string, unknown>) => void;
  error: (message: string, details?: Record<string, unknown>) => void;
  success: (message: string, details?: Record<string, unknown>) => void;
  flush: (final?: Record<string, unknown>) => void;
};

type ReporterOptions = {
  json?: boolean;
};

function formatMessage(level: ReportLevel, message: string): string {
  switch (level) {
    case 'warn':
      return pc.yellow(`! ${message}`);
    case 'error':
      return pc.red(`✖ ${message}`);
    case 'success':
      return pc.green(`✔ ${message}`);
    default:
      return `${pc.cyan('ℹ')} ${message}`;
  }
}

export function createReporter(options: ReporterOptions = {}): Reporter {
  const { json = false } = options;
  const events: ReportEvent[] = [];

  const push = (level: ReportLevel, message: string, details?: Record<string, unknown>) => {
    events.push({ level, message, details, timestamp: new Date().toISOString() });
    if (json) return;
    const line = formatMessage(level, message);
    const print = level === 'error' || level === 'warn' ? console.error : console.log;
    if (details && Object.keys(details).length > 0) {
      print(line, details);
    } else {
      print(line);
    }
  };

  return {
    info: (message, details) => push('info', message, details),
    warn: (message, details) => push('warn', message, details),
    error: (message, details) => push('error', message, details),
    success: (message, details) => push('success', message, details),
    flush: (final) => {
      if (json) {
        console.log(JSON.stringify({ events, result: final ?? null }, null, 2));
      }
    },
  };
}
