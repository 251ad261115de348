#!/usr/bin/env node
import { Command, CommanderError, InvalidOptionArgumentError } from 'commander';
import { createRequire } from 'node:module';
import { relative } from 'node:path';
import process from 'node:process';
import ora, { type Ora } from 'ora';
import pc from 'picocolors';

import { type GenerationStage, PollTimeoutError, ValidationError } from '@tunecast/contracts';
import type { JobStatus, PollAttemptEvent } from '@tunecast/music-generator';
import { createLogger } from '@tunecast/shared-infrastructure';

import {
  type GenerationProgressCallbacks,
  type GenerationProgressEvent,
  type OrchestratorPipeline,
  type PipelineLogger,
  type TrackRunResult,
  createPipeline,
  loadEnvFilesWithSummary,
} from '../src/index.js';
import { promptForDescription } from '../src/prompt.js';
import { createReporter } from '../src/reporter.js';

const envSummary = loadEnvFilesWithSummary({
  files: ['.env'],
  cwd: process.cwd(),
  assignToProcess: true,
  override: false,
});

const rawArgs = process.argv.slice(2);
const require = createRequire(import.meta.url);
const { version: pkgVersion } = require('../package.json') as { version: string };

if (rawArgs.includes('--version') || rawArgs.includes('-v')) {
  console.log(pkgVersion);
  process.exit(0);
}

const usage = (): never => {
  console.error(`Usage:
  tunecast generate [--prompt <text>] [options]
      --title <title>           Track title; also names the output files
      --tags <a,b>              Comma-separated style tags
      --instrumental            Ask for a track without vocals
      --max-wait <seconds>      Give up polling after this long
      --interval <seconds>      Pause between status checks
      --out <dir>               Output directory for audio, cover and manifest
      --json                    Emit structured JSON output

  tunecast status <taskId> [--json]
  tunecast resume <taskId> [--title <title>] [--max-wait <s>] [--interval <s>] [--out <dir>] [--json]`);
  process.exit(1);
};

const parseSeconds = (value: string, label: string): number => {
  const parsed = Number.parseFloat(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidOptionArgumentError(`${label} must be a positive number of seconds.`);
  }
  return parsed;
};

const collectCsv = (value: string, previous: string[] = []): string[] => {
  const parsed = value
    .split(',')
    .map((part) => part.trim())
    .filter(Boolean);
  return [...new Set([...previous, ...parsed])];
};

const toMs = (seconds: number | undefined): number | undefined =>
  seconds === undefined ? undefined : Math.round(seconds * 1000);

const parseWithCommander = async (program: Command, args: string[]): Promise<Command> => {
  program.exitOverride();
  try {
    return await program.parseAsync(['node', 'cli.js', ...args], { from: 'node' });
  } catch (error) {
    if (error instanceof CommanderError) {
      const message = error.message.trim();
      if (message) console.error(pc.red(message));
      process.exit(error.exitCode);
    }
    throw error;
  }
};

interface GenerateFlags {
  prompt?: string;
  title?: string;
  tags?: string[];
  instrumental?: boolean;
  maxWait?: number;
  interval?: number;
  out?: string;
}

const parseGenerateFlags = async (args: string[]): Promise<GenerateFlags> => {
  const program = new Command('generate')
    .usage('[--prompt <text>] [options]')
    .allowExcessArguments(false)
    .option('--prompt <text>', 'Music description')
    .option('--title <title>', 'Track title; also names the output files')
    .option('--tags <tags>', 'Comma-separated style tags', collectCsv)
    .option('--instrumental', 'Ask for a track without vocals')
    .option('--max-wait <seconds>', 'Give up polling after this long', (value) =>
      parseSeconds(value, 'Max wait'),
    )
    .option('--interval <seconds>', 'Pause between status checks', (value) =>
      parseSeconds(value, 'Interval'),
    )
    .option('--out <dir>', 'Output directory for audio, cover and manifest')
    .option('--json', 'Emit structured JSON output');

  const parsed = await parseWithCommander(program, args);
  const opts = parsed.opts<{
    prompt?: string;
    title?: string;
    tags?: string[];
    instrumental?: boolean;
    maxWait?: number;
    interval?: number;
    out?: string;
  }>();

  return {
    prompt: opts.prompt,
    title: opts.title,
    tags: opts.tags,
    instrumental: opts.instrumental,
    maxWait: opts.maxWait,
    interval: opts.interval,
    out: opts.out,
  };
};

interface ResumeFlags {
  taskId: string;
  title?: string;
  maxWait?: number;
  interval?: number;
  out?: string;
}

const parseResumeFlags = async (args: string[]): Promise<ResumeFlags> => {
  const program = new Command('resume')
    .usage('<taskId> [options]')
    .argument('<taskId>', 'Task id printed by an earlier generate run')
    .option('--title <title>', 'Title used when the task was submitted')
    .option('--max-wait <seconds>', 'Give up polling after this long', (value) =>
      parseSeconds(value, 'Max wait'),
    )
    .option('--interval <seconds>', 'Pause between status checks', (value) =>
      parseSeconds(value, 'Interval'),
    )
    .option('--out <dir>', 'Output directory for audio, cover and manifest')
    .option('--json', 'Emit structured JSON output');

  const parsed = await parseWithCommander(program, args);
  const opts = parsed.opts<{ title?: string; maxWait?: number; interval?: number; out?: string }>();
  return { taskId: requireTaskId(parsed.args), ...opts };
};

const parseStatusFlags = async (args: string[]): Promise<{ taskId: string }> => {
  const program = new Command('status')
    .usage('<taskId> [--json]')
    .argument('<taskId>', 'Task id to query')
    .option('--json', 'Emit structured JSON output');

  const parsed = await parseWithCommander(program, args);
  return { taskId: requireTaskId(parsed.args) };
};

const requireTaskId = (args: string[]): string => {
  const taskId = args[0]?.trim();
  if (!taskId) throw new ValidationError('A task id is required.');
  return taskId;
};

const command = rawArgs[0] && !rawArgs[0].startsWith('-') ? rawArgs[0] : null;
const jsonOutput = rawArgs.includes('--json');
const useFancy = !jsonOutput && process.stdout.isTTY === true;
const reporter = createReporter({ json: jsonOutput });

reporter.info('Environment files processed', {
  loaded: envSummary.loadedFiles.map((file) => relative(process.cwd(), file)),
  assignedKeys: envSummary.assignedKeys.length,
});

const pipelineLogger: PipelineLogger = {
  log(event) {
    const { level, message, detail, runId, stage } = event;
    // Spinner output already covers stage progress on a terminal.
    if (!jsonOutput && message.startsWith('stage.')) return;
    if (level === 'debug') return;

    const payload: Record<string, unknown> = {};
    if (runId) payload.runId = runId;
    if (stage) payload.stage = stage;
    if (detail && Object.keys(detail).length > 0) payload.detail = detail;

    if (level === 'error') reporter.error(message, payload);
    else if (level === 'warn') reporter.warn(message, payload);
    else if (jsonOutput) reporter.info(message, payload);
  },
};

const buildPipeline = (outDir?: string): OrchestratorPipeline =>
  createPipeline({
    outputDir: outDir,
    logger: pipelineLogger,
    serviceLogger: createLogger({
      name: 'tunecast',
      level: process.env.LOG_LEVEL ?? 'warn',
      destination: process.stderr,
    }),
  });

const stageLabels: Record<GenerationStage, string> = {
  submit: 'Submitting generation job',
  poll: 'Waiting for the music service',
  download: 'Downloading audio and cover',
  cover: 'Selecting cover art',
  manifest: 'Writing manifest',
};

const formatSuccessText = (event: GenerationProgressEvent): string => {
  const label = stageLabels[event.stage];
  const detail = event.detail ?? {};
  switch (event.stage) {
    case 'submit':
      return typeof detail.taskId === 'string' ? `${label} → task ${detail.taskId}` : label;
    case 'cover':
      return typeof detail.source === 'string' ? `${label} (${detail.source})` : label;
    default:
      return label;
  }
};

const formatSkipText = (event: GenerationProgressEvent): string => {
  const reason = typeof event.detail?.reason === 'string' ? ` (${event.detail.reason})` : '';
  return `${stageLabels[event.stage]} skipped${reason}`;
};

let activeSpinner: Ora | null = null;

// Output file names depend on the title and directory, so a resume must repeat them.
let resumeContext: { title?: string; out?: string } = {};

const buildResumeCommand = (handle: string): string => {
  const parts = ['tunecast', 'resume', handle];
  if (resumeContext.title) parts.push('--title', JSON.stringify(resumeContext.title));
  if (resumeContext.out) parts.push('--out', JSON.stringify(resumeContext.out));
  return parts.join(' ');
};

const createProgressCallbacks = (): GenerationProgressCallbacks => {
  if (!useFancy) return {};
  const spinner = ora({ spinner: 'dots', color: 'cyan' });
  activeSpinner = spinner;

  return {
    onStage: (event) => {
      if (event.status === 'start') {
        spinner.start(stageLabels[event.stage]);
        return;
      }
      if (event.status === 'success') {
        spinner.succeed(formatSuccessText(event));
        return;
      }
      if (spinner.isSpinning) spinner.stop();
      spinner.info(formatSkipText(event));
    },
    onPollAttempt: (event: PollAttemptEvent) => {
      const seconds = Math.round(event.elapsedMs / 1000);
      spinner.text = `${stageLabels.poll} (check ${event.attempt}, ${seconds}s, ${event.outcome})`;
    },
  };
};

const outputRunSummary = (run: TrackRunResult): void => {
  if (jsonOutput) return;
  console.log('\nTrack');
  console.log(`  Task     : ${run.taskId}`);
  if (run.result.title) console.log(`  Title    : ${run.result.title}`);
  if (run.result.tags) console.log(`  Tags     : ${run.result.tags}`);
  if (run.result.duration !== null) console.log(`  Duration : ${run.result.duration}s`);
  console.log(`  Audio    : ${run.result.audioPath}`);
  console.log(`  Cover    : ${run.cover.path ?? 'none'} (${run.cover.source})`);
  console.log(`  Manifest : ${run.manifestPath}`);
};

const describeStatus = (status: JobStatus): string => {
  switch (status.kind) {
    case 'pending':
      return status.reason === 'processing' ? 'pending (processing)' : 'pending (no result yet)';
    case 'succeeded':
      return `succeeded${status.clip.audioUrl ? ` → ${status.clip.audioUrl}` : ''}`;
    case 'failed':
      return 'failed';
    case 'unknown':
      return `in progress (${status.state ?? 'no state'})`;
  }
};

async function handleGenerate(args: string[]): Promise<void> {
  const flags = await parseGenerateFlags(args);
  resumeContext = { title: flags.title?.trim(), out: flags.out };
  let description = flags.prompt?.trim();
  if (!description) {
    if (jsonOutput || !process.stdin.isTTY) {
      throw new ValidationError('Missing --prompt. Pass a description or run in an interactive terminal.');
    }
    description = await promptForDescription();
  }

  const pipeline = buildPipeline(flags.out);
  reporter.info('Starting music generation', {
    title: flags.title,
    outputDir: pipeline.settings.outputDir,
  });

  const run = await pipeline.newTrack(
    {
      description,
      title: flags.title,
      tags: flags.tags,
      instrumental: flags.instrumental,
      maxWaitMs: toMs(flags.maxWait),
      intervalMs: toMs(flags.interval),
    },
    createProgressCallbacks(),
  );

  reporter.success('Track ready', { taskId: run.taskId, steps: run.steps });
  outputRunSummary(run);
  reporter.flush({ command: 'generate', result: run });
}

async function handleResume(args: string[]): Promise<void> {
  const flags = await parseResumeFlags(args);
  resumeContext = { title: flags.title?.trim(), out: flags.out };
  const pipeline = buildPipeline(flags.out);
  reporter.info('Resuming generation task', { taskId: flags.taskId });

  const run = await pipeline.resumeTrack(
    {
      taskId: flags.taskId,
      title: flags.title,
      maxWaitMs: toMs(flags.maxWait),
      intervalMs: toMs(flags.interval),
    },
    createProgressCallbacks(),
  );

  reporter.success('Track ready', { taskId: run.taskId, steps: run.steps });
  outputRunSummary(run);
  reporter.flush({ command: 'resume', result: run });
}

async function handleStatus(args: string[]): Promise<void> {
  const { taskId } = await parseStatusFlags(args);
  const pipeline = buildPipeline();
  const status = await pipeline.getTaskStatus(taskId);
  if (!jsonOutput) {
    console.log(`Task ${taskId}: ${describeStatus(status)}`);
  }
  reporter.flush({ command: 'status', taskId, status });
}

async function main(): Promise<void> {
  try {
    switch (command) {
      case 'generate':
        await handleGenerate(rawArgs.slice(1));
        return;
      case 'status':
        await handleStatus(rawArgs.slice(1));
        return;
      case 'resume':
        await handleResume(rawArgs.slice(1));
        return;
      case null:
        await handleGenerate(rawArgs);
        return;
      default:
        usage();
    }
  } catch (error: unknown) {
    if (activeSpinner?.isSpinning) activeSpinner.fail();
    const name = error instanceof Error ? error.name : 'Error';
    const message = error instanceof Error ? error.message : String(error);
    const resumeCommand =
      error instanceof PollTimeoutError ? buildResumeCommand(error.handle) : undefined;

    if (jsonOutput) {
      reporter.error(message, { name });
      reporter.flush({ command: command ?? 'generate', error: { name, message, resumeCommand } });
    } else {
      console.error(pc.red(`${name}: ${message}`));
      if (resumeCommand) console.error(pc.dim(`Resume with: ${resumeCommand}`));
    }
    process.exit(1);
  }
}

await main();
