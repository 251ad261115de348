import { access } from 'node:fs/promises';
import { isAbsolute, resolve } from 'node:path';

import { readBool, readFirstString, readInt, readString } from '@tunecast/shared-infrastructure';
import { DEFAULT_MODEL_VERSION } from '@tunecast/music-generator';

/** Accepted names for the music service key, in lookup order. */
export const API_KEY_ENV_VARS = [
  'SUNO_API_KEY',
  'AIMUSIC_API_KEY',
  'AIMUSIC_API_TOKEN',
  'AIMUSIC_KEY',
] as const;

export const DEFAULT_BASE_URL = 'https://api.sunoapi.com';
export const DEFAULT_OUTPUT_DIR = 'output/music';
export const DEFAULT_FALLBACK_COVER = 'covers/cover.jpg';
const DEFAULT_MAX_WAIT_SECONDS = 360;
const DEFAULT_POLL_INTERVAL_SECONDS = 15;

export type GeneratorSettings = {
  apiKey: string | undefined;
  baseUrl: string;
  /** Absolute directory for audio, covers and manifests. */
  outputDir: string;
  model: string;
  maxWaitMs: number;
  intervalMs: number;
  /** Default for requests that do not say whether they want vocals. */
  instrumental: boolean;
  /** Absolute path of the cover used when the service provides none. */
  fallbackCoverPath: string;
};

export type GeneratorSettingsOverrides = Partial<GeneratorSettings> & {
  cwd?: string;
};

/**
 * Merges caller overrides over environment variables over built-in defaults.
 * Relative paths resolve against `cwd`.
 */
export function resolveGeneratorSettings(
  overrides: GeneratorSettingsOverrides = {},
): GeneratorSettings {
  const cwd = resolve(overrides.cwd ?? process.cwd());
  const outputDir = overrides.outputDir ?? readString('TUNECAST_OUTPUT_DIR') ?? DEFAULT_OUTPUT_DIR;
  const fallbackCover =
    overrides.fallbackCoverPath ?? readString('TUNECAST_FALLBACK_COVER') ?? DEFAULT_FALLBACK_COVER;

  return {
    apiKey: overrides.apiKey ?? readFirstString(API_KEY_ENV_VARS),
    baseUrl: overrides.baseUrl ?? readString('AIMUSIC_BASE_URL') ?? DEFAULT_BASE_URL,
    outputDir: resolvePath(outputDir, cwd),
    model: overrides.model ?? readString('SUNO_MODEL_VERSION') ?? DEFAULT_MODEL_VERSION,
    maxWaitMs:
      overrides.maxWaitMs ?? readSecondsAsMs('TUNECAST_MAX_WAIT_SECONDS', DEFAULT_MAX_WAIT_SECONDS),
    intervalMs:
      overrides.intervalMs ??
      readSecondsAsMs('TUNECAST_POLL_INTERVAL_SECONDS', DEFAULT_POLL_INTERVAL_SECONDS),
    instrumental: overrides.instrumental ?? readBool('TUNECAST_INSTRUMENTAL', false),
    fallbackCoverPath: resolvePath(fallbackCover, cwd),
  };
}

export async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/** Zero and negative values fall back to the default. */
function readSecondsAsMs(name: string, defaultSeconds: number): number {
  const seconds = readInt(name, defaultSeconds);
  return Math.round((seconds > 0 ? seconds : defaultSeconds) * 1000);
}

function resolvePath(input: string, base: string): string {
  return isAbsolute(input) ? input : resolve(base, input);
}
