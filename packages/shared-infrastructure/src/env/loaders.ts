/**
 * Environment loading for the CLI and library entry points.
 * `.env` files are parsed with dotenv and merged into `process.env` without
 * clobbering variables the shell already exported (unless `override` is set).
 */
import { parse } from 'dotenv';
import { existsSync, readFileSync, statSync } from 'node:fs';
import { isAbsolute, resolve } from 'node:path';

export interface LoadEnvOptions {
  cwd?: string;
  files?: string[];
  override?: boolean;
  assignToProcess?: boolean;
  memoize?: boolean;
  memoizeKey?: string;
}

export interface LoadEnvSummary {
  loadedFiles: string[];
  missingFiles: string[];
  assignedKeys: string[];
  overriddenKeys: string[];
}

type EnvFileMeta = { path: string; mtimeMs: number; size: number; exists: boolean };

type LoadOutcome = LoadEnvSummary & { collected: Record<string, string> };

type EnvCacheEntry = {
  collected: Record<string, string>;
  loadedFiles: string[];
  missingFiles: string[];
  metas: EnvFileMeta[];
};

const envCache = new Map<string, EnvCacheEntry>();

function statFile(path: string): EnvFileMeta {
  if (!existsSync(path)) {
    return { path, mtimeMs: 0, size: 0, exists: false };
  }
  try {
    const stats = statSync(path);
    return { path, mtimeMs: stats.mtimeMs, size: stats.size, exists: true };
  } catch {
    return { path, mtimeMs: 0, size: 0, exists: false };
  }
}

function sameMetas(a: EnvFileMeta[], b: EnvFileMeta[]): boolean {
  if (a.length !== b.length) return false;
  return a.every((meta, idx) => {
    const current = b[idx];
    return (
      current !== undefined &&
      meta.path === current.path &&
      meta.exists === current.exists &&
      meta.mtimeMs === current.mtimeMs &&
      meta.size === current.size
    );
  });
}

function resolveFiles(options: LoadEnvOptions): { cwd: string; files: string[] } {
  const cwd = resolve(options.cwd ?? process.cwd());
  const requested = options.files && options.files.length > 0 ? options.files : ['.env'];
  return {
    cwd,
    files: requested.map((file) => (isAbsolute(file) ? file : resolve(cwd, file))),
  };
}

function assignCollected(
  collected: Record<string, string>,
  override: boolean,
  assignedKeys: Set<string>,
  overriddenKeys: Set<string>,
): void {
  for (const [key, value] of Object.entries(collected)) {
    const alreadySet = process.env[key] !== undefined;
    if (alreadySet && !override) continue;
    if (alreadySet) {
      overriddenKeys.add(key);
    } else {
      assignedKeys.add(key);
    }
    process.env[key] = value;
  }
}

function applyEnvFiles(options: LoadEnvOptions): LoadOutcome {
  const { cwd, files } = resolveFiles(options);
  const override = options.override ?? false;
  const assignToProcess = options.assignToProcess ?? true;
  const memoize = options.memoize ?? false;
  const cacheKey = memoize
    ? JSON.stringify({ cwd, files, override, assignToProcess, memoizeKey: options.memoizeKey ?? '' })
    : null;

  const metas = files.map(statFile);
  const assignedKeys = new Set<string>();
  const overriddenKeys = new Set<string>();

  const cached = cacheKey ? envCache.get(cacheKey) : undefined;
  if (cached && sameMetas(cached.metas, metas)) {
    if (assignToProcess) {
      assignCollected(cached.collected, override, assignedKeys, overriddenKeys);
    }
    return {
      collected: { ...cached.collected },
      loadedFiles: [...cached.loadedFiles],
      missingFiles: [...cached.missingFiles],
      assignedKeys: [...assignedKeys],
      overriddenKeys: [...overriddenKeys],
    };
  }

  const collected: Record<string, string> = {};
  const loadedFiles: string[] = [];
  const missingFiles: string[] = [];

  metas.forEach((meta) => {
    if (!meta.exists) {
      missingFiles.push(meta.path);
      return;
    }
    loadedFiles.push(meta.path);
    let parsed: Record<string, string>;
    try {
      parsed = parse(readFileSync(meta.path, 'utf8'));
    } catch {
      // unreadable files are skipped, same as dotenv
      return;
    }
    for (const [key, value] of Object.entries(parsed)) {
      if (override || collected[key] === undefined) {
        collected[key] = value;
      }
    }
  });

  if (assignToProcess) {
    assignCollected(collected, override, assignedKeys, overriddenKeys);
  }

  if (cacheKey) {
    envCache.set(cacheKey, {
      collected: { ...collected },
      loadedFiles: [...loadedFiles],
      missingFiles: [...missingFiles],
      metas,
    });
  }

  return {
    collected,
    loadedFiles,
    missingFiles,
    assignedKeys: [...assignedKeys],
    overriddenKeys: [...overriddenKeys],
  };
}

/**
 * Load environment variables from .env files and return the merged key/value map.
 */
export function loadEnvFiles(options: LoadEnvOptions = {}): Record<string, string> {
  return applyEnvFiles(options).collected;
}

/**
 * Load env files and return a summary of what happened (without exposing values).
 */
export function loadEnvFilesWithSummary(options: LoadEnvOptions = {}): LoadEnvSummary {
  const { loadedFiles, missingFiles, assignedKeys, overriddenKeys } = applyEnvFiles(options);
  return { loadedFiles, missingFiles, assignedKeys, overriddenKeys };
}

export function readBool(name: string, def: boolean): boolean {
  const v = process.env[name];
  if (v == null || v === '') return def;
  return v === '1' || v.toLowerCase() === 'true';
}

export function readInt(name: string, def: number): number {
  const v = process.env[name];
  if (!v) return def;
  const n = Number(v);
  return Number.isFinite(n) ? n : def;
}

export function readString(name: string, def?: string): string | undefined {
  const v = process.env[name];
  if (v == null || v === '') return def;
  return v;
}

/**
 * First non-blank value among several aliases of the same setting.
 */
export function readFirstString(names: readonly string[], def?: string): string | undefined {
  for (const name of names) {
    const v = process.env[name]?.trim();
    if (v) return v;
  }
  return def;
}
