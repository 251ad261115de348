import { basename, dirname, join } from 'node:path';
import { mkdir, readFile, writeFile } from 'node:fs/promises';

import type { GenerationResult } from '@tunecast/contracts';
import { z } from 'zod';

export const CURRENT_MANIFEST_SCHEMA_VERSION = 1;

export type CoverSource = 'generated' | 'fallback' | 'none';

export type ManifestRequest = {
  description: string;
  title: string;
  tags: string[];
  instrumental: boolean;
  model: string;
};

export type GenerationManifest = {
  schemaVersion: number;
  taskId: string;
  /** Absent when the run resumed a task this machine never submitted. */
  request?: ManifestRequest;
  result: GenerationResult;
  cover: {
    path: string | null;
    source: CoverSource;
  };
  timestamp: string;
};

const nullableText = z.string().nullable();

const GenerationManifestSchema = z.object({
  schemaVersion: z.number().int().default(CURRENT_MANIFEST_SCHEMA_VERSION),
  taskId: z.string(),
  request: z
    .object({
      description: z.string(),
      title: z.string(),
      tags: z.array(z.string()),
      instrumental: z.boolean(),
      model: z.string(),
    })
    .optional(),
  result: z.object({
    audioPath: z.string(),
    coverPath: nullableText,
    title: nullableText,
    tags: nullableText,
    duration: z.number().nullable(),
    clipId: nullableText,
  }),
  cover: z.object({
    path: nullableText,
    source: z.enum(['generated', 'fallback', 'none']),
  }),
  timestamp: z.string(),
});

/**
 * Manifests live beside the audio file: `track.mp3` → `track.manifest.json`.
 */
export type ManifestStore = {
  manifestPathFor(audioPath: string): string;
  writeManifest(audioPath: string, manifest: GenerationManifest): Promise<string>;
  readManifest(audioPath: string): Promise<GenerationManifest | null>;
};

export function createFilesystemManifestStore(): ManifestStore {
  const manifestPathFor = (audioPath: string): string => {
    const dir = dirname(audioPath);
    const base = basename(audioPath).replace(/\.[^.]+$/, '');
    return join(dir, `${base}.manifest.json`);
  };

  return {
    manifestPathFor,
    async writeManifest(audioPath, manifest) {
      const target = manifestPathFor(audioPath);
      await mkdir(dirname(target), { recursive: true });
      await writeFile(target, JSON.stringify(manifest, null, 2));
      return target;
    },
    async readManifest(audioPath) {
      let contents: string;
      try {
        contents = await readFile(manifestPathFor(audioPath), 'utf8');
      } catch {
        return null;
      }
      let json: unknown;
      try {
        json = JSON.parse(contents);
      } catch {
        return null;
      }
      const parsed = GenerationManifestSchema.safeParse(json);
      return parsed.success ? parsed.data : null;
    },
  };
}

const defaultManifestStore = createFilesystemManifestStore();

export function manifestPathFor(audioPath: string): string {
  return defaultManifestStore.manifestPathFor(audioPath);
}

export async function writeManifest(
  audioPath: string,
  manifest: GenerationManifest,
): Promise<string> {
  return defaultManifestStore.writeManifest(audioPath, manifest);
}

export async function readManifest(audioPath: string): Promise<GenerationManifest | null> {
  return defaultManifestStore.readManifest(audioPath);
}
