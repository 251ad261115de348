import { mkdir, writeFile } from 'node:fs/promises';
import { extname, resolve } from 'node:path';

import { MissingArtifactError, TransportError, type GenerationResult } from '@tunecast/contracts';
import { logger as rootLogger } from '@tunecast/shared-infrastructure';

import type { Clip, FetchLike, RetrieveOptions } from './types.js';

const DEFAULT_DOWNLOAD_TIMEOUT_MS = 300_000;
export const COVER_SUFFIX = '_cover.jpg';

export function coverFileNameFor(audioFileName: string): string {
  const ext = extname(audioFileName);
  const stem = ext ? audioFileName.slice(0, -ext.length) : audioFileName;
  return `${stem}${COVER_SUFFIX}`;
}

type DownloadOptions = {
  fetch?: FetchLike;
  timeoutMs?: number;
};

/**
 * Fetches `url` into `targetPath`, replacing any existing file.
 * The file is only written once the whole body has arrived.
 * @returns number of bytes written
 */
export async function downloadArtifact(
  url: string,
  targetPath: string,
  options: DownloadOptions = {},
): Promise<number> {
  const fetchImpl = options.fetch ?? globalThis.fetch;
  const timeoutMs = options.timeoutMs ?? DEFAULT_DOWNLOAD_TIMEOUT_MS;
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  let bytes: Buffer;
  try {
    const response = await fetchImpl(url, { signal: controller.signal });
    if (!response.ok) {
      const body = await response.text().catch(() => '');
      throw new TransportError(`Download of ${url} failed with HTTP ${response.status}`, {
        status: response.status,
        body,
      });
    }
    bytes = Buffer.from(await response.arrayBuffer());
  } catch (error: unknown) {
    if (error instanceof TransportError) throw error;
    const reason =
      error instanceof Error && error.name === 'AbortError'
        ? `timed out after ${timeoutMs}ms`
        : error instanceof Error
          ? error.message
          : String(error);
    throw new TransportError(`Download of ${url} failed: ${reason}`, {}, { cause: error });
  } finally {
    clearTimeout(timeoutId);
  }

  await writeFile(targetPath, bytes);
  return bytes.length;
}

/**
 * Materializes a succeeded clip under `options.outputDir`.
 *
 * The audio download is mandatory. The cover is best effort: any failure leaves
 * `coverPath` as `null` because rendering falls back to its own cover art.
 */
export async function retrieveArtifacts(
  clip: Clip,
  fileName: string,
  options: RetrieveOptions,
): Promise<GenerationResult> {
  if (!clip.audioUrl) {
    throw new MissingArtifactError(clip.raw);
  }

  const log = options.logger ?? rootLogger;
  const download = { fetch: options.fetch, timeoutMs: options.downloadTimeoutMs };
  const outputDir = resolve(options.outputDir);
  await mkdir(outputDir, { recursive: true });

  const audioPath = resolve(outputDir, fileName);
  log.info('music.download.audio', { url: clip.audioUrl, path: audioPath });
  const audioBytes = await downloadArtifact(clip.audioUrl, audioPath, download);
  log.info('music.download.audio.saved', { path: audioPath, bytes: audioBytes });

  let coverPath: string | null = null;
  if (clip.imageUrl) {
    const target = resolve(outputDir, coverFileNameFor(fileName));
    try {
      const coverBytes = await downloadArtifact(clip.imageUrl, target, download);
      coverPath = target;
      log.info('music.download.cover.saved', { path: target, bytes: coverBytes });
    } catch (error: unknown) {
      log.warn('music.download.cover_failed', {
        url: clip.imageUrl,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  return {
    audioPath,
    coverPath,
    title: clip.title,
    tags: clip.tags,
    duration: clip.duration,
    clipId: clip.clipId,
  };
}
