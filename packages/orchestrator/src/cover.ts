import type { GenerationResult } from '@tunecast/contracts';

import { fileExists } from './config.js';
import type { CoverSource } from './manifest.js';

export type CoverSelection = {
  path: string | null;
  source: CoverSource;
};

/**
 * Picks the image a renderer should put behind the track: the downloaded cover if it
 * is on disk, else the fallback cover if that is on disk, else nothing.
 */
export async function selectCoverArt(
  result: Pick<GenerationResult, 'coverPath'>,
  fallbackCoverPath: string | undefined,
): Promise<CoverSelection> {
  if (result.coverPath && (await fileExists(result.coverPath))) {
    return { path: result.coverPath, source: 'generated' };
  }
  if (fallbackCoverPath && (await fileExists(fallbackCoverPath))) {
    return { path: fallbackCoverPath, source: 'fallback' };
  }
  return { path: null, source: 'none' };
}
