/** Slug of the default track title; blank and unusable titles both land here. */
export const DEFAULT_TRACK_SLUG = 'Generated_Track';

/**
 * Filesystem-safe name for a track title. Runs of anything other than letters,
 * digits, `_` and `-` collapse to one `_`; edge underscores are trimmed.
 */
export function slugifyTitle(title: string): string {
  const trimmed = title.trim();
  if (!trimmed) return DEFAULT_TRACK_SLUG;
  const slug = trimmed.replace(/[^\p{L}\p{N}_-]+/gu, '_').replace(/^_+|_+$/g, '');
  return slug || DEFAULT_TRACK_SLUG;
}

export function audioFileNameFor(title: string): string {
  return `${slugifyTitle(title)}.mp3`;
}
