import { ValidationError } from '@tunecast/contracts';

import type { CreateJobPayload, JobRequest, JobRequestInput } from './types.js';

export const DEFAULT_STYLE_TAGS = ['electronic', 'meme', 'fast', 'cute'] as const;
export const DEFAULT_MODEL_VERSION = 'chirp-v4';
export const DEFAULT_TRACK_TITLE = 'Generated Track';
export const MAX_DESCRIPTION_LENGTH = 400;

function normalizeTags(tags: readonly string[] | undefined): string[] {
  const seen = new Set<string>();
  for (const tag of tags ?? []) {
    const trimmed = tag.trim();
    if (trimmed) seen.add(trimmed);
  }
  return seen.size > 0 ? [...seen] : [...DEFAULT_STYLE_TAGS];
}

export function buildJobRequest(input: JobRequestInput): JobRequest {
  const description = input.description.trim();
  if (!description) {
    throw new ValidationError('Music description must not be empty');
  }
  if (description.length > MAX_DESCRIPTION_LENGTH) {
    throw new ValidationError(
      `Music description is ${description.length} characters; the limit is ${MAX_DESCRIPTION_LENGTH}`,
    );
  }

  return Object.freeze({
    description,
    title: input.title?.trim() || DEFAULT_TRACK_TITLE,
    tags: Object.freeze(normalizeTags(input.tags)),
    instrumental: input.instrumental ?? false,
    model: input.model?.trim() || DEFAULT_MODEL_VERSION,
  });
}

/**
 * Description mode: the service writes lyrics from the prompt, so no lyrics or tags go on the wire.
 */
export function toCreatePayload(request: JobRequest): CreateJobPayload {
  return {
    custom_mode: false,
    gpt_description_prompt: request.description,
    make_instrumental: request.instrumental,
    mv: request.model,
  };
}
