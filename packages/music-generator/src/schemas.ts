import { z } from 'zod';

import type { Clip } from './types.js';

/** Exact acknowledgment of `POST /api/v1/suno/create`; anything else is a rejection. */
export const CreateAckSchema = z.looseObject({
  message: z.literal('success'),
  task_id: z.union([z.string().trim().min(1), z.number().transform(String)]),
});

export const STATUS_SUCCESS_CODE = 200;

/** Top level of `GET /api/v1/suno/task/{id}`; only the shape is enforced here. */
export const StatusEnvelopeSchema = z.looseObject({
  code: z.unknown().optional(),
  data: z.unknown().optional(),
});

export const ClipStateSchema = z.looseObject({
  state: z.string().nullable().catch(null),
});

const optionalText = z.string().trim().min(1).nullable().catch(null);

const ClipSchema = z.looseObject({
  clip_id: optionalText,
  audio_url: optionalText,
  image_url: optionalText,
  title: optionalText,
  tags: optionalText,
  duration: z.union([z.number(), z.string()]).nullable().catch(null),
});

function toDuration(value: number | string | null): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (value === null || value.trim() === '') return null;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : null;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Reads a clip leniently: malformed or missing fields become `null` instead of failing.
 */
export function parseClip(raw: Record<string, unknown>): Clip {
  const parsed = ClipSchema.parse(raw);
  return {
    clipId: parsed.clip_id,
    audioUrl: parsed.audio_url,
    imageUrl: parsed.image_url,
    title: parsed.title,
    tags: parsed.tags,
    duration: toDuration(parsed.duration),
    raw,
  };
}
