export type GenerationStage = 'submit' | 'poll' | 'download' | 'cover' | 'manifest';

/**
 * Local artifacts of one finished generation job. The caller owns the files.
 */
export interface GenerationResult {
  audioPath: string;
  coverPath: string | null;
  title: string | null;
  tags: string | null;
  duration: number | null;
  clipId: string | null;
}

export * from './errors.js';
