import { describe, expect, it } from 'vitest';

import { DEFAULT_TRACK_TITLE } from '../src/request.js';
import { DEFAULT_TRACK_SLUG, audioFileNameFor, slugifyTitle } from '../src/slug.js';

describe('slugifyTitle', () => {
  it('replaces spaces and punctuation with underscores', () => {
    expect(slugifyTitle('Night Drive: Part 2!')).toBe('Night_Drive_Part_2');
  });

  it('keeps hyphens, underscores and non-latin letters', () => {
    expect(slugifyTitle('lo-fi_mix 夏の歌')).toBe('lo-fi_mix_夏の歌');
  });

  it('collapses runs and trims edge underscores', () => {
    expect(slugifyTitle('__  hello   ***  world  __')).toBe('hello_world');
  });

  it('is deterministic', () => {
    expect(slugifyTitle('Same Title')).toBe(slugifyTitle('Same Title'));
  });

  it('falls back when nothing usable remains', () => {
    expect(slugifyTitle('')).toBe(DEFAULT_TRACK_SLUG);
    expect(slugifyTitle('   ')).toBe(DEFAULT_TRACK_SLUG);
    expect(slugifyTitle('!!! ??? ***')).toBe('Generated_Track');
  });

  it('uses the same name as the default title', () => {
    expect(slugifyTitle(DEFAULT_TRACK_TITLE)).toBe(DEFAULT_TRACK_SLUG);
    expect(audioFileNameFor('!!!')).toBe(audioFileNameFor(DEFAULT_TRACK_TITLE));
  });
});

describe('audioFileNameFor', () => {
  it('appends the mp3 extension to the slug', () => {
    expect(audioFileNameFor('Hello World')).toBe('Hello_World.mp3');
  });
});
