import { mkdtemp, readFile, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { describe, expect, it } from 'vitest';

import { createFilesystemManifestStore, type GenerationManifest } from '../src/manifest.js';

const store = createFilesystemManifestStore();

const manifestFor = (audioPath: string): GenerationManifest => ({
  schemaVersion: 1,
  taskId: 'abc123',
  request: {
    description: 'calm piano',
    title: 'Calm',
    tags: ['piano'],
    instrumental: true,
    model: 'chirp-v4',
  },
  result: {
    audioPath,
    coverPath: null,
    title: 'Calm',
    tags: 'piano',
    duration: 61.5,
    clipId: 'c1',
  },
  cover: { path: null, source: 'none' },
  timestamp: '2026-01-01T00:00:00.000Z',
});

describe('filesystem manifest store', () => {
  it('places the manifest beside the audio file', () => {
    expect(store.manifestPathFor('/music/Calm.mp3')).toBe('/music/Calm.manifest.json');
    expect(store.manifestPathFor('/music/no-extension')).toBe('/music/no-extension.manifest.json');
  });

  it('writes pretty JSON and reads it back', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'tunecast-manifest-'));
    const audioPath = join(dir, 'nested', 'Calm.mp3');
    const manifest = manifestFor(audioPath);

    const written = await store.writeManifest(audioPath, manifest);

    expect(written).toBe(join(dir, 'nested', 'Calm.manifest.json'));
    expect(await readFile(written, 'utf8')).toBe(JSON.stringify(manifest, null, 2));
    await expect(store.readManifest(audioPath)).resolves.toEqual(manifest);
  });

  it('reads a missing manifest as null', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'tunecast-manifest-'));

    await expect(store.readManifest(join(dir, 'Calm.mp3'))).resolves.toBeNull();
  });

  it('reads malformed JSON as null', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'tunecast-manifest-'));
    await writeFile(join(dir, 'Calm.manifest.json'), '{"taskId":');

    await expect(store.readManifest(join(dir, 'Calm.mp3'))).resolves.toBeNull();
  });

  it('reads a manifest of the wrong shape as null', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'tunecast-manifest-'));
    await writeFile(join(dir, 'Calm.manifest.json'), JSON.stringify({ taskId: 7 }));

    await expect(store.readManifest(join(dir, 'Calm.mp3'))).resolves.toBeNull();
  });

  it('defaults a missing schema version and keeps an absent request absent', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'tunecast-manifest-'));
    const audioPath = join(dir, 'Calm.mp3');
    const { schemaVersion: _schemaVersion, request: _request, ...legacy } = manifestFor(audioPath);
    await writeFile(join(dir, 'Calm.manifest.json'), JSON.stringify(legacy));

    const read = await store.readManifest(audioPath);

    expect(read?.schemaVersion).toBe(1);
    expect(read).not.toHaveProperty('request');
  });
});
