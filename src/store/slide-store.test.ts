import { mkdtemp, readdir, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { SlideStore } from './slide-store.js';

describe('SlideStore', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'slide-store-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('derives the output path from the document name', () => {
    const store = new SlideStore('/srv/out');
    expect(store.pathFor('/decks/q3-review.html')).toBe('/srv/out/q3-review_slides/q3-review_slide.png');
    expect(store.pathFor('/decks/notes.v2.htm')).toBe('/srv/out/notes.v2_slides/notes.v2_slide.png');
  });

  it('resolves a relative output root against the working directory', () => {
    const store = new SlideStore('output');
    expect(store.outputRoot).toBe(join(process.cwd(), 'output'));
  });

  it('saves into fresh directories and leaves no temp file behind', async () => {
    const store = new SlideStore(join(dir, 'out'));
    const target = store.pathFor('/decks/intro.html');

    expect(await store.exists(target)).toBe(false);
    await store.save(target, Uint8Array.from([1, 2, 3]));
    expect(await store.exists(target)).toBe(true);
    expect(Array.from(await readFile(target))).toEqual([1, 2, 3]);
    expect(await readdir(join(dir, 'out', 'intro_slides'))).toEqual(['intro_slide.png']);
  });

  it('does not count a directory as an existing slide', async () => {
    const store = new SlideStore(dir);
    expect(await store.exists(dir)).toBe(false);
  });
});
