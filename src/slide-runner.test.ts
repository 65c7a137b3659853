import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { pathToFileURL } from 'node:url';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { Mock } from 'vitest';
import { decodePng, encodePng } from './codec/png.js';
import { createBitmap, getPixel } from './compose/bitmap.js';
import { EventBus } from './events/event-bus.js';
import type { SlideEvents } from './events/event-types.js';
import { AbortError } from './lib/async.js';
import { SourceNotFoundError } from './lib/errors.js';
import type { CaptureService } from './render/browser-renderer.js';
import { SlideRunner, expandHome } from './slide-runner.js';
import type { SlideRequest } from './slide-runner.js';
import { SlideStore } from './store/slide-store.js';
import type { Rgb } from './types/geometry.js';

const RED = { r: 200, g: 10, b: 10 };
const BACKGROUND = { r: 5, g: 5, b: 8 };

function expectNearRed(pixel: Rgb): void {
  expect(Math.abs(pixel.r - RED.r)).toBeLessThanOrEqual(1);
  expect(Math.abs(pixel.g - RED.g)).toBeLessThanOrEqual(1);
  expect(Math.abs(pixel.b - RED.b)).toBeLessThanOrEqual(1);
}

describe('expandHome', () => {
  it('expands a leading tilde only', () => {
    expect(expandHome('~/decks/a.html', '/home/ada')).toBe('/home/ada/decks/a.html');
    expect(expandHome('~', '/home/ada')).toBe('/home/ada');
    expect(expandHome('decks/a.html', '/home/ada')).toBe('decks/a.html');
    expect(expandHome('~bob/a.html', '/home/ada')).toBe('~bob/a.html');
  });
});

describe('SlideRunner', () => {
  let dir: string;
  let htmlPath: string;
  let events: EventBus<SlideEvents>;
  let seen: SlideEvents[];
  let capture: Mock<CaptureService>;
  let store: SlideStore;

  const request = (patch: Partial<SlideRequest> = {}): SlideRequest => ({
    htmlPath,
    target: { width: 16, height: 9 },
    mode: 'fit',
    focus: { x: 0.5, y: 0.5 },
    background: BACKGROUND,
    waitMs: 0,
    zoom: 1,
    selector: null,
    deviceScaleFactor: 2,
    timeoutMs: 1000,
    overwrite: false,
    ...patch,
  });

  const runner = () => {
    const clock = [100, 140];
    return new SlideRunner({
      events,
      store,
      capture,
      executablePath: '/opt/chrome/chrome',
      now: () => clock.shift() ?? 0,
    });
  };

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'slide-runner-'));
    htmlPath = join(dir, 'deck.html');
    await writeFile(htmlPath, '<html><body>hi</body></html>', 'utf8');
    store = new SlideStore(join(dir, 'out'));
    events = new EventBus<SlideEvents>();
    seen = [];
    events.onAny(event => seen.push(event));
    const screenshot = await encodePng(createBitmap({ width: 40, height: 20 }, RED));
    capture = vi.fn<CaptureService>(async () => screenshot);
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('captures, composes and saves a letterboxed slide', async () => {
    const result = await runner().run(request());

    const outputPath = join(dir, 'out', 'deck_slides', 'deck_slide.png');
    expect(result).toEqual({
      status: 'saved',
      outputPath,
      plan: { mode: 'fit', scale: 0.4, scaled: { width: 16, height: 8 }, offset: { x: 0, y: 0 } },
    });

    const slide = await decodePng(await readFile(outputPath));
    expect(slide.width).toBe(16);
    expect(slide.height).toBe(9);
    expectNearRed(getPixel(slide, 0, 0));
    expectNearRed(getPixel(slide, 15, 7));
    expect(getPixel(slide, 0, 8)).toEqual(BACKGROUND);

    expect(capture).toHaveBeenCalledWith({
      url: pathToFileURL(htmlPath).href,
      viewport: { width: 16, height: 9 },
      deviceScaleFactor: 2,
      waitMs: 0,
      zoom: 1,
      selector: null,
      timeoutMs: 1000,
      executablePath: '/opt/chrome/chrome',
      signal: undefined,
    });
    expect(seen.map(e => e.type)).toEqual(['capture.start', 'capture.done', 'compose.done', 'slide.saved']);
    const done = seen.find(e => e.type === 'capture.done');
    expect(done?.data).toEqual({ url: pathToFileURL(htmlPath).href, bytes: expect.any(Number), ms: 40 });
  });

  it('skips an existing slide unless asked to overwrite', async () => {
    await runner().run(request());
    const second = await runner().run(request());
    expect(second).toEqual({ status: 'skipped', outputPath: join(dir, 'out', 'deck_slides', 'deck_slide.png') });
    expect(capture).toHaveBeenCalledTimes(1);
    expect(seen.at(-1)?.type).toBe('slide.skipped');

    const third = await runner().run(request({ overwrite: true }));
    expect(third.status).toBe('saved');
    expect(capture).toHaveBeenCalledTimes(2);
  });

  it('never renders below a device scale factor of 1', async () => {
    await runner().run(request({ deviceScaleFactor: 0.5 }));
    expect(capture.mock.calls[0]?.[0].deviceScaleFactor).toBe(1);
  });

  it('rejects a path that is not a file', async () => {
    await expect(runner().run(request({ htmlPath: join(dir, 'nope.html') }))).rejects.toBeInstanceOf(
      SourceNotFoundError,
    );
    await mkdir(join(dir, 'folder.html'));
    await expect(runner().run(request({ htmlPath: join(dir, 'folder.html') }))).rejects.toThrow(
      `HTML file not found: ${join(dir, 'folder.html')}`,
    );
    expect(capture).not.toHaveBeenCalled();
  });

  it('stops before capturing when already aborted', async () => {
    const controller = new AbortController();
    controller.abort('interrupted (SIGINT)');
    await expect(runner().run(request(), controller.signal)).rejects.toBeInstanceOf(AbortError);
    expect(capture).not.toHaveBeenCalled();
  });

  it('propagates capture failures without writing anything', async () => {
    capture.mockRejectedValueOnce(new Error('net::ERR_FILE_NOT_FOUND'));
    await expect(runner().run(request())).rejects.toThrow('net::ERR_FILE_NOT_FOUND');
    expect(await store.exists(store.pathFor(htmlPath))).toBe(false);
  });
});
