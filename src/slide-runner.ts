import { stat } from 'node:fs/promises';
import { homedir } from 'node:os';
import { resolve } from 'node:path';
import { pathToFileURL } from 'node:url';
import { decodePng, encodePng } from './codec/png.js';
import { composeSlideWithPlan } from './compose/slide-composer.js';
import type { CompositionPlan } from './compose/slide-composer.js';
import type { EventBus } from './events/event-bus.js';
import type { SlideEvents } from './events/event-types.js';
import { throwIfAborted } from './lib/async.js';
import { SourceNotFoundError } from './lib/errors.js';
import type { CaptureService } from './render/browser-renderer.js';
import type { SlideStore } from './store/slide-store.js';
import type { CompositionMode, FocusPoint, Rgb, Size } from './types/geometry.js';

export type SlideRequest = {
  htmlPath: string;
  target: Size;
  mode: CompositionMode;
  focus: FocusPoint;
  background: Rgb;
  waitMs: number;
  zoom: number;
  selector: string | null;
  deviceScaleFactor: number;
  timeoutMs: number;
  overwrite: boolean;
};

export type SlideResult =
  | { status: 'saved'; outputPath: string; plan: CompositionPlan }
  | { status: 'skipped'; outputPath: string };

export function expandHome(path: string, home: string = homedir()): string {
  if (path === '~') return home;
  if (path.startsWith('~/')) return resolve(home, path.slice(2));
  return path;
}

async function isFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch (err) {
    if (err instanceof Error && 'code' in err && (err.code === 'ENOENT' || err.code === 'ENOTDIR')) return false;
    throw err;
  }
}

/** capture -> decode -> compose -> encode -> save, for one HTML document. */
export class SlideRunner {
  constructor(
    private readonly deps: {
      events: EventBus<SlideEvents>;
      store: SlideStore;
      capture: CaptureService;
      executablePath?: string;
      now?: () => number;
    },
  ) {}

  async run(request: SlideRequest, signal?: AbortSignal): Promise<SlideResult> {
    const { events, store, capture } = this.deps;
    const now = this.deps.now ?? Date.now;

    const htmlPath = resolve(expandHome(request.htmlPath));
    if (!(await isFile(htmlPath))) {
      throw new SourceNotFoundError(htmlPath);
    }

    const outputPath = store.pathFor(htmlPath);
    if (!request.overwrite && (await store.exists(outputPath))) {
      events.publish('slide.skipped', {
        outputPath,
        reason: 'already exists, use --overwrite to regenerate',
      });
      return { status: 'skipped', outputPath };
    }
    throwIfAborted(signal);

    const url = pathToFileURL(htmlPath).href;
    const deviceScaleFactor = Math.max(1, request.deviceScaleFactor);
    events.publish('capture.start', {
      url,
      viewport: request.target,
      deviceScaleFactor,
      selector: request.selector,
    });
    const startedAt = now();
    const screenshot = await capture({
      url,
      viewport: request.target,
      deviceScaleFactor,
      waitMs: request.waitMs,
      zoom: request.zoom,
      selector: request.selector,
      timeoutMs: request.timeoutMs,
      executablePath: this.deps.executablePath,
      signal,
    });
    events.publish('capture.done', { url, bytes: screenshot.length, ms: now() - startedAt });
    throwIfAborted(signal);

    const source = await decodePng(screenshot);
    const { bitmap, plan } = composeSlideWithPlan(source, {
      target: request.target,
      mode: request.mode,
      focus: request.focus,
      background: request.background,
    });
    events.publish('compose.done', {
      mode: plan.mode,
      source: { width: source.width, height: source.height },
      scaled: plan.scaled,
      target: request.target,
      scale: plan.scale,
    });

    const png = await encodePng(bitmap);
    await store.save(outputPath, png);
    events.publish('slide.saved', { outputPath, bytes: png.length });
    return { status: 'saved', outputPath, plan };
  }
}
