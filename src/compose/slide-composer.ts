import { CompositionError } from '../lib/errors.js';
import { CENTER_FOCUS, WHITE, clamp, clampFocus, isValidSize } from '../types/geometry.js';
import type { CompositionMode, FocusPoint, Point, Rect, Rgb, Size } from '../types/geometry.js';
import { fromJimp, solidJimp, toJimp } from './bitmap.js';
import type { Bitmap } from './bitmap.js';

/** 16384x16384, the largest slide the CLI accepts. */
export const MAX_WORKING_PIXELS = 2 ** 28;

/** Source pixels kept beyond a resample window on each side, for the filter's reach. */
const WINDOW_MARGIN = 2;

export type CompositionPlan =
  | Readonly<{ mode: 'fill'; scale: number; scaled: Size; crop: Rect }>
  | Readonly<{ mode: 'fit'; scale: number; scaled: Size; offset: Point }>;

type FillPlan = Extract<CompositionPlan, { mode: 'fill' }>;

export type ComposeOptions = {
  target: Size;
  mode: CompositionMode;
  focus?: FocusPoint;
  background?: Rgb;
  /**
   * Largest intermediate image, in pixels, that `fill` may resample. Above it
   * only the part of the source under the crop is resampled. Never below
   * twice the target area.
   */
  maxWorkingPixels?: number;
};

function assertDimensions(source: Size, target: Size): void {
  if (!isValidSize(target)) {
    throw new CompositionError(
      'invalid_dimension',
      `Target size must be positive integers (got ${target.width}x${target.height})`,
    );
  }
  if (!isValidSize(source)) {
    throw new CompositionError(
      'invalid_dimension',
      `Source image must be positive integers (got ${source.width}x${source.height})`,
    );
  }
}

/**
 * Scaled size for `mode`. The limiting axis lands exactly on the target edge;
 * the other axis is truncated, then held on the correct side of the target so
 * float error can never open a gap (fill) or overhang (fit).
 */
function scaledSize(source: Size, target: Size, mode: CompositionMode): { scale: number; scaled: Size } {
  const rx = target.width / source.width;
  const ry = target.height / source.height;

  if (mode === 'fill') {
    const scale = Math.max(rx, ry);
    const scaled =
      rx >= ry
        ? { width: target.width, height: Math.max(Math.trunc(source.height * scale), target.height) }
        : { width: Math.max(Math.trunc(source.width * scale), target.width), height: target.height };
    return { scale, scaled };
  }

  const scale = Math.min(rx, ry);
  const scaled =
    rx <= ry
      ? { width: target.width, height: Math.min(Math.trunc(source.height * scale), target.height) }
      : { width: Math.min(Math.trunc(source.width * scale), target.width), height: target.height };
  return { scale, scaled };
}

/** Geometry of a composition, without touching pixels. */
export function planComposition(
  source: Size,
  target: Size,
  mode: CompositionMode,
  focus: FocusPoint = CENTER_FOCUS,
): CompositionPlan {
  assertDimensions(source, target);
  const { scale, scaled } = scaledSize(source, target, mode);
  if (scaled.width < 1 || scaled.height < 1) {
    throw new CompositionError(
      'degenerate_scale',
      `Scaling ${source.width}x${source.height} by ${scale} gives ${scaled.width}x${scaled.height}`,
    );
  }

  if (mode === 'fill') {
    const f = clampFocus(focus);
    const overflowX = Math.max(scaled.width - target.width, 0);
    const overflowY = Math.max(scaled.height - target.height, 0);
    return {
      mode,
      scale,
      scaled,
      crop: {
        x: Math.floor(overflowX * f.x),
        y: Math.floor(overflowY * f.y),
        width: target.width,
        height: target.height,
      },
    };
  }

  return {
    mode,
    scale,
    scaled,
    offset: {
      x: Math.floor((target.width - scaled.width) / 2),
      y: Math.floor((target.height - scaled.height) / 2),
    },
  };
}

function toByteColor(color: Rgb): Rgb {
  const byte = (v: number) => (Number.isFinite(v) ? clamp(Math.round(v), 0, 255) : 0);
  return { r: byte(color.r), g: byte(color.g), b: byte(color.b) };
}

/** One axis of a fill resample: which source span to scale, to what length, and where the crop starts in it. */
export type AxisWindow = {
  start: number;
  length: number;
  scaledLength: number;
  offset: number;
};

/**
 * Source span along one axis whose scaled image covers `[cropStart, cropStart + cropLength)`.
 * The span is padded by a few source pixels; when it reaches both ends the
 * whole axis is used at its planned length.
 */
export function resampleWindow(
  sourceLength: number,
  scaledLength: number,
  scale: number,
  cropStart: number,
  cropLength: number,
): AxisWindow {
  const start = Math.max(0, Math.floor(cropStart / scale) - WINDOW_MARGIN);
  const end = Math.min(sourceLength, Math.ceil((cropStart + cropLength) / scale) + WINDOW_MARGIN);
  if (start === 0 && end === sourceLength) {
    return { start: 0, length: sourceLength, scaledLength, offset: cropStart };
  }
  const scaledStart = Math.floor(start * scale);
  const scaledEnd = end === sourceLength ? scaledLength : Math.ceil(end * scale);
  return { start, length: end - start, scaledLength: scaledEnd - scaledStart, offset: cropStart - scaledStart };
}

function fillSlide(image: Bitmap, plan: FillPlan, budget: number): Bitmap {
  const { scale, scaled, crop } = plan;
  let x: AxisWindow = { start: 0, length: image.width, scaledLength: scaled.width, offset: crop.x };
  let y: AxisWindow = { start: 0, length: image.height, scaledLength: scaled.height, offset: crop.y };
  if (scaled.width * scaled.height > budget) {
    x = resampleWindow(image.width, scaled.width, scale, crop.x, crop.width);
    y = resampleWindow(image.height, scaled.height, scale, crop.y, crop.height);
  }
  if (x.scaledLength * y.scaledLength > budget) {
    throw new CompositionError(
      'degenerate_scale',
      `Scaling ${image.width}x${image.height} by ${scale} needs a ${x.scaledLength}x${y.scaledLength} working image`,
    );
  }

  const working = toJimp(image);
  if (x.length !== image.width || y.length !== image.height) {
    working.crop({ x: x.start, y: y.start, w: x.length, h: y.length });
  }
  working.resize({ w: x.scaledLength, h: y.scaledLength });
  working.crop({ x: x.offset, y: y.offset, w: crop.width, h: crop.height });
  return fromJimp(working);
}

export type Composition = {
  bitmap: Bitmap;
  plan: CompositionPlan;
};

/**
 * Fits `image` onto a `target`-sized slide.
 *
 * `fill` scales to cover and crops the overflow around `focus`;
 * `fit` scales to contain and centres the result on `background`.
 */
export function composeSlideWithPlan(image: Bitmap, options: ComposeOptions): Composition {
  const { target } = options;
  const plan = planComposition(image, target, options.mode, options.focus);

  if (plan.mode === 'fill') {
    const budget = Math.max(options.maxWorkingPixels ?? MAX_WORKING_PIXELS, 2 * target.width * target.height);
    return { bitmap: fillSlide(image, plan, budget), plan };
  }

  const scaled = toJimp(image);
  scaled.resize({ w: plan.scaled.width, h: plan.scaled.height });
  const canvas = solidJimp(target, toByteColor(options.background ?? WHITE));
  canvas.composite(scaled, plan.offset.x, plan.offset.y);
  return { bitmap: fromJimp(canvas), plan };
}

export function composeSlide(image: Bitmap, options: ComposeOptions): Bitmap {
  return composeSlideWithPlan(image, options).bitmap;
}
