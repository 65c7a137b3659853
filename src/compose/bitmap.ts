import { Jimp } from 'jimp';
import { CompositionError } from '../lib/errors.js';
import { isValidSize } from '../types/geometry.js';
import type { Rgb, Size } from '../types/geometry.js';

export const CHANNELS = 3;
const RGBA = 4;

/**
 * Opaque RGB raster, row-major, three bytes per pixel.
 * Treated as immutable once returned from any function in this module.
 */
export type Bitmap = Readonly<{
  width: number;
  height: number;
  data: Uint8Array;
}>;

export type JimpImage = InstanceType<typeof Jimp>;

function assertSize(size: Size, what: string): void {
  if (!isValidSize(size)) {
    throw new CompositionError(
      'invalid_dimension',
      `${what} must have positive integer dimensions (got ${size.width}x${size.height})`,
    );
  }
}

export function createBitmap(size: Size, fill: Rgb): Bitmap {
  assertSize(size, 'Bitmap');
  const data = Buffer.alloc(size.width * size.height * CHANNELS, Uint8Array.of(fill.r, fill.g, fill.b));
  return { width: size.width, height: size.height, data };
}

export function bitmapFromData(size: Size, data: Uint8Array): Bitmap {
  assertSize(size, 'Bitmap');
  const expected = size.width * size.height * CHANNELS;
  if (data.length !== expected) {
    throw new CompositionError(
      'invalid_dimension',
      `Pixel buffer holds ${data.length} bytes, expected ${expected} for ${size.width}x${size.height} RGB`,
    );
  }
  return { width: size.width, height: size.height, data };
}

export function getPixel(bitmap: Bitmap, x: number, y: number): Rgb {
  if (x < 0 || y < 0 || x >= bitmap.width || y >= bitmap.height) {
    throw new RangeError(`Pixel (${x}, ${y}) outside ${bitmap.width}x${bitmap.height}`);
  }
  const i = (y * bitmap.width + x) * CHANNELS;
  return { r: bitmap.data[i] ?? 0, g: bitmap.data[i + 1] ?? 0, b: bitmap.data[i + 2] ?? 0 };
}

/** Opaque Jimp canvas of one colour. */
export function solidJimp(size: Size, fill: Rgb): JimpImage {
  assertSize(size, 'Canvas');
  const data = Buffer.alloc(size.width * size.height * RGBA, Uint8Array.of(fill.r, fill.g, fill.b, 255));
  return new Jimp({ width: size.width, height: size.height, data });
}

/** Copies `bitmap` into a fresh, fully opaque Jimp image. */
export function toJimp(bitmap: Bitmap): JimpImage {
  const { width, height, data } = bitmap;
  const rgba = Buffer.alloc(width * height * RGBA, 255);
  for (let i = 0, o = 0; i < data.length; i += CHANNELS, o += RGBA) {
    rgba[o] = data[i] ?? 0;
    rgba[o + 1] = data[i + 1] ?? 0;
    rgba[o + 2] = data[i + 2] ?? 0;
  }
  return new Jimp({ width, height, data: rgba });
}

/** Drops the alpha channel of a Jimp image. */
export function fromJimp(image: JimpImage): Bitmap {
  const { width, height, data: rgba } = image.bitmap;
  const rgb = new Uint8Array(width * height * CHANNELS);
  for (let i = 0, o = 0; o < rgb.length; i += RGBA, o += CHANNELS) {
    rgb[o] = rgba[i] ?? 0;
    rgb[o + 1] = rgba[i + 1] ?? 0;
    rgb[o + 2] = rgba[i + 2] ?? 0;
  }
  return bitmapFromData({ width, height }, rgb);
}
