import { Jimp } from 'jimp';
import { fromJimp, solidJimp, toJimp } from '../compose/bitmap.js';
import type { Bitmap } from '../compose/bitmap.js';
import { WHITE } from '../types/geometry.js';
import type { Rgb } from '../types/geometry.js';

/** Decode a PNG into an RGB bitmap, compositing any transparency over `matte`. */
export async function decodePng(buffer: Buffer, matte: Rgb = WHITE): Promise<Bitmap> {
  const image = await Jimp.read(buffer);
  const canvas = solidJimp({ width: image.width, height: image.height }, matte);
  canvas.composite(image, 0, 0);
  return fromJimp(canvas);
}

export function encodePng(bitmap: Bitmap): Promise<Buffer> {
  return toJimp(bitmap).getBuffer('image/png');
}
