export {
  MAX_WORKING_PIXELS,
  composeSlide,
  composeSlideWithPlan,
  planComposition,
  resampleWindow,
} from './compose/slide-composer.js';
export type { AxisWindow, ComposeOptions, Composition, CompositionPlan } from './compose/slide-composer.js';
export { bitmapFromData, createBitmap, getPixel } from './compose/bitmap.js';
export type { Bitmap } from './compose/bitmap.js';
export { decodePng, encodePng } from './codec/png.js';
export { captureDocument } from './render/browser-renderer.js';
export type { CaptureRequest, CaptureService } from './render/browser-renderer.js';
export { SlideStore } from './store/slide-store.js';
export { SlideRunner } from './slide-runner.js';
export type { SlideRequest, SlideResult } from './slide-runner.js';
export { EventBus } from './events/event-bus.js';
export type { SlideEvents } from './events/event-types.js';
export { loadConfig } from './config.js';
export type { AppConfig } from './config.js';
export { CaptureError, CompositionError, SourceNotFoundError } from './lib/errors.js';
export type { CompositionErrorCode } from './lib/errors.js';
export type { CompositionMode, FocusPoint, Rgb, Size } from './types/geometry.js';
