import type { CompositionMode, Size } from '../types/geometry.js';

export type EventEnvelope<TType extends string = string, TData = unknown> = {
  seq: number;
  ts: string;
  type: TType;
  data: TData;
};

export type SlideEvents =
  | EventEnvelope<'app.start', { pid: number; argv: string[] }>
  | EventEnvelope<'app.error', { message: string; stack?: string }>
  | EventEnvelope<'capture.start', { url: string; viewport: Size; deviceScaleFactor: number; selector: string | null }>
  | EventEnvelope<'capture.done', { url: string; bytes: number; ms: number }>
  | EventEnvelope<'compose.done', { mode: CompositionMode; source: Size; scaled: Size; target: Size; scale: number }>
  | EventEnvelope<'slide.saved', { outputPath: string; bytes: number }>
  | EventEnvelope<'slide.skipped', { outputPath: string; reason: string }>;
