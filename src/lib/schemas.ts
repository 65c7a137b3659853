import { z } from 'zod';
import { parseHexColor } from '../types/geometry.js';
import type { Rgb } from '../types/geometry.js';

const byte = z.coerce.number().int().min(0).max(255);

const rgbTupleSchema = z.tuple([byte, byte, byte]);

export function parseColor(input: string): Rgb | null {
  const hex = parseHexColor(input);
  if (hex) return hex;
  const parts = input.split(',').map(p => p.trim());
  const parsed = rgbTupleSchema.safeParse(parts.length === 3 && parts.every(Boolean) ? parts : null);
  if (!parsed.success) return null;
  const [r, g, b] = parsed.data;
  return { r, g, b };
}

/** `#rrggbb`, `#rgb` or `r,g,b`. */
export const colorSchema = z.string().transform((value, ctx): Rgb => {
  const color = parseColor(value);
  if (!color) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid colour "${value}" (use #rrggbb or r,g,b)` });
    return z.NEVER;
  }
  return color;
});

export const compositionModeSchema = z.enum(['fit', 'fill']);

export const dimensionSchema = z.coerce.number().int().min(1).max(16384);

export const focusComponentSchema = z.coerce.number();

export const slideOptionsSchema = z.object({
  htmlPath: z.string().min(1, 'Missing HTML path'),
  width: dimensionSchema,
  height: dimensionSchema,
  waitSeconds: z.coerce.number().min(0),
  zoom: z.coerce.number().positive(),
  mode: compositionModeSchema,
  selector: z.string().min(1).nullable(),
  focusX: focusComponentSchema,
  focusY: focusComponentSchema,
  deviceScaleFactor: z.coerce.number().positive(),
  background: colorSchema,
  outputRoot: z.string().min(1),
  timeoutSeconds: z.coerce.number().positive(),
  overwrite: z.boolean(),
  quiet: z.boolean(),
});

export type SlideOptions = z.output<typeof slideOptionsSchema>;

/** Raw values before coercion; flags arrive as strings, defaults as numbers. */
export type SlideOptionsInput = { [K in keyof SlideOptions]: unknown };

export function formatIssues(error: z.ZodError): string {
  return error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join('\n');
}
