export type Size = Readonly<{ width: number; height: number }>;

export type Point = Readonly<{ x: number; y: number }>;

export type Rect = Readonly<{ x: number; y: number; width: number; height: number }>;

export type Rgb = Readonly<{ r: number; g: number; b: number }>;

/** Fractional position inside the overflow region that survives a cover-crop. */
export type FocusPoint = Readonly<{ x: number; y: number }>;

export type CompositionMode = 'fit' | 'fill';

export const CENTER_FOCUS: FocusPoint = { x: 0.5, y: 0.5 };

export const WHITE: Rgb = { r: 255, g: 255, b: 255 };

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

// NaN has no position, so it falls back to the centre.
export function clampFocus(focus: FocusPoint): FocusPoint {
  return {
    x: Number.isNaN(focus.x) ? CENTER_FOCUS.x : clamp(focus.x, 0, 1),
    y: Number.isNaN(focus.y) ? CENTER_FOCUS.y : clamp(focus.y, 0, 1),
  };
}

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}

export function isValidSize(size: Size): boolean {
  return isPositiveInteger(size.width) && isPositiveInteger(size.height);
}

export function parseHexColor(input: string): Rgb | null {
  const match = /^#?([0-9a-f]{3}|[0-9a-f]{6})$/i.exec(input.trim());
  if (!match?.[1]) return null;
  let hex = match[1];
  if (hex.length === 3) {
    hex = hex
      .split('')
      .map(c => c + c)
      .join('');
  }
  return {
    r: Number.parseInt(hex.slice(0, 2), 16),
    g: Number.parseInt(hex.slice(2, 4), 16),
    b: Number.parseInt(hex.slice(4, 6), 16),
  };
}

export function formatHexColor(color: Rgb): string {
  const part = (v: number) => clamp(Math.round(v), 0, 255).toString(16).padStart(2, '0');
  return `#${part(color.r)}${part(color.g)}${part(color.b)}`;
}
