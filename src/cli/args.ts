import { parseArgs } from 'node:util';
import type { AppConfig } from '../config.js';
import { formatIssues, slideOptionsSchema } from '../lib/schemas.js';
import type { SlideOptions, SlideOptionsInput } from '../lib/schemas.js';
import type { SlideRequest } from '../slide-runner.js';
import { formatHexColor } from '../types/geometry.js';

export const USAGE = `Usage: html-slide-shot <html_path> [options]

Create a slide-ready PNG from an HTML file.

Options:
  --width <px>                  Slide width (default: SLIDE_WIDTH or 3840)
  --height <px>                 Slide height (default: SLIDE_HEIGHT or 2160)
  --wait <seconds>              Settle time after load (default: 1)
  --zoom <factor>               CSS zoom applied before the screenshot (default: 1)
  --mode <fit|fill>             fit letterboxes, fill crops to cover (default: fit)
  --selector <css>              Screenshot this element instead of the full page
  --focus-x <0-1>               Horizontal crop focus for fill (default: 0.5)
  --focus-y <0-1>               Vertical crop focus for fill (default: 0.5)
  --device-scale-factor <n>     Browser pixel ratio (default: 2)
  --background <#rrggbb|r,g,b>  Letterbox colour for fit (default: #050508)
  --output-root <dir>           Output directory (default: OUTPUT_ROOT or ./output)
  --timeout <seconds>           Page load / selector timeout (default: 30)
  --overwrite                   Regenerate the PNG even if it already exists
  --quiet                       Only print the outcome
  -h, --help                    Show this help
`;

export type CliCommand = { kind: 'help' } | { kind: 'run'; options: SlideOptions };

export function parseCliArgs(argv: string[], config: AppConfig): CliCommand {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    strict: true,
    options: {
      width: { type: 'string' },
      height: { type: 'string' },
      wait: { type: 'string' },
      zoom: { type: 'string' },
      mode: { type: 'string' },
      selector: { type: 'string' },
      'focus-x': { type: 'string' },
      'focus-y': { type: 'string' },
      'device-scale-factor': { type: 'string' },
      background: { type: 'string' },
      'output-root': { type: 'string' },
      timeout: { type: 'string' },
      overwrite: { type: 'boolean', default: false },
      quiet: { type: 'boolean', default: false },
      help: { type: 'boolean', short: 'h', default: false },
    },
  });

  if (values.help) return { kind: 'help' };
  if (positionals.length > 1) {
    throw new Error(`Expected one HTML path, got ${positionals.length}: ${positionals.join(' ')}`);
  }

  const input: SlideOptionsInput = {
    htmlPath: positionals[0] ?? '',
    width: values.width ?? config.SLIDE_WIDTH,
    height: values.height ?? config.SLIDE_HEIGHT,
    waitSeconds: values.wait ?? config.CAPTURE_WAIT_MS / 1000,
    zoom: values.zoom ?? 1,
    mode: values.mode ?? config.SLIDE_MODE,
    selector: values.selector ?? null,
    focusX: values['focus-x'] ?? 0.5,
    focusY: values['focus-y'] ?? 0.5,
    deviceScaleFactor: values['device-scale-factor'] ?? config.DEVICE_SCALE_FACTOR,
    background: values.background ?? formatHexColor(config.SLIDE_BACKGROUND),
    outputRoot: values['output-root'] ?? config.OUTPUT_ROOT,
    timeoutSeconds: values.timeout ?? config.CAPTURE_TIMEOUT_MS / 1000,
    overwrite: values.overwrite ?? false,
    quiet: values.quiet ?? false,
  };

  const parsed = slideOptionsSchema.safeParse(input);
  if (!parsed.success) {
    throw new Error(`Invalid options:\n${formatIssues(parsed.error)}`);
  }
  return { kind: 'run', options: parsed.data };
}

export function toSlideRequest(options: SlideOptions): SlideRequest {
  return {
    htmlPath: options.htmlPath,
    target: { width: options.width, height: options.height },
    mode: options.mode,
    focus: { x: options.focusX, y: options.focusY },
    background: options.background,
    waitMs: Math.round(options.waitSeconds * 1000),
    zoom: options.zoom,
    selector: options.selector,
    deviceScaleFactor: options.deviceScaleFactor,
    timeoutMs: Math.round(options.timeoutSeconds * 1000),
    overwrite: options.overwrite,
  };
}
