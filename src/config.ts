import { z } from 'zod';
import { colorSchema, compositionModeSchema, dimensionSchema, formatIssues } from './lib/schemas.js';

const optionalPath = z
  .string()
  .optional()
  .transform(v => (v && v.trim() ? v.trim() : undefined));

const envSchema = z.object({
  SLIDE_WIDTH: dimensionSchema.default(3840),
  SLIDE_HEIGHT: dimensionSchema.default(2160),
  SLIDE_MODE: compositionModeSchema.default('fit'),
  SLIDE_BACKGROUND: colorSchema.default('#050508'),

  OUTPUT_ROOT: z.string().min(1).default('output'),

  DEVICE_SCALE_FACTOR: z.coerce.number().positive().default(2),
  CAPTURE_WAIT_MS: z.coerce.number().int().min(0).default(1000),
  CAPTURE_TIMEOUT_MS: z.coerce.number().int().min(1).default(30_000),
  // puppeteer-core never downloads a browser; point it at an installed Chrome.
  CHROME_EXECUTABLE_PATH: optionalPath,

  EVENTS_JSONL_PATH: optionalPath,
});

export type AppConfig = Readonly<z.output<typeof envSchema>>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new Error(`Invalid environment:\n${formatIssues(parsed.error)}`);
  }
  return Object.freeze(parsed.data);
}
