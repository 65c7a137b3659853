export type CompositionErrorCode = 'invalid_dimension' | 'degenerate_scale';

export class CompositionError extends Error {
  constructor(
    readonly code: CompositionErrorCode,
    message: string,
  ) {
    super(message);
    this.name = 'CompositionError';
  }
}

export class CaptureError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CaptureError';
  }
}

export class SourceNotFoundError extends Error {
  constructor(readonly path: string) {
    super(`HTML file not found: ${path}`);
    this.name = 'SourceNotFoundError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
