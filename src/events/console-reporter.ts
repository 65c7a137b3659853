import type { EventBus } from './event-bus.js';
import type { SlideEvents } from './event-types.js';

type Sink = {
  log: (line: string) => void;
  error: (line: string) => void;
};

export function formatEvent(event: SlideEvents): string | null {
  switch (event.type) {
    case 'capture.start': {
      const { url, viewport, deviceScaleFactor, selector } = event.data;
      const target = selector ? ` selector=${selector}` : '';
      return `[capture] ${url} @ ${viewport.width}x${viewport.height} x${deviceScaleFactor}${target}`;
    }
    case 'capture.done':
      return `[capture] done in ${event.data.ms}ms (${event.data.bytes} bytes)`;
    case 'compose.done': {
      const { mode, source, scaled, target, scale } = event.data;
      return `[compose] ${mode}: ${source.width}x${source.height} -> ${scaled.width}x${scaled.height} (x${scale.toFixed(4)}) -> ${target.width}x${target.height}`;
    }
    case 'slide.saved':
      return `[slide] saved ${event.data.outputPath}`;
    case 'slide.skipped':
      return `Skipping ${event.data.outputPath} (${event.data.reason})`;
    case 'app.error':
      return `error: ${event.data.message}`;
    case 'app.start':
      return null;
  }
}

export function attachConsoleReporter(
  events: EventBus<SlideEvents>,
  options: { quiet?: boolean; sink?: Sink } = {},
): () => void {
  const sink: Sink = options.sink ?? {
    log: line => console.log(line),
    error: line => console.error(line),
  };
  return events.onAny(event => {
    if (event.type === 'app.error') {
      sink.error(formatEvent(event) ?? event.data.message);
      return;
    }
    // Outcome lines print even when quiet.
    if (options.quiet && event.type !== 'slide.skipped' && event.type !== 'slide.saved') return;
    const line = formatEvent(event);
    if (line) sink.log(line);
  });
}
