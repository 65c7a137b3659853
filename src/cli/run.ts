import { loadConfig } from '../config.js';
import type { AppConfig } from '../config.js';
import { attachConsoleReporter } from '../events/console-reporter.js';
import { EventBus } from '../events/event-bus.js';
import type { SlideEvents } from '../events/event-types.js';
import { JsonlEventStore } from '../events/jsonl-event-store.js';
import { errorMessage } from '../lib/errors.js';
import { captureDocument } from '../render/browser-renderer.js';
import type { CaptureService } from '../render/browser-renderer.js';
import { SlideRunner } from '../slide-runner.js';
import type { SlideResult } from '../slide-runner.js';
import { SlideStore } from '../store/slide-store.js';
import { USAGE, parseCliArgs, toSlideRequest } from './args.js';
import type { CliCommand } from './args.js';

export type CliDeps = {
  env?: NodeJS.ProcessEnv;
  capture?: CaptureService;
  sink?: { log: (line: string) => void; error: (line: string) => void };
  signal?: AbortSignal;
};

export type CliOutcome = { exitCode: number; result?: SlideResult };

function prepare(
  argv: string[],
  env: NodeJS.ProcessEnv,
): { ok: true; config: AppConfig; command: CliCommand } | { ok: false; message: string } {
  try {
    const config = loadConfig(env);
    return { ok: true, config, command: parseCliArgs(argv, config) };
  } catch (err) {
    return { ok: false, message: errorMessage(err) };
  }
}

export async function runCli(argv: string[], deps: CliDeps = {}): Promise<CliOutcome> {
  const sink = deps.sink ?? { log: line => console.log(line), error: line => console.error(line) };
  const events = new EventBus<SlideEvents>();

  const prepared = prepare(argv, deps.env ?? process.env);
  if (!prepared.ok) {
    sink.error(prepared.message);
    sink.error('Run with --help for usage.');
    return { exitCode: 2 };
  }
  const { config, command } = prepared;

  if (command.kind === 'help') {
    sink.log(USAGE);
    return { exitCode: 0 };
  }
  const { options } = command;

  attachConsoleReporter(events, { quiet: options.quiet, sink });

  let eventStore: JsonlEventStore<SlideEvents> | undefined;
  if (config.EVENTS_JSONL_PATH) {
    const store = new JsonlEventStore<SlideEvents>(config.EVENTS_JSONL_PATH);
    await store.init();
    events.onAny(event => {
      store.append(event).catch((err: unknown) => {
        sink.error(`eventStore.append failed: ${errorMessage(err)}`);
      });
    });
    eventStore = store;
  }

  events.publish('app.start', { pid: process.pid, argv });

  const runner = new SlideRunner({
    events,
    store: new SlideStore(options.outputRoot),
    capture: deps.capture ?? captureDocument,
    executablePath: config.CHROME_EXECUTABLE_PATH,
  });

  try {
    const result = await runner.run(toSlideRequest(options), deps.signal);
    return { exitCode: 0, result };
  } catch (err) {
    const stack = err instanceof Error ? err.stack : undefined;
    events.publish('app.error', { message: errorMessage(err), stack });
    return { exitCode: 1 };
  } finally {
    await eventStore?.flush();
  }
}
