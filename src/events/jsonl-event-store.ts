import { appendFile, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { EventEnvelope } from './event-types.js';

/** Append-only event log, one JSON envelope per line. */
export class JsonlEventStore<TEvent extends EventEnvelope> {
  private writeChain: Promise<void> = Promise.resolve();

  constructor(readonly path: string) {}

  async init(): Promise<void> {
    await mkdir(dirname(this.path), { recursive: true });
  }

  /** Appends are serialized so lines from one run stay in `seq` order. */
  append(event: TEvent): Promise<void> {
    const line = JSON.stringify(event) + '\n';
    const next = this.writeChain.then(() => appendFile(this.path, line, 'utf8'));
    this.writeChain = next.catch(() => undefined);
    return next;
  }

  async flush(): Promise<void> {
    await this.writeChain;
  }
}
