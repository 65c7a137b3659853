import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { EventBus } from './event-bus.js';
import type { SlideEvents } from './event-types.js';
import { JsonlEventStore } from './jsonl-event-store.js';

describe('JsonlEventStore', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'slide-events-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('appends one JSON line per event', async () => {
    const store = new JsonlEventStore<SlideEvents>(join(dir, 'logs', 'events.jsonl'));
    await store.init();
    const bus = new EventBus<SlideEvents>({ now: () => new Date('2026-01-02T00:00:00.000Z') });
    await store.append(bus.publish('app.error', { message: 'first' }));

    const raw = await readFile(store.path, 'utf8');
    expect(raw).toBe('{"seq":1,"ts":"2026-01-02T00:00:00.000Z","type":"app.error","data":{"message":"first"}}\n');
  });

  it('keeps lines in publish order when appends are not awaited', async () => {
    const store = new JsonlEventStore<SlideEvents>(join(dir, 'events.jsonl'));
    await store.init();
    const bus = new EventBus<SlideEvents>();
    bus.onAny(event => void store.append(event));

    bus.publish('app.error', { message: 'a' });
    bus.publish('slide.skipped', { outputPath: '/o/1.png', reason: 'exists' });
    bus.publish('app.error', { message: 'b' });
    await store.flush();

    const lines = (await readFile(store.path, 'utf8')).trimEnd().split('\n');
    expect(lines.map(line => /"seq":(\d+)/.exec(line)?.[1])).toEqual(['1', '2', '3']);
  });

  it('rejects the failed append but keeps accepting later ones', async () => {
    const store = new JsonlEventStore<SlideEvents>(join(dir, 'missing-dir', 'events.jsonl'));
    const bus = new EventBus<SlideEvents>();
    await expect(store.append(bus.publish('app.error', { message: 'lost' }))).rejects.toMatchObject({ code: 'ENOENT' });

    await store.init();
    await store.append(bus.publish('app.error', { message: 'kept' }));
    const raw = await readFile(store.path, 'utf8');
    expect(raw.trimEnd().split('\n')).toHaveLength(1);
  });
});
