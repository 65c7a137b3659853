import { EventEmitter } from 'node:events';
import type { EventEnvelope } from './event-types.js';

type Listener<T> = (event: T) => void;

type EventOf<TEvent extends EventEnvelope, TType extends TEvent['type']> = Extract<TEvent, { type: TType }>;

const ANY = Symbol('any');

/**
 * Typed, synchronous publish/subscribe. Every event gets a monotonically
 * increasing `seq` and an ISO timestamp from `now`.
 */
export class EventBus<TEvent extends EventEnvelope> {
  private readonly emitter = new EventEmitter();
  private readonly now: () => Date;
  private seq = 0;

  constructor(options: { now?: () => Date } = {}) {
    this.now = options.now ?? (() => new Date());
  }

  publish<TType extends TEvent['type']>(type: TType, data: EventOf<TEvent, TType>['data']): EventOf<TEvent, TType> {
    // The union member for TType is exactly this shape; TS can't correlate it.
    const event = {
      seq: ++this.seq,
      ts: this.now().toISOString(),
      type,
      data,
    } as unknown as EventOf<TEvent, TType>;

    this.emitter.emit(ANY, event);
    this.emitter.emit(type, event);
    return event;
  }

  onAny(listener: Listener<TEvent>): () => void {
    this.emitter.on(ANY, listener);
    return () => this.emitter.off(ANY, listener);
  }

  onType<TType extends TEvent['type']>(type: TType, listener: Listener<EventOf<TEvent, TType>>): () => void {
    this.emitter.on(type, listener);
    return () => this.emitter.off(type, listener);
  }

  get lastSeq(): number {
    return this.seq;
  }
}
