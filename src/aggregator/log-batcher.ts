// Child-side half of the log pipeline.
//
// Every event gets its context's next sequence number at the moment it is
// emitted. Events are queued and shipped as one message per batch: on the next
// microtask, or synchronously once `maxBatch` events are waiting, so a test
// that logs in a tight loop never holds more than one batch in memory and
// never pays a channel round trip per line.

import type { LogEvent, LogStream } from "../protocol/messages.js";

export const DEFAULT_MAX_BATCH = 256;

export interface BatcherOptions {
  maxBatch?: number;
  /** Defers a flush; defaults to `queueMicrotask`. */
  schedule?: (flush: () => void) => void;
  now?: () => number;
}

export class LogBatcher {
  private seq = 0;
  private pending: LogEvent[] = [];
  private scheduled = false;
  private batches = 0;
  private readonly maxBatch: number;
  private readonly schedule: (flush: () => void) => void;
  private readonly now: () => number;

  constructor(
    readonly contextId: string,
    private readonly send: (events: LogEvent[]) => void,
    options: BatcherOptions = {},
  ) {
    this.maxBatch = Math.max(1, options.maxBatch ?? DEFAULT_MAX_BATCH);
    this.schedule = options.schedule ?? ((flush) => queueMicrotask(flush));
    this.now = options.now ?? (() => Date.now());
  }

  /** Number of batches handed to `send` so far. */
  get sent(): number {
    return this.batches;
  }

  get queued(): number {
    return this.pending.length;
  }

  emit(stream: LogStream, payload: string): LogEvent {
    const event: LogEvent = {
      kind: "log",
      contextId: this.contextId,
      stream,
      seq: this.seq++,
      payload,
      timestamp: this.now(),
    };
    this.enqueue([event]);
    return event;
  }

  /** Forwards events from a nested context unchanged, keeping their order. */
  relay(events: readonly LogEvent[]): void {
    if (events.length > 0) this.enqueue(events);
  }

  flush(): void {
    this.scheduled = false;
    if (this.pending.length === 0) return;
    const batch = this.pending;
    this.pending = [];
    this.batches++;
    this.send(batch);
  }

  private enqueue(events: readonly LogEvent[]): void {
    for (const event of events) {
      this.pending.push(event);
      if (this.pending.length >= this.maxBatch) this.flush();
    }
    if (this.pending.length > 0 && !this.scheduled) {
      this.scheduled = true;
      this.schedule(() => {
        if (this.scheduled) this.flush();
      });
    }
  }
}
