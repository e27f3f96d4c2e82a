// Parent-side record of one execution context.
//
// Turns the child's message stream into a lifecycle: `ready` settles once,
// `done` settles once and never rejects. Whatever ends the context first
// (a result, a panic, a lost channel or a termination) decides the outcome.

import type { LogAggregator } from "./aggregator/aggregator.js";
import type { ChildMessage, PanicEvent } from "./protocol/messages.js";
import type {
  ContextOutcome,
  ContextState,
  ExecutionContext,
  HostKind,
} from "./types.js";

let sequence = 0;

/** Context ids never contain `.` or `#`; those mark nested and host contexts. */
export function nextContextId(kind: HostKind): string {
  sequence++;
  return `${kind}-${sequence}`;
}

export function hostContextId(rootId: string): string {
  return `${rootId}#host`;
}

export interface ContextInit {
  id: string;
  kind: HostKind;
  target: string;
  memory: "exclusive" | "shared";
  aggregator: LogAggregator;
  /** Asks the owner to stop the context; resolves once it has. */
  stop: (record: ContextRecord) => Promise<void>;
  onSettled?: (record: ContextRecord, outcome: ContextOutcome) => void;
}

export class ContextRecord implements ExecutionContext {
  readonly id: string;
  readonly kind: HostKind;
  readonly target: string;
  readonly memory: "exclusive" | "shared";
  readonly startedAt = Date.now();
  readonly ready: Promise<boolean>;
  readonly done: Promise<ContextOutcome>;

  private current: ContextState = "starting";
  private outcome: ContextOutcome | undefined;
  private stopRequested = false;
  private stopping: Promise<void> | undefined;
  private readonly readySignal = deferred<boolean>();
  private readonly doneSignal = deferred<ContextOutcome>();
  private readonly aggregator: LogAggregator;
  private readonly stop: (record: ContextRecord) => Promise<void>;
  private readonly onSettled: ((record: ContextRecord, outcome: ContextOutcome) => void) | undefined;

  constructor(init: ContextInit) {
    this.id = init.id;
    this.kind = init.kind;
    this.target = init.target;
    this.memory = init.memory;
    this.aggregator = init.aggregator;
    this.stop = init.stop;
    this.onSettled = init.onSettled;
    this.ready = this.readySignal.promise;
    this.done = this.doneSignal.promise;
    init.aggregator.track(this.id);
  }

  get state(): ContextState {
    return this.current;
  }

  get settled(): boolean {
    return this.outcome !== undefined;
  }

  get terminating(): boolean {
    return this.stopRequested;
  }

  accept(message: ChildMessage): void {
    if (this.settled) return;
    switch (message.type) {
      case "activated":
        return;
      case "ready":
        if (this.current === "starting") {
          this.current = "running";
          this.readySignal.resolve(true);
        }
        return;
      case "log":
        this.aggregator.ingestBatch(message.events);
        return;
      case "context":
        this.aggregator.track(message.origin, message.parentId);
        return;
      case "panic":
        this.crash(this.panicEvent(message.origin, message.message, message.stack));
        return;
      case "fatal":
        this.crash(this.panicEvent(this.id, `${message.name}: ${message.message}`));
        return;
      case "result":
        this.settle({ type: "completed", tests: message.tests, filteredOut: message.filteredOut });
        return;
      case "closed":
        this.settle(this.terminating ? { type: "terminated" } : this.lossOutcome("closed without a result"));
        return;
    }
  }

  crash(panic: PanicEvent): void {
    if (this.settled) return;
    this.aggregator.ingest(panic);
    this.settle({ type: "crashed", panic });
  }

  /** The channel went away. Expected while terminating; a crash otherwise. */
  lose(reason: string): void {
    if (this.settled) return;
    this.settle(this.terminating ? { type: "terminated" } : this.lossOutcome(reason));
  }

  terminate(): Promise<void> {
    if (this.stopping) return this.stopping;
    if (this.settled) return Promise.resolve();
    this.stopRequested = true;
    this.stopping = this.stop(this).then(() => this.settle({ type: "terminated" }));
    return this.stopping;
  }

  panicEvent(contextId: string, message: string, stack?: string): PanicEvent {
    return { kind: "panic", contextId, message, stack, timestamp: Date.now() };
  }

  private lossOutcome(reason: string): ContextOutcome {
    const panic = this.panicEvent(this.id, `ChannelLossError: context ${this.id} ${reason}`);
    this.aggregator.ingest(panic);
    return { type: "crashed", panic };
  }

  private settle(outcome: ContextOutcome): void {
    if (this.outcome) return;
    this.outcome = outcome;
    this.current = "finished";
    this.readySignal.resolve(false);
    this.doneSignal.resolve(outcome);
    this.onSettled?.(this, outcome);
  }
}

export interface Deferred<T> {
  readonly promise: Promise<T>;
  resolve(value: T): void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((settle) => {
    resolve = settle;
  });
  return { promise, resolve };
}

/**
 * Resolves `true` if `promise` settles within `ms`, `false` otherwise. The
 * timer is always cleared.
 */
export async function settleWithin(promise: Promise<unknown>, ms: number): Promise<boolean> {
  let cancel = (): void => undefined;
  const expired = new Promise<false>((resolve) => {
    const timer = setTimeout(() => resolve(false), ms);
    cancel = () => clearTimeout(timer);
  });
  try {
    return await Promise.race([promise.then(() => true), expired]);
  } finally {
    cancel();
  }
}
