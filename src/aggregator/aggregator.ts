// Parent-side half of the log pipeline.
//
// Contexts are tracked as trees: a root per target, plus every nested context
// its workers spawn. Events are accepted only for tracked, open contexts, put
// back into per-context sequence order, and appended to their root's timeline
// with a global arrival number. Cross-context order is arrival order; order
// within a context is the emitter's order.

import type { HarnessEvent, LogEvent, PanicEvent } from "../protocol/messages.js";
import type { MergedEvent } from "../types.js";

export const DEFAULT_MAX_PENDING = 1024;

export interface AggregatorOptions {
  /** Out-of-order events buffered per context before a gap is skipped. */
  maxPending?: number;
}

export type AggregatorListener = (event: MergedEvent) => void;

export interface AggregatorStats {
  accepted: number;
  rejected: number;
  /** Sequence numbers given up on after the reorder buffer overflowed. */
  gaps: number;
}

interface TrackedContext {
  id: string;
  root: RootTimeline;
  nextSeq: number;
  pending: Map<number, LogEvent>;
}

interface RootTimeline {
  id: string;
  events: MergedEvent[];
  contexts: TrackedContext[];
  closed: boolean;
  panic: PanicEvent | undefined;
}

export class LogAggregator {
  private arrival = 0;
  private readonly contexts = new Map<string, TrackedContext>();
  private readonly roots = new Map<string, RootTimeline>();
  /** Ids of every context in a finalized tree; nothing else of the tree is kept. */
  private readonly retired = new Set<string>();
  private readonly listeners = new Set<AggregatorListener>();
  private readonly maxPending: number;
  private readonly counters: AggregatorStats = { accepted: 0, rejected: 0, gaps: 0 };

  constructor(options: AggregatorOptions = {}) {
    this.maxPending = Math.max(1, options.maxPending ?? DEFAULT_MAX_PENDING);
  }

  get stats(): Readonly<AggregatorStats> {
    return this.counters;
  }

  /** Contexts whose trees have not been finalized yet. */
  get trackedCount(): number {
    return this.contexts.size;
  }

  /**
   * Starts tracking a context. Without `parentId` it becomes the root of a new
   * target tree; with one, the parent must already be tracked. Returns false
   * when the context cannot be tracked.
   */
  track(contextId: string, parentId?: string): boolean {
    if (this.contexts.has(contextId)) return true;
    if (this.retired.has(contextId)) return false;
    let root: RootTimeline;
    if (parentId === undefined) {
      root = { id: contextId, events: [], contexts: [], closed: false, panic: undefined };
      this.roots.set(contextId, root);
    } else {
      const parent = this.contexts.get(parentId);
      if (!parent || parent.root.closed) return false;
      root = parent.root;
    }
    const tracked: TrackedContext = { id: contextId, root, nextSeq: 0, pending: new Map() };
    root.contexts.push(tracked);
    this.contexts.set(contextId, tracked);
    return true;
  }

  isTracked(contextId: string): boolean {
    return this.contexts.has(contextId);
  }

  isClosed(contextId: string): boolean {
    return this.retired.has(contextId) || (this.contexts.get(contextId)?.root.closed ?? false);
  }

  rootOf(contextId: string): string | undefined {
    return this.contexts.get(contextId)?.root.id;
  }

  panicOf(rootId: string): PanicEvent | undefined {
    return this.roots.get(rootId)?.panic;
  }

  subscribe(listener: AggregatorListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Returns false when the event was rejected. */
  ingest(event: HarnessEvent): boolean {
    const context = this.contexts.get(event.contextId);
    if (!context || context.root.closed) {
      this.counters.rejected++;
      return false;
    }
    return event.kind === "panic" ? this.ingestPanic(context, event) : this.ingestLog(context, event);
  }

  /** Returns the number of accepted events. */
  ingestBatch(events: readonly HarnessEvent[]): number {
    let accepted = 0;
    for (const event of events) {
      if (this.ingest(event)) accepted++;
    }
    return accepted;
  }

  /**
   * Removes and returns the merged events collected so far for one target
   * tree, or for every tree (in arrival order) when no root is given.
   */
  drain(rootId?: string): MergedEvent[] {
    if (rootId !== undefined) {
      const root = this.roots.get(rootId);
      if (!root) return [];
      const events = root.events;
      root.events = [];
      return events;
    }
    const all: MergedEvent[] = [];
    for (const root of this.roots.values()) {
      all.push(...root.events);
      root.events = [];
    }
    return all.sort((a, b) => a.arrival - b.arrival);
  }

  /**
   * Closes a target tree: buffered out-of-order events are released in
   * sequence order (skipping what never arrived), further events are
   * rejected, and everything not yet drained is returned. The tree is then
   * forgotten except for the ids of its contexts.
   */
  finalize(rootId: string): MergedEvent[] {
    const root = this.roots.get(rootId);
    if (!root) return [];
    if (!root.closed) {
      this.releaseAll(root);
      root.closed = true;
    }
    const events = this.drain(rootId);
    for (const context of root.contexts) {
      this.contexts.delete(context.id);
      this.retired.add(context.id);
    }
    this.roots.delete(rootId);
    return events;
  }

  private ingestLog(context: TrackedContext, event: LogEvent): boolean {
    if (event.seq < context.nextSeq || context.pending.has(event.seq)) {
      this.counters.rejected++;
      return false;
    }
    this.counters.accepted++;
    if (event.seq === context.nextSeq) {
      this.append(context.root, event);
      context.nextSeq++;
      this.releaseContiguous(context);
      return true;
    }
    context.pending.set(event.seq, event);
    if (context.pending.size > this.maxPending) {
      const lowest = Math.min(...context.pending.keys());
      this.counters.gaps += lowest - context.nextSeq;
      context.nextSeq = lowest;
      this.releaseContiguous(context);
    }
    return true;
  }

  private ingestPanic(context: TrackedContext, event: PanicEvent): boolean {
    const root = context.root;
    this.counters.accepted++;
    this.releaseAll(root);
    this.append(root, event);
    root.panic = event;
    root.closed = true;
    return true;
  }

  private releaseContiguous(context: TrackedContext): void {
    let next = context.pending.get(context.nextSeq);
    while (next !== undefined) {
      context.pending.delete(context.nextSeq);
      this.append(context.root, next);
      context.nextSeq++;
      next = context.pending.get(context.nextSeq);
    }
  }

  private releaseAll(root: RootTimeline): void {
    for (const context of root.contexts) {
      const seqs = [...context.pending.keys()].sort((a, b) => a - b);
      for (const seq of seqs) {
        const event = context.pending.get(seq);
        if (event === undefined) continue;
        this.counters.gaps += seq - context.nextSeq;
        this.append(root, event);
        context.nextSeq = seq + 1;
      }
      context.pending.clear();
    }
  }

  private append(root: RootTimeline, event: HarnessEvent): void {
    const merged: MergedEvent = { ...event, arrival: this.arrival++, root: root.id };
    root.events.push(merged);
    for (const listener of this.listeners) listener(merged);
  }
}
