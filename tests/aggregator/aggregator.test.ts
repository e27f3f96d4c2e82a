import { describe, it, expect } from "vitest";
import { LogAggregator } from "../../src/aggregator/aggregator.js";
import type { LogEvent, PanicEvent } from "../../src/protocol/messages.js";
import type { MergedEvent } from "../../src/types.js";

function log(contextId: string, seq: number, payload = `${contextId}:${seq}`): LogEvent {
  return { kind: "log", contextId, stream: "log", seq, payload, timestamp: 0 };
}

function panic(contextId: string, message: string): PanicEvent {
  return { kind: "panic", contextId, message, timestamp: 0 };
}

function payloads(events: MergedEvent[]): string[] {
  return events.map((event) => (event.kind === "log" ? event.payload : `panic: ${event.message}`));
}

describe("LogAggregator", () => {
  it("rejects events from contexts it does not track", () => {
    const aggregator = new LogAggregator();
    expect(aggregator.ingest(log("ghost", 0))).toBe(false);
    expect(aggregator.stats).toEqual({ accepted: 0, rejected: 1, gaps: 0 });
  });

  it("appends in-order events with increasing arrival numbers", () => {
    const aggregator = new LogAggregator();
    aggregator.track("root");
    expect(aggregator.ingestBatch([log("root", 0), log("root", 1)])).toBe(2);

    const events = aggregator.drain("root");
    expect(payloads(events)).toEqual(["root:0", "root:1"]);
    expect(events.map((event) => event.arrival)).toEqual([0, 1]);
    expect(events.every((event) => event.root === "root")).toBe(true);
    expect(aggregator.drain("root")).toEqual([]);
  });

  it("restores sequence order within a context", () => {
    const aggregator = new LogAggregator();
    aggregator.track("root");
    aggregator.ingest(log("root", 2));
    aggregator.ingest(log("root", 1));
    expect(aggregator.drain("root")).toEqual([]);
    aggregator.ingest(log("root", 0));
    expect(payloads(aggregator.drain("root"))).toEqual(["root:0", "root:1", "root:2"]);
  });

  it("rejects duplicates and stale sequence numbers", () => {
    const aggregator = new LogAggregator();
    aggregator.track("root");
    expect(aggregator.ingest(log("root", 0))).toBe(true);
    expect(aggregator.ingest(log("root", 0))).toBe(false);
    expect(aggregator.ingest(log("root", 3))).toBe(true);
    expect(aggregator.ingest(log("root", 3))).toBe(false);
    expect(aggregator.stats.rejected).toBe(2);
  });

  it("merges a context tree into its root's timeline", () => {
    const aggregator = new LogAggregator();
    aggregator.track("root");
    expect(aggregator.track("root.1", "root")).toBe(true);
    expect(aggregator.track("root.1.1", "root.1")).toBe(true);
    expect(aggregator.track("orphan.1", "orphan")).toBe(false);
    expect(aggregator.rootOf("root.1.1")).toBe("root");

    aggregator.ingest(log("root", 0));
    aggregator.ingest(log("root.1.1", 0));
    aggregator.ingest(log("root.1", 0));
    aggregator.ingest(log("root", 1));

    const events = aggregator.drain("root");
    expect(payloads(events)).toEqual(["root:0", "root.1.1:0", "root.1:0", "root:1"]);
    expect(events.map((event) => event.root)).toEqual(["root", "root", "root", "root"]);
  });

  it("keeps separate roots apart and merges them by arrival on a full drain", () => {
    const aggregator = new LogAggregator();
    aggregator.track("a");
    aggregator.track("b");
    aggregator.ingest(log("b", 0));
    aggregator.ingest(log("a", 0));
    aggregator.ingest(log("b", 1));
    expect(payloads(aggregator.drain())).toEqual(["b:0", "a:0", "b:1"]);
  });

  it("skips a gap once the reorder buffer overflows", () => {
    const aggregator = new LogAggregator({ maxPending: 2 });
    aggregator.track("root");
    aggregator.ingest(log("root", 1));
    aggregator.ingest(log("root", 2));
    expect(aggregator.drain("root")).toEqual([]);
    aggregator.ingest(log("root", 3));

    expect(payloads(aggregator.drain("root"))).toEqual(["root:1", "root:2", "root:3"]);
    expect(aggregator.stats.gaps).toBe(1);
    expect(aggregator.ingest(log("root", 0))).toBe(false);
  });

  it("releases buffered events and closes the tree on finalize", () => {
    const aggregator = new LogAggregator();
    aggregator.track("root");
    aggregator.track("root.1", "root");
    aggregator.ingest(log("root", 0));
    aggregator.ingest(log("root.1", 2));

    expect(payloads(aggregator.finalize("root"))).toEqual(["root:0", "root.1:2"]);
    expect(aggregator.stats.gaps).toBe(2);
    expect(aggregator.isClosed("root.1")).toBe(true);
    expect(aggregator.ingest(log("root", 1))).toBe(false);
    expect(aggregator.track("root.2", "root")).toBe(false);
    expect(aggregator.finalize("root")).toEqual([]);
  });

  it("forgets a finalized tree but keeps rejecting its contexts", () => {
    const aggregator = new LogAggregator();
    aggregator.track("root");
    aggregator.track("root.1", "root");
    aggregator.track("other");
    aggregator.ingest(log("root.1", 0));
    expect(aggregator.trackedCount).toBe(3);

    expect(payloads(aggregator.finalize("root"))).toEqual(["root.1:0"]);
    expect(aggregator.trackedCount).toBe(1);
    expect(aggregator.isTracked("root.1")).toBe(false);
    expect(aggregator.isClosed("root")).toBe(true);
    expect(aggregator.isClosed("root.1")).toBe(true);
    expect(aggregator.rootOf("root.1")).toBeUndefined();
    expect(aggregator.track("root")).toBe(false);
    expect(aggregator.ingest(log("root.1", 1))).toBe(false);
    expect(aggregator.isClosed("other")).toBe(false);
  });

  it("ends the timeline with a panic", () => {
    const aggregator = new LogAggregator();
    aggregator.track("root");
    aggregator.track("root.1", "root");
    aggregator.ingest(log("root", 0));
    aggregator.ingest(log("root.1", 1));
    aggregator.ingest(panic("root.1", "boom"));
    aggregator.ingest(log("root", 1));

    expect(payloads(aggregator.drain("root"))).toEqual(["root:0", "root.1:1", "panic: boom"]);
    expect(aggregator.panicOf("root")?.message).toBe("boom");
    expect(aggregator.isClosed("root")).toBe(true);
    expect(aggregator.stats).toEqual({ accepted: 3, rejected: 1, gaps: 1 });
  });

  it("notifies subscribers until they unsubscribe", () => {
    const aggregator = new LogAggregator();
    const seen: string[] = [];
    const unsubscribe = aggregator.subscribe((event) => seen.push(`${event.root}/${event.contextId}`));
    aggregator.track("root");
    aggregator.track("root.1", "root");
    aggregator.ingest(log("root.1", 0));
    unsubscribe();
    aggregator.ingest(log("root", 0));
    expect(seen).toEqual(["root/root.1"]);
  });
});
