import { describe, it, expect } from "vitest";
import { LogAggregator } from "../../src/aggregator/aggregator.js";
import { ContextRecord, hostContextId, nextContextId, settleWithin } from "../../src/context.js";
import type { ContextOutcome } from "../../src/types.js";

function makeRecord(stop: (record: ContextRecord) => Promise<void> = async () => {}) {
  const aggregator = new LogAggregator();
  const settled: ContextOutcome[] = [];
  const record = new ContextRecord({
    id: "node-t",
    kind: "node",
    target: "t.wasm",
    memory: "exclusive",
    aggregator,
    stop,
    onSettled: (_record, outcome) => settled.push(outcome),
  });
  return { record, aggregator, settled };
}

describe("ContextRecord", () => {
  it("tracks itself as a root", () => {
    const { aggregator } = makeRecord();
    expect(aggregator.rootOf("node-t")).toBe("node-t");
  });

  it("becomes ready and then completes", async () => {
    const { record, settled } = makeRecord();
    expect(record.state).toBe("starting");
    record.accept({ type: "ready", contextId: "node-t" });
    expect(record.state).toBe("running");
    expect(await record.ready).toBe(true);

    record.accept({ type: "result", contextId: "node-t", tests: [], filteredOut: 1 });
    expect(await record.done).toEqual({ type: "completed", tests: [], filteredOut: 1 });
    expect(record.state).toBe("finished");
    expect(settled).toHaveLength(1);
  });

  it("resolves ready with false when it ends before readiness", async () => {
    const { record } = makeRecord();
    record.accept({ type: "fatal", contextId: "node-t", name: "InstantiationError", message: "bad module" });
    expect(await record.ready).toBe(false);
    const outcome = await record.done;
    expect(outcome.type === "crashed" && outcome.panic.message).toBe("InstantiationError: bad module");
  });

  it("feeds log batches and nested contexts to the aggregator", () => {
    const { record, aggregator } = makeRecord();
    record.accept({ type: "context", contextId: "node-t", origin: "node-t.1", parentId: "node-t" });
    record.accept({
      type: "log",
      contextId: "node-t",
      events: [{ kind: "log", contextId: "node-t.1", stream: "log", seq: 0, payload: "nested", timestamp: 0 }],
    });
    expect(aggregator.rootOf("node-t.1")).toBe("node-t");
    expect(aggregator.drain("node-t").map((event) => event.contextId)).toEqual(["node-t.1"]);
  });

  it("reports a panic under the context it came from", async () => {
    const { record, aggregator } = makeRecord();
    record.accept({ type: "context", contextId: "node-t", origin: "node-t.1", parentId: "node-t" });
    record.accept({ type: "panic", contextId: "node-t", origin: "node-t.1", message: "boom" });
    const outcome = await record.done;
    expect(outcome.type === "crashed" && outcome.panic.contextId).toBe("node-t.1");
    expect(aggregator.panicOf("node-t")?.message).toBe("boom");
  });

  it("treats an unexpected close as a lost channel", async () => {
    const { record, aggregator } = makeRecord();
    record.accept({ type: "closed", contextId: "node-t" });
    const outcome = await record.done;
    expect(outcome.type === "crashed" && outcome.panic.message).toBe(
      "ChannelLossError: context node-t closed without a result",
    );
    expect(aggregator.isClosed("node-t")).toBe(true);
  });

  it("stops once however often it is terminated", async () => {
    let stops = 0;
    const { record, settled } = makeRecord(async (self) => {
      stops++;
      expect(self.terminating).toBe(true);
      self.lose("channel closed");
    });
    const first = record.terminate();
    expect(record.terminate()).toBe(first);
    await first;
    expect(stops).toBe(1);
    expect(await record.done).toEqual({ type: "terminated" });
    expect(settled).toEqual([{ type: "terminated" }]);
    await record.terminate();
    expect(stops).toBe(1);
  });

  it("ignores messages after it settled", async () => {
    const { record } = makeRecord();
    record.accept({ type: "result", contextId: "node-t", tests: [], filteredOut: 0 });
    record.accept({ type: "panic", contextId: "node-t", origin: "node-t", message: "late" });
    expect((await record.done).type).toBe("completed");
    await record.terminate();
  });
});

describe("context ids", () => {
  it("are unique per kind and mark host pseudo-contexts", () => {
    const a = nextContextId("node");
    const b = nextContextId("node");
    expect(a).toMatch(/^node-\d+$/);
    expect(b).not.toBe(a);
    expect(hostContextId(a)).toBe(`${a}#host`);
  });
});

describe("settleWithin", () => {
  it("tells settled promises from slow ones", async () => {
    expect(await settleWithin(Promise.resolve(1), 50)).toBe(true);
    expect(await settleWithin(new Promise(() => undefined), 10)).toBe(false);
  });
});
