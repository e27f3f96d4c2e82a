import { describe, it, expect } from "vitest";
import { ConfigurationError, InstantiationError } from "../../src/errors/errors.js";
import type { HostAdapter } from "../../src/hosts/adapter.js";
import { EXIT_CODES, buildReport, exitCodeForError, worstStatus } from "../../src/scheduler/report.js";
import { TestScheduler } from "../../src/scheduler/scheduler.js";
import type { ExecutionContext, HostKind, RunStatus, TargetConfig, TestRunResult } from "../../src/types.js";

function fakeContext(target: TargetConfig): ExecutionContext {
  return {
    id: `${target.kind}-${target.name}`,
    kind: target.kind,
    target: target.name,
    memory: "exclusive",
    startedAt: Date.now(),
    state: "finished",
    ready: Promise.resolve(true),
    done: Promise.resolve({ type: "terminated" }),
    terminate: async () => {},
  };
}

function result(context: ExecutionContext, status: RunStatus): TestRunResult {
  return {
    contextId: context.id,
    target: context.target,
    kind: context.kind,
    status,
    durationMs: 1,
    events: [],
    tests: [],
    filteredOut: 0,
  };
}

/** Reports the status named after `=` in the target name, e.g. `a=failed`. */
class FakeAdapter implements HostAdapter {
  readonly name = "fake";
  readonly launched: string[] = [];
  readonly budgets: number[] = [];
  inFlight = 0;
  maxInFlight = 0;

  constructor(
    private readonly kinds: readonly HostKind[] = ["node"],
    private readonly launchDelayMs = 0,
  ) {}

  supports(kind: HostKind): boolean {
    return this.kinds.includes(kind);
  }

  async launch(target: TargetConfig): Promise<ExecutionContext> {
    this.launched.push(target.name);
    if (target.name.endsWith("=throws")) throw new Error(`cannot launch ${target.name}`);
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    await new Promise((resolve) => setTimeout(resolve, this.launchDelayMs));
    return fakeContext(target);
  }

  async awaitResult(context: ExecutionContext, timeoutMs: number): Promise<TestRunResult> {
    this.budgets.push(timeoutMs);
    this.inFlight--;
    const status = context.target.split("=")[1];
    return result(context, status === "failed" || status === "timed-out" || status === "crashed" ? status : "passed");
  }

  async terminate(): Promise<void> {}

  async dispose(): Promise<void> {}
}

function targets(...names: string[]): TargetConfig[] {
  return names.map((name) => ({ name, kind: "node", wasmPath: `${name}.wasm` }));
}

describe("TestScheduler", () => {
  it("reports the worst status across targets", async () => {
    const adapter = new FakeAdapter();
    const report = await new TestScheduler([adapter]).run(targets("a=passed", "b=failed", "c=timed-out"), 1000);
    expect(report.results.map((r) => r.status)).toEqual(["passed", "failed", "timed-out"]);
    expect(report.status).toBe("timed-out");
    expect(report.exitCode).toBe(124);
    expect(report.counts).toEqual({ passed: 1, failed: 1, "timed-out": 1, crashed: 0 });
  });

  it("passes an empty run", async () => {
    const report = await new TestScheduler([new FakeAdapter()]).run([], 1000);
    expect(report.status).toBe("passed");
    expect(report.exitCode).toBe(0);
  });

  it("turns a failed launch into a crashed result and carries on", async () => {
    const adapter = new FakeAdapter();
    const report = await new TestScheduler([adapter]).run(targets("a=throws", "b=passed"), 1000);
    expect(report.results[0]).toMatchObject({
      target: "a=throws",
      kind: "node",
      status: "crashed",
      error: "cannot launch a=throws",
    });
    expect(report.results[1].status).toBe("passed");
    expect(report.exitCode).toBe(101);
  });

  it("checks every target before launching any", async () => {
    const adapter = new FakeAdapter(["node"]);
    const scheduler = new TestScheduler([adapter]);

    await expect(
      scheduler.run([...targets("a"), { name: "b", kind: "browser", wasmPath: "b.wasm" }], 1000),
    ).rejects.toThrow(new ConfigurationError("no host adapter supports browser (target b)"));
    await expect(
      scheduler.run([...targets("a"), { name: "c", kind: "node", wasmPath: "c.wasm", threadStackSize: 1000 }], 1000),
    ).rejects.toBeInstanceOf(ConfigurationError);
    await expect(scheduler.run(targets("a"), 0)).rejects.toBeInstanceOf(ConfigurationError);
    expect(adapter.launched).toEqual([]);
  });

  it("picks the first adapter that supports a kind", async () => {
    const first = new FakeAdapter(["browser", "dedicated-worker"]);
    const second = new FakeAdapter(["dedicated-worker", "node"]);
    await new TestScheduler([first, second]).run(
      [
        { name: "w", kind: "dedicated-worker", wasmPath: "w.wasm" },
        { name: "n", kind: "node", wasmPath: "n.wasm" },
      ],
      1000,
    );
    expect(first.launched).toEqual(["w"]);
    expect(second.launched).toEqual(["n"]);
  });

  it("limits how many targets run at once", async () => {
    const adapter = new FakeAdapter(["node"], 5);
    await new TestScheduler([adapter], { concurrency: 2 }).run(targets("a", "b", "c", "d", "e"), 1000);
    expect(adapter.maxInFlight).toBe(2);
    expect(adapter.launched).toHaveLength(5);
  });

  it("counts launch time against the deadline", async () => {
    const adapter = new FakeAdapter(["node"], 30);
    await new TestScheduler([adapter]).run(targets("a"), 1000);
    expect(adapter.budgets[0]).toBeLessThan(1000);
    expect(adapter.budgets[0]).toBeGreaterThanOrEqual(0);
  });

  it("calls its hooks for every target", async () => {
    const launched: string[] = [];
    const finished: string[] = [];
    await new TestScheduler([new FakeAdapter()], {
      onLaunch: (context) => launched.push(context.target),
      onResult: (r) => finished.push(`${r.target}:${r.status}`),
    }).run(targets("a=failed", "b=throws"), 1000);
    expect(launched).toEqual(["a=failed"]);
    expect(finished.sort()).toEqual(["a=failed:failed", "b=throws:crashed"]);
  });

  it("rejects a concurrency below one", () => {
    expect(() => new TestScheduler([], { concurrency: 0 })).toThrow(ConfigurationError);
  });
});

describe("report", () => {
  it("ranks statuses from passed to crashed", () => {
    expect(worstStatus([])).toBe("passed");
    expect(worstStatus(["failed", "passed"])).toBe("failed");
    expect(worstStatus(["crashed", "timed-out"])).toBe("crashed");
  });

  it("maps statuses to exit codes", () => {
    expect(EXIT_CODES).toEqual({ passed: 0, failed: 1, "timed-out": 124, crashed: 101 });
  });

  it("gives errors outside the run their own exit codes", () => {
    const codes = [
      exitCodeForError(new ConfigurationError("bad timeout")),
      exitCodeForError(new InstantiationError("bad module")),
      exitCodeForError(new Error("unreadable")),
    ];
    expect(codes).toEqual([2, 3, 3]);
    expect(Object.values(EXIT_CODES)).not.toContain(3);
    expect(Object.values(EXIT_CODES)).not.toContain(2);
  });

  it("counts results by status", () => {
    const context = fakeContext({ name: "x", kind: "node", wasmPath: "x.wasm" });
    const report = buildReport([result(context, "crashed"), result(context, "crashed"), result(context, "passed")]);
    expect(report.counts).toEqual({ passed: 1, failed: 0, "timed-out": 0, crashed: 2 });
    expect(report.exitCode).toBe(101);
  });
});
