// Child side of one execution context.
//
// A session instantiates the module through its own loader, reports `ready`,
// runs the selected tests (or a single thread entry) with the console routed
// into its batcher, and reports `result`. Nested workers started through
// `harness.spawn` are supervised here: their events are relayed upward in
// order, and a crash anywhere below crashes this context too.

import { format } from "node:util";
import { LogBatcher, type BatcherOptions } from "../aggregator/log-batcher.js";
import { BootstrapLoader, type BootstrapOptions, type HarnessInstance } from "../bootstrap/loader.js";
import type { HostBindings } from "../bootstrap/imports.js";
import { deferred, type Deferred } from "../context.js";
import {
  ConfigurationError,
  InstantiationError,
  PanicError,
  errorMessage,
} from "../errors/errors.js";
import {
  CONSOLE_LEVELS,
  parseChildMessage,
  type ChildMessage,
  type ConsoleLevel,
  type SpawnMessage,
} from "../protocol/messages.js";
import { AssertionRecorder, runTests, type TestRunOutcome } from "../runner/test-runner.js";
import type { WorkerFactory, WorkerHandle } from "./factory.js";

export type ConsoleTarget = Pick<Console, ConsoleLevel>;

export type SessionRequest = Omit<SpawnMessage, "type">;

export type SessionOutcome = "completed" | "crashed" | "closed";

export interface SessionOptions {
  post(message: ChildMessage): void;
  /** Creates threads for `harness.spawn`; without one, spawning panics. */
  factory?: WorkerFactory;
  /** Console to capture while tests run; defaults to the global one. */
  console?: ConsoleTarget;
  initialize?: (options: BootstrapOptions) => Promise<HarnessInstance>;
  batch?: BatcherOptions;
}

interface NestedWorker {
  readonly id: string;
  readonly handle: WorkerHandle;
  readonly finished: Deferred<void>;
  done: boolean;
  detach: () => void;
}

export class ChildSession {
  readonly contextId: string;
  private state: "running" | "crashed" | "closed" = "running";
  private instance: HarnessInstance | undefined;
  private spawned = 0;
  private readonly nested = new Map<string, NestedWorker>();
  private readonly recorder = new AssertionRecorder();
  private readonly batcher: LogBatcher;

  constructor(
    private readonly request: SessionRequest,
    private readonly options: SessionOptions,
  ) {
    this.contextId = request.contextId;
    this.batcher = new LogBatcher(
      request.contextId,
      (events) => options.post({ type: "log", contextId: this.contextId, events }),
      options.batch,
    );
  }

  get nestedCount(): number {
    return this.spawned;
  }

  async run(): Promise<SessionOutcome> {
    const initialize = this.options.initialize ?? ((o: BootstrapOptions) => new BootstrapLoader().initialize(o));
    let instance: HarnessInstance;
    try {
      instance = await initialize({
        module: this.request.module,
        memory: this.request.memory,
        threadStackSize: this.request.threadStackSize,
        bindings: this.bindings(),
      });
    } catch (e) {
      return this.report(e);
    }
    if (this.state !== "running") return this.state;
    this.instance = instance;
    this.control({ type: "ready", contextId: this.contextId });

    let outcome: TestRunOutcome;
    try {
      const entry = this.request.entry;
      outcome = this.captured(() =>
        entry === undefined
          ? runTests(instance, this.recorder, { filter: this.request.filter, exact: this.request.exact })
          : runEntry(instance, entry),
      );
    } catch (e) {
      return this.report(e);
    }

    await Promise.all([...this.nested.values()].map((worker) => worker.finished.promise));
    if (this.state !== "running") return this.state;
    this.control({ type: "result", contextId: this.contextId, ...outcome });
    return "completed";
  }

  /** Parent asked to stop: nested workers go down and nothing more is reported. */
  close(): void {
    if (this.state === "running") this.state = "closed";
    this.stopNested();
    this.batcher.flush();
  }

  private bindings(): HostBindings {
    return {
      log: (level, message) => {
        this.batcher.emit(level, message);
      },
      fail: (message) => {
        this.recorder.fail(message);
      },
      spawn: (entry) => this.spawnNested(entry),
    };
  }

  private captured<T>(body: () => T): T {
    const target = this.options.console ?? console;
    const saved: ConsoleTarget = {
      debug: target.debug,
      log: target.log,
      info: target.info,
      warn: target.warn,
      error: target.error,
    };
    for (const level of CONSOLE_LEVELS) {
      target[level] = (...args: unknown[]) => {
        this.batcher.emit(level, format(...args));
      };
    }
    try {
      return body();
    } finally {
      Object.assign(target, saved);
    }
  }

  // Log batches go out before any control message, so the parent never sees a
  // result or panic ahead of the output that led to it.
  private control(message: ChildMessage): void {
    this.batcher.flush();
    this.options.post(message);
  }

  private report(e: unknown): SessionOutcome {
    if (this.state !== "running") return this.state;
    if (e instanceof ConfigurationError || e instanceof InstantiationError) {
      this.control({ type: "fatal", contextId: this.contextId, name: e.name, message: e.message });
    } else {
      this.control({
        type: "panic",
        contextId: this.contextId,
        origin: this.contextId,
        message: errorMessage(e),
        stack: e instanceof PanicError ? e.panicStack ?? e.stack : e instanceof Error ? e.stack : undefined,
      });
    }
    this.state = "crashed";
    this.stopNested();
    return "crashed";
  }

  private spawnNested(entry: string): number {
    const factory = this.options.factory;
    if (!factory) throw new PanicError(`nested workers are not available in context ${this.contextId}`);
    if (this.state !== "running") throw new PanicError(`context ${this.contextId} is shutting down`);

    this.spawned++;
    const id = `${this.contextId}.${this.spawned}`;
    const handle = factory.create();
    const worker: NestedWorker = { id, handle, finished: deferred<void>(), done: false, detach: () => undefined };
    this.nested.set(id, worker);
    this.control({ type: "context", contextId: this.contextId, origin: id, parentId: this.contextId });

    worker.detach = handle.channel.listen((data) => this.onNestedMessage(worker, data));
    handle.onError((error) => this.relayPanic(worker, id, error.message, error.stack));
    handle.onExit((code) => {
      if (!worker.done) this.relayPanic(worker, id, `ChannelLossError: context ${id} exited with code ${code} before reporting a result`);
    });

    const memory = this.instance?.shared ? this.instance.memory : this.request.memory;
    try {
      handle.channel.send({
        type: "spawn",
        contextId: id,
        module: this.request.module,
        memory,
        threadStackSize: this.request.threadStackSize,
        entry,
      });
    } catch (e) {
      this.finishNested(worker);
      throw new PanicError(`could not start nested context ${id}: ${errorMessage(e)}`);
    }
    return this.spawned;
  }

  private onNestedMessage(worker: NestedWorker, data: unknown): void {
    if (worker.done) return;
    let message: ChildMessage;
    try {
      message = parseChildMessage(data);
    } catch (e) {
      this.relayPanic(worker, worker.id, errorMessage(e));
      return;
    }
    switch (message.type) {
      case "activated":
      case "ready":
      case "closed":
        return;
      case "log":
        this.batcher.relay(message.events);
        return;
      case "context":
        if (this.state === "running") this.control({ ...message, contextId: this.contextId });
        return;
      case "panic":
        this.relayPanic(worker, message.origin, message.message, message.stack);
        return;
      case "fatal":
        this.relayPanic(worker, worker.id, `${message.name}: ${message.message}`);
        return;
      case "result":
        this.finishNested(worker);
        return;
    }
  }

  private relayPanic(worker: NestedWorker, origin: string, message: string, stack?: string): void {
    this.finishNested(worker);
    if (this.state !== "running") return;
    this.control({ type: "panic", contextId: this.contextId, origin, message, stack });
    this.state = "crashed";
    this.stopNested();
  }

  private finishNested(worker: NestedWorker): void {
    if (worker.done) return;
    worker.done = true;
    worker.detach();
    worker.finished.resolve();
    void worker.handle.terminate();
  }

  private stopNested(): void {
    for (const worker of this.nested.values()) this.finishNested(worker);
  }
}

function runEntry(instance: HarnessInstance, entry: string): TestRunOutcome {
  const fn = instance.exports[entry];
  if (typeof fn !== "function") throw new PanicError(`thread entry '${entry}' is not an exported function`);
  fn();
  return { tests: [], filteredOut: 0 };
}
