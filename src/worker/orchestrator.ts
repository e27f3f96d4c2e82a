// Parent side of the worker layer: creates threads, routes their messages to
// context records, and supervises them.
//
//   dedicated-worker  one thread per context, stopped when the context ends
//   shared-worker     one thread per routing key, stopped with its last context
//   service-worker    one thread per routing key, installed before first use and
//                     kept until dispose()

import type { LogAggregator } from "../aggregator/aggregator.js";
import { ContextRecord, nextContextId, settleWithin } from "../context.js";
import { ConfigurationError, errorMessage } from "../errors/errors.js";
import { isShared } from "../memory/view-cache.js";
import { contextIdOf, parseChildMessage, type ChildMessage, type SpawnMessage } from "../protocol/messages.js";
import type { ExecutionContext, WorkerKind } from "../types.js";
import { NodeWorkerFactory, type WorkerFactory, type WorkerHandle } from "./factory.js";

export const DEFAULT_GRACE_PERIOD_MS = 2000;

export interface SpawnRequest {
  kind: WorkerKind;
  target: string;
  module: WebAssembly.Module;
  /** Must be shared; it is handed to the context and every thread below it. */
  memory?: WebAssembly.Memory;
  threadStackSize?: number;
  filter?: string;
  exact?: boolean;
  /** Shared and service workers with the same key are reused. Defaults to the target name. */
  routingKey?: string;
}

export interface OrchestratorOptions {
  aggregator: LogAggregator;
  factory?: WorkerFactory;
  /** How long a terminated context may take to acknowledge before its thread is killed. */
  gracePeriodMs?: number;
}

interface ManagedWorker {
  readonly kind: WorkerKind;
  readonly key: string | undefined;
  readonly handle: WorkerHandle;
  readonly contexts: Map<string, ContextRecord>;
  /** Spawns waiting for a service worker's `activated`. */
  readonly queued: SpawnMessage[];
  activated: boolean;
  stopped: boolean;
}

export class WorkerOrchestrator {
  private readonly aggregator: LogAggregator;
  private readonly factory: WorkerFactory;
  private readonly gracePeriodMs: number;
  private readonly pooled = new Map<string, ManagedWorker>();
  private readonly live = new Set<ManagedWorker>();

  constructor(options: OrchestratorOptions) {
    this.aggregator = options.aggregator;
    this.factory = options.factory ?? new NodeWorkerFactory();
    this.gracePeriodMs = options.gracePeriodMs ?? DEFAULT_GRACE_PERIOD_MS;
  }

  /** Threads currently running. */
  get workerCount(): number {
    return this.live.size;
  }

  spawn(request: SpawnRequest): ExecutionContext {
    if (request.memory && !isShared(request.memory.buffer)) {
      throw new ConfigurationError(`memory handed to ${request.kind} contexts must be shared`);
    }
    const worker = this.acquire(request);
    const record: ContextRecord = new ContextRecord({
      id: nextContextId(request.kind),
      kind: request.kind,
      target: request.target,
      memory: request.memory ? "shared" : "exclusive",
      aggregator: this.aggregator,
      stop: (context) => this.stopContext(worker, context),
      onSettled: (context) => this.release(worker, context),
    });
    worker.contexts.set(record.id, record);

    const message: SpawnMessage = {
      type: "spawn",
      contextId: record.id,
      module: request.module,
      memory: request.memory,
      threadStackSize: request.threadStackSize,
      filter: request.filter,
      exact: request.exact,
    };
    if (worker.activated) this.send(worker, message);
    else worker.queued.push(message);
    return record;
  }

  async terminate(context: ExecutionContext): Promise<void> {
    await context.terminate();
  }

  /** Terminates every live context and stops every thread, pooled ones included. */
  async dispose(): Promise<void> {
    const workers = [...this.live];
    await Promise.all(workers.flatMap((worker) => [...worker.contexts.values()].map((record) => record.terminate())));
    await Promise.all(workers.map((worker) => this.stopWorker(worker)));
  }

  private acquire(request: SpawnRequest): ManagedWorker {
    if (request.kind === "dedicated-worker") return this.start(request.kind, undefined);
    const key = `${request.kind}:${request.routingKey ?? request.target}`;
    const existing = this.pooled.get(key);
    if (existing && !existing.stopped) return existing;
    const worker = this.start(request.kind, key);
    this.pooled.set(key, worker);
    return worker;
  }

  private start(kind: WorkerKind, key: string | undefined): ManagedWorker {
    const handle = this.factory.create();
    const worker: ManagedWorker = {
      kind,
      key,
      handle,
      contexts: new Map(),
      queued: [],
      activated: kind !== "service-worker",
      stopped: false,
    };
    this.live.add(worker);

    handle.channel.listen((data) => this.route(worker, data));
    handle.onError((error) => {
      for (const record of this.liveContexts(worker)) {
        record.crash(record.panicEvent(record.id, error.message, error.stack));
      }
      this.forget(worker);
    });
    handle.onExit((code) => {
      this.forget(worker);
      for (const record of this.liveContexts(worker)) {
        record.lose(`lost its worker (exit code ${code}) before reporting a result`);
      }
    });

    if (!worker.activated) handle.channel.send({ type: "install" });
    return worker;
  }

  private route(worker: ManagedWorker, data: unknown): void {
    let message: ChildMessage;
    try {
      message = parseChildMessage(data);
    } catch (e) {
      const id = contextIdOf(data);
      const targets = id !== undefined && worker.contexts.has(id)
        ? this.liveContexts(worker).filter((record) => record.id === id)
        : this.liveContexts(worker);
      for (const record of targets) {
        record.crash(record.panicEvent(record.id, `ProtocolError: ${errorMessage(e)}`));
      }
      return;
    }

    if (message.type === "activated") {
      worker.activated = true;
      for (const queued of worker.queued.splice(0)) this.send(worker, queued);
      return;
    }
    // Unknown or finished contexts: dropped.
    worker.contexts.get(message.contextId)?.accept(message);
  }

  private send(worker: ManagedWorker, message: SpawnMessage): void {
    try {
      worker.handle.channel.send(message);
    } catch (e) {
      const record = worker.contexts.get(message.contextId);
      record?.crash(record.panicEvent(record.id, `could not start context: ${errorMessage(e)}`));
    }
  }

  private async stopContext(worker: ManagedWorker, record: ContextRecord): Promise<void> {
    if (worker.stopped) return;
    try {
      worker.handle.channel.send({ type: "terminate", contextId: record.id });
    } catch {
      worker.handle.kill();
      return;
    }
    const acknowledged = await settleWithin(record.done, this.gracePeriodMs);
    if (!acknowledged) {
      this.forget(worker);
      worker.handle.kill();
    }
  }

  private release(worker: ManagedWorker, record: ContextRecord): void {
    worker.contexts.delete(record.id);
    const idle = worker.contexts.size === 0;
    if (worker.kind === "dedicated-worker" || (worker.kind === "shared-worker" && idle)) {
      void this.stopWorker(worker);
    }
  }

  private stopWorker(worker: ManagedWorker): Promise<void> {
    const wasRunning = !worker.stopped;
    this.forget(worker);
    return wasRunning ? worker.handle.terminate() : Promise.resolve();
  }

  private forget(worker: ManagedWorker): void {
    worker.stopped = true;
    this.live.delete(worker);
    if (worker.key !== undefined && this.pooled.get(worker.key) === worker) this.pooled.delete(worker.key);
  }

  private liveContexts(worker: ManagedWorker): ContextRecord[] {
    return [...worker.contexts.values()].filter((record) => !record.settled);
  }
}
