// Composition root and public API.

import { LogAggregator } from "./aggregator/aggregator.js";
import { loadConfig, type HarnessConfig } from "./config.js";
import { Reporter } from "./errors/reporter.js";
import type { HostAdapter } from "./hosts/adapter.js";
import { HeadlessBrowserAdapter } from "./hosts/headless.js";
import { ProcessHostAdapter } from "./hosts/process.js";
import type { Spawner } from "./hosts/spawned.js";
import { WorkerHostAdapter } from "./hosts/worker.js";
import { TestScheduler } from "./scheduler/scheduler.js";
import type { AggregateReport, HostKind, OutputSink, TargetConfig } from "./types.js";
import type { WorkerFactory } from "./worker/factory.js";
import { WorkerOrchestrator } from "./worker/orchestrator.js";

export interface HarnessOptions {
  sink: OutputSink;
  config?: HarnessConfig;
  json?: boolean;
  concurrency?: number;
  workerFactory?: WorkerFactory;
  spawner?: Spawner;
}

export interface Harness {
  readonly config: HarnessConfig;
  readonly aggregator: LogAggregator;
  readonly orchestrator: WorkerOrchestrator;
  readonly adapters: readonly HostAdapter[];
  run(targets: readonly TargetConfig[], timeoutMs?: number): Promise<AggregateReport>;
  dispose(): Promise<void>;
}

/** The server-side target used when none is named. */
export function defaultKind(config: HarnessConfig): HostKind {
  return config.useDeno ? "deno" : "node";
}

export function createHarness(options: HarnessOptions): Harness {
  const config = options.config ?? loadConfig();
  const aggregator = new LogAggregator();
  const orchestrator = new WorkerOrchestrator({ aggregator, factory: options.workerFactory });
  const reporter = new Reporter(options.sink, { nocapture: config.nocapture, json: options.json });

  // First match wins: with a driver configured, worker kinds run in the browser.
  const adapters: HostAdapter[] = [
    new ProcessHostAdapter(aggregator, {
      format: config.moduleFormat,
      nodeArgs: config.nodeArgs,
      spawner: options.spawner,
    }),
  ];
  if (config.browserDriver) {
    adapters.push(
      new HeadlessBrowserAdapter(aggregator, {
        driver: config.browserDriver,
        sink: options.sink,
        spawner: options.spawner,
      }),
    );
  }
  adapters.push(new WorkerHostAdapter(aggregator, orchestrator));

  const scheduler = new TestScheduler(adapters, {
    concurrency: options.concurrency,
    onResult: (result) => reporter.result(result),
  });
  aggregator.subscribe((event) => reporter.event(event));

  return {
    config,
    aggregator,
    orchestrator,
    adapters,
    async run(targets, timeoutMs = config.timeoutMs) {
      reporter.start(targets.length);
      const report = await scheduler.run(targets, timeoutMs);
      reporter.finish(report);
      return report;
    },
    async dispose() {
      await Promise.all(adapters.map((adapter) => adapter.dispose()));
    },
  };
}

export { LogAggregator } from "./aggregator/aggregator.js";
export { LogBatcher } from "./aggregator/log-batcher.js";
export { autoInitialize } from "./bootstrap/auto-init.js";
export { BootstrapLoader, START_EXPORT, defaultLoader, validateThreadStackSize } from "./bootstrap/loader.js";
export type { BootstrapOptions, HarnessInstance, InstanceState, ModuleSource } from "./bootstrap/loader.js";
export { HOST_MODULE, PAGE_SIZE } from "./bootstrap/imports.js";
export type { HostBindings } from "./bootstrap/imports.js";
export { loadConfig } from "./config.js";
export type { HarnessConfig, ModuleFormat } from "./config.js";
export * from "./errors/errors.js";
export { Reporter } from "./errors/reporter.js";
export { BaseHostAdapter } from "./hosts/adapter.js";
export type { HostAdapter } from "./hosts/adapter.js";
export { HeadlessBrowserAdapter } from "./hosts/headless.js";
export { ProcessHostAdapter } from "./hosts/process.js";
export { WorkerHostAdapter } from "./hosts/worker.js";
export { MemoryViewCache } from "./memory/view-cache.js";
export type { ViewKind } from "./memory/view-cache.js";
export { EXIT_CODES, CONFIG_EXIT_CODE, INTERNAL_EXIT_CODE, exitCodeForError, worstStatus } from "./scheduler/report.js";
export { TestScheduler } from "./scheduler/scheduler.js";
export { NodeWorkerFactory } from "./worker/factory.js";
export type { WorkerFactory, WorkerHandle } from "./worker/factory.js";
export { WorkerOrchestrator } from "./worker/orchestrator.js";
export * from "./types.js";
