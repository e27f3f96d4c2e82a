// Runs every target through the adapter that supports its kind and folds the
// results into one report.
//
// Settings are checked for every target before the first launch; a bad one
// stops the whole run. After that, whatever goes wrong stays with its target.

import { validateThreadStackSize } from "../bootstrap/loader.js";
import { nextContextId } from "../context.js";
import { ConfigurationError, errorMessage } from "../errors/errors.js";
import type { HostAdapter } from "../hosts/adapter.js";
import type { AggregateReport, ExecutionContext, TargetConfig, TestRunResult } from "../types.js";
import { buildReport } from "./report.js";

export interface SchedulerHooks {
  onLaunch?(context: ExecutionContext): void;
  onResult?(result: TestRunResult): void;
}

export interface SchedulerOptions extends SchedulerHooks {
  /** Targets in flight at once; all of them by default. */
  concurrency?: number;
}

interface PlannedRun {
  target: TargetConfig;
  adapter: HostAdapter;
}

export class TestScheduler {
  private readonly concurrency: number;

  constructor(
    private readonly adapters: readonly HostAdapter[],
    private readonly options: SchedulerOptions = {},
  ) {
    this.concurrency = options.concurrency ?? Number.POSITIVE_INFINITY;
    if (!(this.concurrency >= 1)) {
      throw new ConfigurationError(`invalid concurrency ${options.concurrency}: expected at least 1`);
    }
  }

  async run(targets: readonly TargetConfig[], timeoutMs: number): Promise<AggregateReport> {
    if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
      throw new ConfigurationError(`invalid timeout ${timeoutMs}ms: expected a positive duration`);
    }
    const plan = targets.map((target): PlannedRun => {
      validateThreadStackSize(target.threadStackSize);
      return { target, adapter: this.adapterFor(target) };
    });

    const results = await mapWithLimit(plan, this.concurrency, (run) => this.runOne(run, timeoutMs));
    return buildReport(results);
  }

  private adapterFor(target: TargetConfig): HostAdapter {
    const adapter = this.adapters.find((candidate) => candidate.supports(target.kind));
    if (!adapter) throw new ConfigurationError(`no host adapter supports ${target.kind} (target ${target.name})`);
    return adapter;
  }

  // The deadline covers launch and execution together.
  private async runOne({ target, adapter }: PlannedRun, timeoutMs: number): Promise<TestRunResult> {
    const started = Date.now();
    let result: TestRunResult;
    try {
      const context = await adapter.launch(target);
      this.options.onLaunch?.(context);
      const remaining = Math.max(0, timeoutMs - (Date.now() - started));
      result = await adapter.awaitResult(context, remaining);
    } catch (e) {
      result = {
        contextId: nextContextId(target.kind),
        target: target.name,
        kind: target.kind,
        status: "crashed",
        durationMs: Date.now() - started,
        events: [],
        tests: [],
        filteredOut: 0,
        error: errorMessage(e),
      };
    }
    this.options.onResult?.(result);
    return result;
  }
}

async function mapWithLimit<T, R>(items: readonly T[], limit: number, fn: (item: T) => Promise<R>): Promise<R[]> {
  const results = new Array<R>(items.length);
  let next = 0;
  const lane = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      results[index] = await fn(items[index]);
    }
  };
  await Promise.all(Array.from({ length: Math.min(limit, items.length) }, lane));
  return results;
}
