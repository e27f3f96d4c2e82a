import type { LogAggregator } from "../aggregator/aggregator.js";
import { ConfigurationError } from "../errors/errors.js";
import { WORKER_KINDS, isWorkerKind, type ExecutionContext, type TargetConfig } from "../types.js";
import type { WorkerOrchestrator } from "../worker/orchestrator.js";
import { BaseHostAdapter, compileTarget } from "./adapter.js";

/** Dedicated, shared and service worker contexts, run as worker threads. */
export class WorkerHostAdapter extends BaseHostAdapter {
  readonly name = "worker";
  protected readonly kinds = WORKER_KINDS;

  constructor(
    aggregator: LogAggregator,
    private readonly orchestrator: WorkerOrchestrator,
  ) {
    super(aggregator);
  }

  async launch(target: TargetConfig): Promise<ExecutionContext> {
    const kind = target.kind;
    if (!isWorkerKind(kind)) throw new ConfigurationError(`${this.name} adapter cannot run ${kind} targets`);
    const module = await compileTarget(target);
    return this.orchestrator.spawn({
      kind,
      target: target.name,
      module,
      memory: target.memory,
      threadStackSize: target.threadStackSize,
      filter: target.filter,
      exact: target.exact,
    });
  }

  override async terminate(context: ExecutionContext): Promise<void> {
    await this.orchestrator.terminate(context);
  }

  override async dispose(): Promise<void> {
    await this.orchestrator.dispose();
  }
}
