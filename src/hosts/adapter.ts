import { readFile } from "node:fs/promises";
import type { LogAggregator } from "../aggregator/aggregator.js";
import { ownedBytes } from "../bootstrap/loader.js";
import { InstantiationError, TimeoutError, errorMessage } from "../errors/errors.js";
import { settleWithin } from "../context.js";
import type {
  ContextOutcome,
  ExecutionContext,
  HostKind,
  MergedEvent,
  TargetConfig,
  TestRunResult,
} from "../types.js";

/**
 * What the scheduler needs from a host. Adapters differ only in how they
 * launch a context; every one of them ends in the same TestRunResult.
 */
export interface HostAdapter {
  readonly name: string;
  supports(kind: HostKind): boolean;
  launch(target: TargetConfig): Promise<ExecutionContext>;
  /** Waits at most `timeoutMs`; a context still running then is terminated and reported timed out. */
  awaitResult(context: ExecutionContext, timeoutMs: number): Promise<TestRunResult>;
  terminate(context: ExecutionContext): Promise<void>;
  dispose(): Promise<void>;
}

export abstract class BaseHostAdapter implements HostAdapter {
  abstract readonly name: string;
  protected abstract readonly kinds: readonly HostKind[];

  constructor(protected readonly aggregator: LogAggregator) {}

  supports(kind: HostKind): boolean {
    return this.kinds.includes(kind);
  }

  abstract launch(target: TargetConfig): Promise<ExecutionContext>;

  async awaitResult(context: ExecutionContext, timeoutMs: number): Promise<TestRunResult> {
    let outcome: ContextOutcome | undefined;
    if (await settleWithin(context.done, timeoutMs)) {
      outcome = await context.done;
    } else {
      await this.terminate(context);
    }
    const events = this.aggregator.finalize(context.id);
    await this.release(context);
    return toTestRunResult(context, outcome, events, timeoutMs);
  }

  async terminate(context: ExecutionContext): Promise<void> {
    await context.terminate();
  }

  async dispose(): Promise<void> {}

  /** Frees per-context resources once the result is taken. */
  protected async release(_context: ExecutionContext): Promise<void> {}
}

/** `outcome` is undefined when the context ran out of time. */
export function toTestRunResult(
  context: ExecutionContext,
  outcome: ContextOutcome | undefined,
  events: MergedEvent[],
  timeoutMs: number,
): TestRunResult {
  const base = {
    contextId: context.id,
    target: context.target,
    kind: context.kind,
    durationMs: Date.now() - context.startedAt,
    events,
  };
  if (outcome === undefined) {
    return {
      ...base,
      status: "timed-out",
      tests: [],
      filteredOut: 0,
      error: new TimeoutError(timeoutMs, `target ${context.target}`).message,
    };
  }
  switch (outcome.type) {
    case "completed":
      return {
        ...base,
        status: outcome.tests.some((test) => test.status === "failed") ? "failed" : "passed",
        tests: outcome.tests,
        filteredOut: outcome.filteredOut,
      };
    case "crashed":
      return { ...base, status: "crashed", tests: [], filteredOut: 0, error: outcome.panic.message };
    case "terminated":
      return { ...base, status: "crashed", tests: [], filteredOut: 0, error: `context ${context.id} was terminated` };
  }
}

/** The target's precompiled module, or its file compiled now. */
export async function compileTarget(target: TargetConfig): Promise<WebAssembly.Module> {
  if (target.module) return target.module;
  let bytes: Uint8Array;
  try {
    bytes = await readFile(target.wasmPath);
  } catch (e) {
    throw new InstantiationError(`cannot read ${target.wasmPath}: ${errorMessage(e)}`, { cause: e });
  }
  try {
    return await WebAssembly.compile(ownedBytes(bytes));
  } catch (e) {
    throw new InstantiationError(`cannot compile ${target.wasmPath}: ${errorMessage(e)}`, { cause: e });
  }
}
