import path from "node:path";
import type { LogAggregator } from "../aggregator/aggregator.js";
import { nextContextId } from "../context.js";
import { ConfigurationError } from "../errors/errors.js";
import { WORKER_KINDS, type ExecutionContext, type HostKind, type OutputSink, type TargetConfig } from "../types.js";
import { SpawnedHostAdapter, type SpawnedHostOptions } from "./spawned.js";
import { StatusLine } from "./status-line.js";

export const LOADING_MESSAGE = "Loading page elements...";

export interface HeadlessOptions extends SpawnedHostOptions {
  /** Driver command line; the context's arguments are appended. */
  driver: readonly string[];
  /** Terminal the loading status is shown on. */
  sink: OutputSink;
}

/**
 * Browser main-thread and browser worker contexts, driven by an external
 * headless browser driver. The driver relays the page's protocol records on
 * its stdout; they are consumed line by line as they arrive, so a hung page is
 * visible as silence long before the timeout.
 */
export class HeadlessBrowserAdapter extends SpawnedHostAdapter {
  readonly name = "headless";
  protected readonly kinds: readonly HostKind[] = ["browser", ...WORKER_KINDS];

  private readonly driver: readonly string[];
  private readonly sink: OutputSink;

  constructor(aggregator: LogAggregator, options: HeadlessOptions) {
    super(aggregator, options);
    if (options.driver.length === 0) throw new ConfigurationError("headless browser driver command is empty");
    this.driver = options.driver;
    this.sink = options.sink;
  }

  async launch(target: TargetConfig): Promise<ExecutionContext> {
    if (!this.supports(target.kind)) {
      throw new ConfigurationError(`${this.name} adapter cannot run ${target.kind} targets`);
    }
    const [command = "", ...driverArgs] = this.driver;
    const id = nextContextId(target.kind);
    const args = [...driverArgs, "--kind", target.kind, "--context", id];
    if (target.filter !== undefined) args.push("--filter", target.filter);
    if (target.exact) args.push("--exact");
    if (target.threadStackSize !== undefined) args.push("--thread-stack-size", String(target.threadStackSize));
    args.push(path.resolve(target.wasmPath));

    const status = new StatusLine(this.sink);
    status.show(LOADING_MESSAGE);
    const context = this.start(id, target.kind, target.name, { command, args, cwd: process.cwd(), env: process.env }, {
      onLine: () => status.clear(),
    });
    void context.done.then(() => status.clear());
    return context;
  }
}
