import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import type { LogAggregator } from "../aggregator/aggregator.js";
import type { ModuleFormat } from "../config.js";
import { nextContextId } from "../context.js";
import { ConfigurationError } from "../errors/errors.js";
import type { ExecutionContext, HostKind, TargetConfig } from "../types.js";
import { PROCESS_CHILD_ENTRY, writeLauncher } from "./launcher.js";
import { SpawnedHostAdapter, type SpawnedHostOptions } from "./spawned.js";

export interface ProcessAdapterOptions extends SpawnedHostOptions {
  format?: ModuleFormat;
  /** Extra arguments for `node`, placed before the launcher script. */
  nodeArgs?: readonly string[];
  nodePath?: string;
  denoPath?: string;
  /** Where per-context launcher directories are created. */
  tempRoot?: string;
  childEntry?: URL;
}

/**
 * Runs each context as its own `node` or `deno` process. Deno only loads ES
 * modules, so it always gets the module launcher.
 */
export class ProcessHostAdapter extends SpawnedHostAdapter {
  readonly name = "process";
  protected readonly kinds: readonly HostKind[] = ["node", "deno"];

  private readonly format: ModuleFormat;
  private readonly nodeArgs: readonly string[];
  private readonly nodePath: string;
  private readonly denoPath: string;
  private readonly tempRoot: string;
  private readonly childEntry: URL;
  private readonly workDirs = new Map<string, string>();

  constructor(aggregator: LogAggregator, options: ProcessAdapterOptions = {}) {
    super(aggregator, options);
    this.format = options.format ?? "commonjs";
    this.nodeArgs = options.nodeArgs ?? [];
    this.nodePath = options.nodePath ?? process.execPath;
    this.denoPath = options.denoPath ?? "deno";
    this.tempRoot = options.tempRoot ?? tmpdir();
    this.childEntry = options.childEntry ?? PROCESS_CHILD_ENTRY;
  }

  async launch(target: TargetConfig): Promise<ExecutionContext> {
    if (!this.supports(target.kind)) {
      throw new ConfigurationError(`${this.name} adapter cannot run ${target.kind} targets`);
    }
    const id = nextContextId(target.kind);
    const dir = await mkdtemp(path.join(this.tempRoot, "wasmtest-"));
    this.workDirs.set(id, dir);

    const format = target.kind === "deno" ? "module" : this.format;
    const { script } = await writeLauncher(
      dir,
      format,
      {
        wasmPath: path.resolve(target.wasmPath),
        contextId: id,
        format,
        threadStackSize: target.threadStackSize,
        filter: target.filter,
        exact: target.exact,
      },
      this.childEntry,
    );

    const [command, args]: [string, string[]] = target.kind === "deno"
      ? [this.denoPath, ["run", "--allow-read", "--allow-env", script]]
      : [this.nodePath, [...this.nodeArgs, script]];
    return this.start(id, target.kind, target.name, { command, args, cwd: dir, env: process.env });
  }

  override async dispose(): Promise<void> {
    const ids = [...this.workDirs.keys()];
    await Promise.all(ids.map((id) => this.removeWorkDir(id)));
  }

  protected override async release(context: ExecutionContext): Promise<void> {
    await this.removeWorkDir(context.id);
  }

  private async removeWorkDir(id: string): Promise<void> {
    const dir = this.workDirs.get(id);
    if (dir === undefined) return;
    this.workDirs.delete(id);
    await rm(dir, { recursive: true, force: true });
  }
}
