// Runs inside the child process started by ProcessHostAdapter. The launcher
// script imports this module and calls `main` with the context's arguments.

import { readFile } from "node:fs/promises";
import { autoInitialize, autoInitializeSync } from "../bootstrap/auto-init.js";
import {
  defaultLoader,
  ownedBytes,
  type BootstrapLoader,
  type BootstrapOptions,
  type HarnessInstance,
} from "../bootstrap/loader.js";
import type { ModuleFormat } from "../config.js";
import { InstantiationError, errorMessage } from "../errors/errors.js";
import { encodeMessage } from "../protocol/ndjson.js";
import type { ChildMessage } from "../protocol/messages.js";
import { NodeWorkerFactory, type WorkerFactory } from "../worker/factory.js";
import { ChildSession, type ConsoleTarget } from "../worker/session.js";

export interface ProcessChildArgs {
  wasmPath: string;
  contextId: string;
  /** `commonjs` compiles and instantiates synchronously; `module` awaits both. */
  format?: ModuleFormat;
  threadStackSize?: number;
  filter?: string;
  exact?: boolean;
}

export interface ProcessChildIO {
  write(text: string): void;
  readFile(path: string): Promise<Uint8Array>;
  factory?: WorkerFactory;
  console?: ConsoleTarget;
  loader?: BootstrapLoader;
}

const processIO: ProcessChildIO = {
  write(text) {
    process.stdout.write(text);
  },
  readFile: (path) => readFile(path),
};

/** Resolves the exit code: 0 once a result was reported, 101 otherwise. */
export async function runProcessChild(args: ProcessChildArgs, io: ProcessChildIO = processIO): Promise<number> {
  const post = (message: ChildMessage): void => io.write(encodeMessage(message));

  const format = args.format ?? "commonjs";
  let module: WebAssembly.Module;
  try {
    const bytes = ownedBytes(await io.readFile(args.wasmPath));
    module = format === "commonjs" ? new WebAssembly.Module(bytes) : await WebAssembly.compile(bytes);
  } catch (e) {
    post({
      type: "fatal",
      contextId: args.contextId,
      name: "InstantiationError",
      message: `cannot load ${args.wasmPath}: ${errorMessage(e)}`,
    });
    return 101;
  }

  const loader = io.loader ?? defaultLoader;
  const session = new ChildSession(
    {
      contextId: args.contextId,
      module,
      threadStackSize: args.threadStackSize,
      filter: args.filter,
      exact: args.exact,
    },
    {
      post,
      factory: io.factory ?? new NodeWorkerFactory(),
      console: io.console,
      // This process is the top-level context, so the module initializes itself.
      initialize: (options) => (format === "commonjs" ? initializeSync(options, loader) : initialize(options, loader)),
    },
  );
  const outcome = await session.run();
  return outcome === "completed" ? 0 : 101;
}

function initialize(options: BootstrapOptions, loader: BootstrapLoader): Promise<HarnessInstance> {
  return (
    autoInitialize(options, loader) ??
    Promise.reject(new InstantiationError("process child is not running as the top-level context"))
  );
}

async function initializeSync(options: BootstrapOptions, loader: BootstrapLoader): Promise<HarnessInstance> {
  const instance = autoInitializeSync(options, loader);
  if (!instance) throw new InstantiationError("process child is not running as the top-level context");
  return instance;
}

export const main = runProcessChild;
