// Import object handed to the module under test.
//
// Functions under the `harness` module are the test ABI. Memory imports get
// the supplied (or a default shared) memory. Every other function import is a
// stub that fails loudly when called, so modules carrying glue we do not
// provide still instantiate and can run tests that never touch it.

import { PanicError } from "../errors/errors.js";
import { CONSOLE_LEVELS, type ConsoleLevel } from "../protocol/messages.js";
import type { MemoryViewCache } from "../memory/view-cache.js";

export const HOST_MODULE = "harness";

/** Wasm page size; thread stack sizes must be a multiple of it. */
export const PAGE_SIZE = 65536;

// Same defaults as a threaded module's own glue would allocate.
export const DEFAULT_MEMORY_INITIAL_PAGES = 17;
export const DEFAULT_MEMORY_MAXIMUM_PAGES = 16384;

export interface HostBindings {
  log(level: ConsoleLevel, message: string): void;
  /** Records an assertion failure on the running test. */
  fail(message: string): void;
  /** Starts a nested worker running `entry`; returns its handle number. */
  spawn(entry: string): number;
}

export const consoleBindings: HostBindings = {
  log(level, message) {
    console[level](message);
  },
  fail(message) {
    console.error(`assertion failed: ${message}`);
  },
  spawn(entry) {
    throw new PanicError(`nested workers are not available here (requested '${entry}')`);
  },
};

export interface HostImports {
  imports: WebAssembly.Imports;
  /** Memory handed to a memory import, if the module has one. */
  importedMemory: WebAssembly.Memory | undefined;
  stubbed: string[];
}

export function levelName(level: number): ConsoleLevel {
  return CONSOLE_LEVELS[level] ?? "log";
}

export function createHostImports(
  module: WebAssembly.Module,
  bindings: HostBindings,
  views: () => MemoryViewCache,
  memory?: WebAssembly.Memory,
): HostImports {
  const readString = (ptr: number, len: number) => views().readString(ptr, len);

  const harness: Record<string, WebAssembly.ImportValue> = {
    log(level: number, ptr: number, len: number): void {
      bindings.log(levelName(level), readString(ptr, len));
    },
    fail(ptr: number, len: number): void {
      bindings.fail(readString(ptr, len));
    },
    panic(ptr: number, len: number): never {
      throw new PanicError(readString(ptr, len));
    },
    spawn(ptr: number, len: number): number {
      return bindings.spawn(readString(ptr, len));
    },
    now(): number {
      return Date.now();
    },
  };

  const imports: Record<string, Record<string, WebAssembly.ImportValue>> = {};
  const stubbed: string[] = [];
  let importedMemory: WebAssembly.Memory | undefined;

  for (const imp of WebAssembly.Module.imports(module)) {
    const namespace = (imports[imp.module] ??= {});
    if (imp.kind === "memory") {
      importedMemory ??= memory ?? new WebAssembly.Memory({
        initial: DEFAULT_MEMORY_INITIAL_PAGES,
        maximum: DEFAULT_MEMORY_MAXIMUM_PAGES,
        shared: true,
      });
      namespace[imp.name] = importedMemory;
      continue;
    }
    if (imp.kind !== "function") continue;
    const provided = imp.module === HOST_MODULE ? harness[imp.name] : undefined;
    if (provided !== undefined) {
      namespace[imp.name] = provided;
      continue;
    }
    const qualified = `${imp.module}.${imp.name}`;
    stubbed.push(qualified);
    namespace[imp.name] = () => {
      throw new PanicError(`stub import called: ${qualified} is not provided by the harness`);
    };
  }

  return { imports, importedMemory, stubbed };
}
