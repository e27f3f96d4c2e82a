// Bootstrap loader: turns a compiled module plus optional externally owned
// memory into a running instance, exactly once per (module, memory) pair.
//
// State per registry key:
//   uninitialized → instantiating → ready
//                               └→ failed   (terminal until evict())
//
// A second caller during `instantiating` shares the first caller's promise.
// A caller after `ready` gets the cached instance. Nothing is ever rebuilt
// behind a caller's back.

import {
  ConfigurationError,
  HarnessError,
  InstantiationError,
  errorMessage,
} from "../errors/errors.js";
import { MemoryViewCache, isShared } from "../memory/view-cache.js";
import {
  PAGE_SIZE,
  consoleBindings,
  createHostImports,
  type HostBindings,
  type HostImports,
} from "./imports.js";

export type ModuleSource = ArrayBuffer | ArrayBufferView | WebAssembly.Module;

export type InstanceState = "uninitialized" | "instantiating" | "ready" | "failed";

export interface BootstrapOptions {
  module: ModuleSource;
  memory?: WebAssembly.Memory;
  /** Positive multiple of 64 KiB; forwarded to the start routine. */
  threadStackSize?: number;
  bindings?: HostBindings;
}

export interface HarnessInstance {
  readonly module: WebAssembly.Module;
  readonly instance: WebAssembly.Instance;
  readonly exports: WebAssembly.Exports;
  readonly memory: WebAssembly.Memory | undefined;
  readonly views: MemoryViewCache | undefined;
  readonly shared: boolean;
  readonly threadStackSize: number | undefined;
  /** Function imports satisfied by throwing stubs. */
  readonly stubbed: readonly string[];
}

interface LinkedImports extends HostImports {
  bind(memory: WebAssembly.Memory | undefined): MemoryViewCache | undefined;
}

type Slot =
  | { state: "instantiating"; pending: Promise<HarnessInstance> | undefined }
  | { state: "ready"; instance: HarnessInstance }
  | { state: "failed"; error: HarnessError };

export const START_EXPORT = "__wasmtest_start";

/**
 * Validates a thread stack size. Throws before anything else happens so a bad
 * setting never leaves a half-initialized instance behind.
 */
export function validateThreadStackSize(value: unknown): number | undefined {
  if (value === undefined) return undefined;
  if (
    typeof value !== "number" ||
    !Number.isInteger(value) ||
    value <= 0 ||
    value % PAGE_SIZE !== 0
  ) {
    throw new ConfigurationError(
      `invalid thread stack size ${JSON.stringify(value)}: expected a positive multiple of ${PAGE_SIZE}`,
    );
  }
  return value;
}

// Keys for the "no memory supplied" column of the registry.
const NO_MEMORY = {};

class InstanceRegistry {
  private readonly slots = new WeakMap<object, WeakMap<object, Slot>>();

  get(module: ModuleSource, memory: object | undefined): Slot | undefined {
    return this.slots.get(module)?.get(memory ?? NO_MEMORY);
  }

  set(module: ModuleSource, memory: object | undefined, slot: Slot): void {
    let byMemory = this.slots.get(module);
    if (!byMemory) {
      byMemory = new WeakMap();
      this.slots.set(module, byMemory);
    }
    byMemory.set(memory ?? NO_MEMORY, slot);
  }

  delete(module: ModuleSource, memory: object | undefined): boolean {
    return this.slots.get(module)?.delete(memory ?? NO_MEMORY) ?? false;
  }
}

export class BootstrapLoader {
  private readonly registry = new InstanceRegistry();

  state(module: ModuleSource, memory?: WebAssembly.Memory): InstanceState {
    return this.registry.get(module, memory)?.state ?? "uninitialized";
  }

  initialize(options: BootstrapOptions): Promise<HarnessInstance> {
    const stackSize = validateThreadStackSize(options.threadStackSize);
    const existing = this.registry.get(options.module, options.memory);
    if (existing) return settled(existing);

    const slot: Slot = { state: "instantiating", pending: undefined };
    this.registry.set(options.module, options.memory, slot);
    const pending = this.instantiate(options, stackSize);
    // Linking runs synchronously up to the first await and may already have
    // moved the key to "failed"; only replace our own placeholder.
    if (this.registry.get(options.module, options.memory) === slot) {
      this.registry.set(options.module, options.memory, { state: "instantiating", pending });
    }
    return pending;
  }

  initializeSync(options: BootstrapOptions): HarnessInstance {
    const stackSize = validateThreadStackSize(options.threadStackSize);
    const existing = this.registry.get(options.module, options.memory);
    if (existing) {
      switch (existing.state) {
        case "ready":
          return existing.instance;
        case "failed":
          throw existing.error;
        case "instantiating":
          throw new InstantiationError("re-entrant initialization while the instance is still being built");
      }
    }

    this.registry.set(options.module, options.memory, { state: "instantiating", pending: undefined });
    try {
      const module =
        options.module instanceof WebAssembly.Module ? options.module : new WebAssembly.Module(ownedBytes(options.module));
      const link = this.link(module, options);
      const instance = new WebAssembly.Instance(module, link.imports);
      return this.start(options, module, instance, link, stackSize);
    } catch (e) {
      throw this.fail(options, e);
    }
  }

  /** Forgets a key so the next call instantiates again. */
  evict(module: ModuleSource, memory?: WebAssembly.Memory): boolean {
    return this.registry.delete(module, memory);
  }

  private async instantiate(options: BootstrapOptions, stackSize: number | undefined): Promise<HarnessInstance> {
    try {
      const module =
        options.module instanceof WebAssembly.Module
          ? options.module
          : await WebAssembly.compile(ownedBytes(options.module));
      const link = this.link(module, options);
      const instance = await WebAssembly.instantiate(module, link.imports);
      return this.start(options, module, instance, link, stackSize);
    } catch (e) {
      throw this.fail(options, e);
    }
  }

  private link(module: WebAssembly.Module, options: BootstrapOptions): LinkedImports {
    let views: MemoryViewCache | undefined;
    const link = createHostImports(
      module,
      options.bindings ?? consoleBindings,
      () => {
        if (!views) throw new InstantiationError("module accessed memory before it was bound");
        return views;
      },
      options.memory,
    );
    return {
      ...link,
      bind(memory: WebAssembly.Memory | undefined): MemoryViewCache | undefined {
        views = memory ? new MemoryViewCache(memory) : undefined;
        return views;
      },
    };
  }

  private start(
    options: BootstrapOptions,
    module: WebAssembly.Module,
    instance: WebAssembly.Instance,
    link: LinkedImports,
    stackSize: number | undefined,
  ): HarnessInstance {
    const exported = instance.exports.memory;
    const memory = exported instanceof WebAssembly.Memory ? exported : link.importedMemory;
    const views = link.bind(memory);

    const start = instance.exports[START_EXPORT];
    const entry = instance.exports._start;
    if (typeof start === "function") {
      start(stackSize ?? 0);
    } else if (typeof entry === "function") {
      entry();
    }

    const ready: HarnessInstance = {
      module,
      instance,
      exports: instance.exports,
      memory,
      views,
      shared: memory !== undefined && isShared(memory.buffer),
      threadStackSize: stackSize,
      stubbed: link.stubbed,
    };
    this.registry.set(options.module, options.memory, { state: "ready", instance: ready });
    return ready;
  }

  private fail(options: BootstrapOptions, e: unknown): HarnessError {
    const error =
      e instanceof HarnessError ? e : new InstantiationError(`instantiation failed: ${errorMessage(e)}`, { cause: e });
    this.registry.set(options.module, options.memory, { state: "failed", error });
    return error;
  }
}

function settled(slot: Slot): Promise<HarnessInstance> {
  switch (slot.state) {
    case "ready":
      return Promise.resolve(slot.instance);
    case "failed":
      return Promise.reject(slot.error);
    case "instantiating":
      return slot.pending ?? Promise.reject(new InstantiationError("re-entrant initialization while the instance is still being built"));
  }
}

/** Copies a byte source into a fresh, non-shared buffer the compiler accepts. */
export function ownedBytes(source: ArrayBuffer | ArrayBufferView) {
  const view =
    source instanceof ArrayBuffer
      ? new Uint8Array(source)
      : new Uint8Array(source.buffer, source.byteOffset, source.byteLength);
  const copy = new Uint8Array(view.byteLength);
  copy.set(view);
  return copy;
}

/** Loader for code that expects one instance per realm, like generated glue. */
export const defaultLoader = new BootstrapLoader();
