import { isMainThread } from "node:worker_threads";
import { defaultLoader, type BootstrapLoader, type BootstrapOptions, type HarnessInstance } from "./loader.js";

/**
 * Initializes on import, but only in the top-level context. A worker cannot
 * find the shared module and memory on its own, so it must call
 * `initialize` with the handles its parent sent it.
 */
export function autoInitialize(
  options: BootstrapOptions,
  loader: BootstrapLoader = defaultLoader,
  topLevel: boolean = isMainThread,
): Promise<HarnessInstance> | undefined {
  if (!topLevel) return undefined;
  return loader.initialize(options);
}

/** Synchronous counterpart for CommonJS hosts, which load the module on require. */
export function autoInitializeSync(
  options: BootstrapOptions,
  loader: BootstrapLoader = defaultLoader,
  topLevel: boolean = isMainThread,
): HarnessInstance | undefined {
  if (!topLevel) return undefined;
  return loader.initializeSync(options);
}
