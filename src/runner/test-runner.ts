// Discovers and runs the tests a module exports, inside one context.
//
// Test exports are zero-argument functions named `test_*`, run in module
// export order. A module without any but with a `main` export is a doctest
// and runs `main` as its single test.

import { PanicError, errorMessage } from "../errors/errors.js";
import type { TestCase } from "../protocol/messages.js";
import type { HarnessInstance } from "../bootstrap/loader.js";

export const TEST_PREFIX = "test_";
export const DOCTEST_ENTRY = "main";

export interface TestSelection {
  filter?: string;
  exact?: boolean;
}

export interface DiscoveredTests {
  names: string[];
  filteredOut: number;
  doctest: boolean;
}

export function discoverTests(module: WebAssembly.Module, selection: TestSelection = {}): DiscoveredTests {
  const functions = WebAssembly.Module.exports(module)
    .filter((e) => e.kind === "function")
    .map((e) => e.name);

  let candidates = functions.filter((name) => name.startsWith(TEST_PREFIX));
  let doctest = false;
  if (candidates.length === 0 && functions.includes(DOCTEST_ENTRY)) {
    candidates = [DOCTEST_ENTRY];
    doctest = true;
  }

  const { filter, exact } = selection;
  const names = filter === undefined
    ? candidates
    : candidates.filter((name) => (exact ? name === filter : name.includes(filter)));
  return { names, filteredOut: candidates.length - names.length, doctest };
}

/** Collects `harness.fail` calls made by the running test. */
export class AssertionRecorder {
  private failures: string[] = [];

  begin(): void {
    this.failures = [];
  }

  fail(message: string): void {
    this.failures.push(message);
  }

  take(): string[] {
    const taken = this.failures;
    this.failures = [];
    return taken;
  }
}

export interface RunHooks {
  onTestStart?(name: string): void;
  onTestEnd?(result: TestCase): void;
}

export interface TestRunOutcome {
  tests: TestCase[];
  filteredOut: number;
}

/**
 * Runs every selected test. Assertion failures and traps fail the test and
 * the run continues; a PanicError aborts the run and propagates.
 */
export function runTests(
  instance: HarnessInstance,
  recorder: AssertionRecorder,
  selection: TestSelection = {},
  hooks: RunHooks = {},
): TestRunOutcome {
  const { names, filteredOut } = discoverTests(instance.module, selection);
  const tests: TestCase[] = [];

  for (const name of names) {
    hooks.onTestStart?.(name);
    recorder.begin();
    const started = performance.now();
    let thrown: string | undefined;
    try {
      const fn = instance.exports[name];
      if (typeof fn !== "function") throw new TypeError(`export '${name}' is not a function`);
      fn();
    } catch (e) {
      if (e instanceof PanicError) throw e;
      thrown = errorMessage(e);
    }
    const durationMs = performance.now() - started;
    const failures = recorder.take();
    const message = thrown ?? (failures.length > 0 ? failures.join("\n") : undefined);
    const result: TestCase = message === undefined
      ? { name, status: "passed", durationMs }
      : { name, status: "failed", message, durationMs };
    tests.push(result);
    hooks.onTestEnd?.(result);
  }

  return { tests, filteredOut };
}
