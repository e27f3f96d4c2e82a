#!/usr/bin/env node
import { Command } from "commander";
import binaryen from "binaryen";
import { readFile } from "node:fs/promises";
import path from "node:path";
import { DEFAULT_MEMORY_MAXIMUM_PAGES } from "./bootstrap/imports.js";
import { ownedBytes } from "./bootstrap/loader.js";
import { loadConfig, parseTimeoutSeconds } from "./config.js";
import { ConfigurationError, errorMessage } from "./errors/errors.js";
import { createHarness, defaultKind } from "./harness.js";
import { exitCodeForError } from "./scheduler/report.js";
import { discoverTests } from "./runner/test-runner.js";
import { isHostKind, type HostKind, type OutputSink, type TargetConfig } from "./types.js";

interface RunOptions {
  target?: string[];
  timeout?: string;
  nocapture?: boolean;
  exact?: boolean;
  json?: boolean;
  sharedMemory?: string;
  threadStackSize?: string;
}

interface ListOptions {
  emitWat?: boolean;
}

const stdoutSink: OutputSink = {
  isTTY: process.stdout.isTTY === true,
  write(text) {
    process.stdout.write(text);
  },
};

function parseKinds(values: string[] | undefined, fallback: HostKind): HostKind[] {
  if (!values || values.length === 0) return [fallback];
  return values.map((value) => {
    if (!isHostKind(value)) throw new ConfigurationError(`unknown target kind '${value}'`);
    return value;
  });
}

function parseInteger(value: string, what: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) throw new ConfigurationError(`invalid ${what} '${value}': expected an integer`);
  return parsed;
}

function sharedMemory(pages: string | undefined): WebAssembly.Memory | undefined {
  if (pages === undefined) return undefined;
  const initial = parseInteger(pages, "shared memory size");
  if (initial < 1 || initial > DEFAULT_MEMORY_MAXIMUM_PAGES) {
    throw new ConfigurationError(`invalid shared memory size ${initial}: expected 1..${DEFAULT_MEMORY_MAXIMUM_PAGES} pages`);
  }
  return new WebAssembly.Memory({ initial, maximum: DEFAULT_MEMORY_MAXIMUM_PAGES, shared: true });
}

function fail(e: unknown): never {
  console.error(`Error: ${errorMessage(e)}`);
  process.exit(exitCodeForError(e));
}

const program = new Command()
  .name("wasmtest")
  .description("Run the unit tests a WebAssembly module exports, across Node.js, Deno, browsers and workers")
  .version("0.1.0");

program
  .command("run <file> [filter]")
  .description("Run the module's tests on one or more targets")
  .option("-t, --target <kind...>", "Targets: node, deno, browser, dedicated-worker, shared-worker, service-worker")
  .option("--timeout <seconds>", "Per-target timeout (default: WASMTEST_TIMEOUT or 20)")
  .option("--nocapture", "Print test output as it happens")
  .option("--exact", "Match the filter against whole test names")
  .option("--json", "Output the report as JSON for machine consumption")
  .option("--shared-memory <pages>", "Share one memory of this many pages with worker targets")
  .option("--thread-stack-size <bytes>", "Stack size for each thread, a multiple of 65536")
  .action(async (file: string, filter: string | undefined, opts: RunOptions) => {
    let exitCode: number;
    try {
      const env = loadConfig();
      const config = {
        ...env,
        timeoutMs: opts.timeout === undefined ? env.timeoutMs : parseTimeoutSeconds(opts.timeout),
        nocapture: opts.nocapture === true || env.nocapture,
      };
      const kinds = parseKinds(opts.target, defaultKind(config));
      const memory = sharedMemory(opts.sharedMemory);
      const threadStackSize =
        opts.threadStackSize === undefined ? undefined : parseInteger(opts.threadStackSize, "thread stack size");

      const wasmPath = path.resolve(file);
      const targets: TargetConfig[] = kinds.map((kind) => ({
        name: kinds.length === 1 ? path.basename(file) : `${path.basename(file)}@${kind}`,
        kind,
        wasmPath,
        memory,
        threadStackSize,
        filter,
        exact: opts.exact === true,
      }));

      const harness = createHarness({ sink: stdoutSink, config, json: opts.json === true });
      try {
        const report = await harness.run(targets);
        exitCode = report.exitCode;
      } finally {
        await harness.dispose();
      }
    } catch (e) {
      fail(e);
    }
    process.exit(exitCode);
  });

program
  .command("list <file>")
  .description("List the tests a module exports")
  .option("--emit-wat", "Print the module in WebAssembly text format instead")
  .action(async (file: string, opts: ListOptions) => {
    try {
      const bytes = ownedBytes(await readFile(file));
      if (opts.emitWat) {
        const mod = binaryen.readBinary(bytes);
        try {
          console.log(mod.emitText());
        } finally {
          mod.dispose();
        }
        return;
      }

      const module = await WebAssembly.compile(bytes);
      const { names, doctest } = discoverTests(module);
      for (const name of names) console.log(`${name}: ${doctest ? "doctest" : "test"}`);
      console.log(`\n${names.length} ${names.length === 1 ? "test" : "tests"}`);
    } catch (e) {
      fail(e);
    }
  });

await program.parseAsync(process.argv);
