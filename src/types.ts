import type {
  HarnessEvent,
  LogEvent,
  LogStream,
  PanicEvent,
  TestCase,
} from "./protocol/messages.js";

export type { HarnessEvent, LogEvent, LogStream, PanicEvent, TestCase };

export const HOST_KINDS = [
  "node",
  "deno",
  "browser",
  "dedicated-worker",
  "shared-worker",
  "service-worker",
] as const;
export type HostKind = (typeof HOST_KINDS)[number];

export const WORKER_KINDS = ["dedicated-worker", "shared-worker", "service-worker"] as const;
export type WorkerKind = (typeof WORKER_KINDS)[number];

export function isHostKind(value: string): value is HostKind {
  return HOST_KINDS.some((kind) => kind === value);
}

export function isWorkerKind(kind: HostKind): kind is WorkerKind {
  return WORKER_KINDS.some((workerKind) => workerKind === kind);
}

export type RunStatus = "passed" | "failed" | "timed-out" | "crashed";

export type MergedEvent = HarnessEvent & {
  /** Position in the merged timeline across all contexts. */
  arrival: number;
  /** Tracked target context the event is reported under. */
  root: string;
};

export type ContextOutcome =
  | { type: "completed"; tests: TestCase[]; filteredOut: number }
  | { type: "crashed"; panic: PanicEvent }
  | { type: "terminated" };

export type ContextState = "starting" | "running" | "finished";

export interface ExecutionContext {
  readonly id: string;
  readonly kind: HostKind;
  readonly target: string;
  readonly memory: "exclusive" | "shared";
  readonly startedAt: number;
  readonly state: ContextState;
  /** `true` once the child acknowledged readiness, `false` if it ended first. */
  readonly ready: Promise<boolean>;
  readonly done: Promise<ContextOutcome>;
  terminate(): Promise<void>;
}

export interface TargetConfig {
  name: string;
  kind: HostKind;
  /** Path of the compiled module on disk. */
  wasmPath: string;
  /** Precompiled module, shared with worker targets when present. */
  module?: WebAssembly.Module;
  /** Shared memory handed to the instance (and to every nested worker). */
  memory?: WebAssembly.Memory;
  threadStackSize?: number;
  filter?: string;
  exact?: boolean;
}

export interface TestRunResult {
  contextId: string;
  target: string;
  kind: HostKind;
  status: RunStatus;
  durationMs: number;
  events: MergedEvent[];
  tests: TestCase[];
  filteredOut: number;
  error?: string;
}

export interface AggregateReport {
  results: TestRunResult[];
  status: RunStatus;
  exitCode: number;
  counts: Record<RunStatus, number>;
}

/** Where human-readable and structured output goes. */
export interface OutputSink {
  readonly isTTY: boolean;
  write(text: string): void;
}
