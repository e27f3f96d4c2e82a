// Shared plumbing for hosts that run a context in a separate OS process.
//
// The process speaks the child protocol as record-separated JSON lines on
// stdout. Anything else it prints (on either stream) is kept as log events of
// the `<context>#host` pseudo-context, in the order it was printed.

import { spawn } from "node:child_process";
import { createInterface } from "node:readline";
import type { Readable } from "node:stream";
import type { LogAggregator } from "../aggregator/aggregator.js";
import { ContextRecord, hostContextId, settleWithin } from "../context.js";
import { errorMessage } from "../errors/errors.js";
import { decodeLine } from "../protocol/ndjson.js";
import type { ChildMessage, LogStream } from "../protocol/messages.js";
import type { HostKind } from "../types.js";
import { BaseHostAdapter } from "./adapter.js";

export const DEFAULT_KILL_GRACE_MS = 2000;

export interface SpawnedProcess {
  readonly stdout: Readable;
  readonly stderr: Readable;
  kill(signal?: NodeJS.Signals): boolean;
  on(event: "close", listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
  on(event: "error", listener: (error: Error) => void): unknown;
}

export interface ProcessRequest {
  command: string;
  args: string[];
  cwd: string;
  env: NodeJS.ProcessEnv;
}

export type Spawner = (request: ProcessRequest) => SpawnedProcess;

export const spawnProcess: Spawner = ({ command, args, cwd, env }) => spawn(command, args, { cwd, env });

export interface SpawnedHostOptions {
  spawner?: Spawner;
  /** Time between SIGTERM and SIGKILL. */
  gracePeriodMs?: number;
}

export interface AttachHooks {
  /** Called for every stdout or stderr line before it is handled. */
  onLine?(stream: "stdout" | "stderr", line: string): void;
}

export abstract class SpawnedHostAdapter extends BaseHostAdapter {
  protected readonly spawner: Spawner;
  protected readonly gracePeriodMs: number;

  constructor(aggregator: LogAggregator, options: SpawnedHostOptions = {}) {
    super(aggregator);
    this.spawner = options.spawner ?? spawnProcess;
    this.gracePeriodMs = options.gracePeriodMs ?? DEFAULT_KILL_GRACE_MS;
  }

  /** Starts the process and wires its output into a new context record. */
  protected start(
    id: string,
    kind: HostKind,
    target: string,
    request: ProcessRequest,
    hooks: AttachHooks = {},
  ): ContextRecord {
    const child = this.spawner(request);
    const record: ContextRecord = new ContextRecord({
      id,
      kind,
      target,
      memory: "exclusive",
      aggregator: this.aggregator,
      stop: () => this.stopProcess(child, record),
    });

    const hostId = hostContextId(id);
    this.aggregator.track(hostId, id);
    let hostSeq = 0;
    const captured = (stream: LogStream, line: string): void => {
      this.aggregator.ingest({
        kind: "log",
        contextId: hostId,
        stream,
        seq: hostSeq++,
        payload: line,
        timestamp: Date.now(),
      });
    };

    readLines(child.stdout, (line) => {
      hooks.onLine?.("stdout", line);
      let message: ChildMessage | undefined;
      try {
        message = decodeLine(line);
      } catch (e) {
        record.crash(record.panicEvent(id, `ProtocolError: ${errorMessage(e)}`));
        return;
      }
      if (message === undefined) captured("stdout", line);
      else record.accept(message);
    });
    readLines(child.stderr, (line) => {
      hooks.onLine?.("stderr", line);
      captured("stderr", line);
    });

    child.on("error", (error) => {
      record.crash(record.panicEvent(id, `could not start ${request.command}: ${error.message}`));
    });
    // `close` comes after both streams have ended, so every line is in by now.
    child.on("close", (code, signal) => {
      record.lose(`exited (${signal ?? `code ${code ?? "unknown"}`}) before reporting a result`);
    });
    return record;
  }

  private async stopProcess(child: SpawnedProcess, record: ContextRecord): Promise<void> {
    child.kill("SIGTERM");
    if (!(await settleWithin(record.done, this.gracePeriodMs))) child.kill("SIGKILL");
  }
}

function readLines(stream: Readable, onLine: (line: string) => void): void {
  const lines = createInterface({ input: stream, crlfDelay: Infinity });
  lines.on("line", onLine);
}
