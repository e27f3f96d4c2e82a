import { Worker, type WorkerOptions } from "node:worker_threads";
import type { ParentMessage } from "../protocol/messages.js";
import { portChannel, type Channel } from "./channel.js";

/** A running thread as the orchestrator sees it. */
export interface WorkerHandle {
  readonly channel: Channel<ParentMessage>;
  onError(listener: (error: Error) => void): void;
  onExit(listener: (code: number) => void): void;
  /** Stops the thread and resolves once it is gone. Never rejects. */
  terminate(): Promise<void>;
  /** Stops the thread without waiting. */
  kill(): void;
}

export interface WorkerFactory {
  create(): WorkerHandle;
}

const DEFAULT_ENTRY = new URL("./entry.js", import.meta.url);

/** Threads backed by `node:worker_threads`, running the child runtime. */
export class NodeWorkerFactory implements WorkerFactory {
  constructor(
    private readonly entry: URL = DEFAULT_ENTRY,
    private readonly options: WorkerOptions = {},
  ) {}

  create(): WorkerHandle {
    const worker = new Worker(this.entry, this.options);
    const stop = (): Promise<void> =>
      worker.terminate().then(
        () => undefined,
        (error: unknown) => {
          worker.emit("error", error instanceof Error ? error : new Error(String(error)));
        },
      );

    return {
      channel: portChannel(worker),
      onError(listener) {
        worker.on("error", listener);
      },
      onExit(listener) {
        worker.on("exit", listener);
      },
      terminate: stop,
      kill() {
        void stop();
      },
    };
  }
}
