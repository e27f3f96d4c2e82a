import type { TransferListItem } from "node:worker_threads";

/**
 * One end of a duplex message channel. Incoming data is `unknown` until the
 * receiver validates it against the message schema.
 */
export interface Channel<Out> {
  send(message: Out): void;
  /** Returns a function that removes the listener. */
  listen(listener: (data: unknown) => void): () => void;
  close(): void;
}

/** What a `MessagePort`, `parentPort` and `Worker` have in common. */
export interface PortLike {
  postMessage(value: unknown, transferList?: readonly TransferListItem[]): void;
  on(event: "message", listener: (value: unknown) => void): unknown;
  off(event: "message", listener: (value: unknown) => void): unknown;
  close?(): void;
}

export function portChannel<Out>(port: PortLike): Channel<Out> {
  return {
    send(message) {
      port.postMessage(message);
    },
    listen(listener) {
      port.on("message", listener);
      return () => {
        port.off("message", listener);
      };
    },
    close() {
      port.close?.();
    },
  };
}
