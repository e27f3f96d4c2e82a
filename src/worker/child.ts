import { errorMessage } from "../errors/errors.js";
import {
  contextIdOf,
  parseParentMessage,
  type ChildMessage,
  type ParentMessage,
} from "../protocol/messages.js";
import type { Channel } from "./channel.js";
import type { WorkerFactory } from "./factory.js";
import { ChildSession, type ConsoleTarget } from "./session.js";

export interface ChildOptions {
  factory?: WorkerFactory;
  console?: ConsoleTarget;
}

/**
 * Serves one worker thread. A dedicated worker sees a single `spawn`; shared
 * and service workers host one session per context routed to them.
 */
export function runChild(channel: Channel<ChildMessage>, options: ChildOptions = {}): () => void {
  const sessions = new Map<string, ChildSession>();
  const post = (message: ChildMessage) => channel.send(message);

  const handle = (message: ParentMessage): void => {
    switch (message.type) {
      case "install":
        post({ type: "activated" });
        return;
      case "spawn": {
        const { type: _type, ...request } = message;
        const session = new ChildSession(request, { post, factory: options.factory, console: options.console });
        sessions.set(message.contextId, session);
        session.run().then(
          () => sessions.delete(message.contextId),
          (e: unknown) => {
            sessions.delete(message.contextId);
            post({ type: "panic", contextId: message.contextId, origin: message.contextId, message: errorMessage(e) });
          },
        );
        return;
      }
      case "terminate":
        sessions.get(message.contextId)?.close();
        sessions.delete(message.contextId);
        post({ type: "closed", contextId: message.contextId });
        return;
    }
  };

  return channel.listen((data) => {
    let message: ParentMessage;
    try {
      message = parseParentMessage(data);
    } catch (e) {
      post({ type: "fatal", contextId: contextIdOf(data) ?? "", name: "ProtocolError", message: errorMessage(e) });
      return;
    }
    handle(message);
  });
}
