import { describe, it, expect } from "vitest";
import { BootstrapLoader } from "../../src/bootstrap/loader.js";
import type { ChildMessage } from "../../src/protocol/messages.js";
import type { Channel } from "../../src/worker/channel.js";
import { runChild } from "../../src/worker/child.js";
import { ChildSession, type ConsoleTarget } from "../../src/worker/session.js";
import { fixtureModule } from "../helpers/wasm.js";
import { silentConsole } from "../helpers/workers.js";

function startSession(name: string, extra: { entry?: string; filter?: string; console?: ConsoleTarget } = {}) {
  const posted: ChildMessage[] = [];
  const session = new ChildSession(
    { contextId: "s-1", module: fixtureModule(name), entry: extra.entry, filter: extra.filter },
    { post: (message) => posted.push(message), console: extra.console ?? silentConsole },
  );
  return { session, posted };
}

function logPayloads(posted: ChildMessage[]): string[] {
  return posted.flatMap((message) => (message.type === "log" ? message.events.map((event) => event.payload) : []));
}

describe("ChildSession", () => {
  it("reports ready, output and the result in that order", async () => {
    const { session, posted } = startSession("basic");
    expect(await session.run()).toBe("completed");
    expect(posted.map((message) => message.type)).toEqual(["ready", "log", "result"]);
    expect(logPayloads(posted)).toEqual(["hello from wasm"]);

    const result = posted[2];
    expect(result.type === "result" && result.tests.map((test) => test.status)).toEqual([
      "passed",
      "passed",
      "failed",
      "failed",
    ]);
  });

  it("reports filtered tests", async () => {
    const { session, posted } = startSession("basic", { filter: "logs" });
    await session.run();
    const result = posted[posted.length - 1];
    expect(result.type === "result" && [result.tests.length, result.filteredOut]).toEqual([1, 3]);
  });

  it("reports a failed start routine as fatal", async () => {
    const { session, posted } = startSession("failing-start");
    expect(await session.run()).toBe("crashed");
    expect(posted).toHaveLength(1);
    const fatal = posted[0];
    expect(fatal.type).toBe("fatal");
    expect(fatal.type === "fatal" && fatal.name).toBe("InstantiationError");
  });

  it("flushes output ahead of a panic and stops there", async () => {
    const { session, posted } = startSession("panics");
    expect(await session.run()).toBe("crashed");
    expect(posted.map((message) => message.type)).toEqual(["ready", "log", "panic"]);
    const panic = posted[2];
    expect(panic.type === "panic" && [panic.origin, panic.message]).toEqual(["s-1", "boom"]);
  });

  it("panics when a test spawns a thread and no factory is available", async () => {
    const { session, posted } = startSession("threads");
    expect(await session.run()).toBe("crashed");
    const panic = posted[posted.length - 1];
    expect(panic.type === "panic" && panic.message).toBe("nested workers are not available in context s-1");
    expect(logPayloads(posted)).toEqual(["root log"]);
  });

  it("runs a thread entry instead of tests", async () => {
    const { session, posted } = startSession("doctest", { entry: "main" });
    expect(await session.run()).toBe("completed");
    expect(posted[posted.length - 1]).toEqual({ type: "result", contextId: "s-1", tests: [], filteredOut: 0 });
    const log = posted.find((message) => message.type === "log");
    expect(log?.type === "log" && log.events[0].stream).toBe("info");
  });

  it("panics on a missing thread entry", async () => {
    const { session, posted } = startSession("basic", { entry: "nope" });
    expect(await session.run()).toBe("crashed");
    const panic = posted[posted.length - 1];
    expect(panic.type === "panic" && panic.message).toBe("thread entry 'nope' is not an exported function");
  });

  it("captures console output while tests run", async () => {
    const original = (): void => undefined;
    const target: ConsoleTarget = { ...silentConsole, info: original };
    const posted: ChildMessage[] = [];
    const session = new ChildSession(
      { contextId: "s-2", module: fixtureModule("basic"), filter: "test_passes", exact: true },
      {
        post: (message) => posted.push(message),
        console: target,
        initialize: async (options) => {
          const real = await new BootstrapLoader().initialize(options);
          return {
            ...real,
            exports: {
              ...real.exports,
              test_passes: () => target.info("captured %s", "line"),
            },
          };
        },
      },
    );

    expect(await session.run()).toBe("completed");
    const log = posted.find((message) => message.type === "log");
    expect(log?.type === "log" && log.events.map((event) => [event.stream, event.payload])).toEqual([
      ["info", "captured line"],
    ]);
    expect(target.info).toBe(original);
  });

  it("reports nothing after it was closed", async () => {
    const { session, posted } = startSession("basic");
    session.close();
    expect(await session.run()).toBe("closed");
    expect(posted).toEqual([]);
  });
});

describe("runChild", () => {
  function fakeChannel() {
    const sent: ChildMessage[] = [];
    let deliver: (data: unknown) => void = () => undefined;
    const channel: Channel<ChildMessage> = {
      send: (message) => sent.push(message),
      listen: (listener) => {
        deliver = listener;
        return () => {
          deliver = () => undefined;
        };
      },
      close: () => undefined,
    };
    return { channel, sent, deliver: (data: unknown) => deliver(data) };
  }

  it("acknowledges installation", () => {
    const { channel, sent, deliver } = fakeChannel();
    runChild(channel, { console: silentConsole });
    deliver({ type: "install" });
    expect(sent).toEqual([{ type: "activated" }]);
  });

  it("answers a malformed message with a protocol failure", () => {
    const { channel, sent, deliver } = fakeChannel();
    runChild(channel, { console: silentConsole });
    deliver({ type: "spawn", contextId: "c-9" });
    expect(sent).toHaveLength(1);
    const fatal = sent[0];
    expect(fatal.type === "fatal" && [fatal.contextId, fatal.name]).toEqual(["c-9", "ProtocolError"]);
  });

  it("confirms termination even for contexts it never ran", () => {
    const { channel, sent, deliver } = fakeChannel();
    runChild(channel, { console: silentConsole });
    deliver({ type: "terminate", contextId: "c-3" });
    expect(sent).toEqual([{ type: "closed", contextId: "c-3" }]);
  });

  it("runs a spawned session to its result", async () => {
    const { channel, sent, deliver } = fakeChannel();
    runChild(channel, { console: silentConsole });
    deliver({ type: "spawn", contextId: "c-4", module: fixtureModule("doctest") });
    await expect.poll(() => sent.some((message) => message.type === "result")).toBe(true);
    expect(sent.map((message) => message.type)).toEqual(["ready", "log", "result"]);
  });

  it("stops listening once disposed", () => {
    const { channel, sent, deliver } = fakeChannel();
    const stop = runChild(channel, { console: silentConsole });
    stop();
    deliver({ type: "install" });
    expect(sent).toEqual([]);
  });
});
