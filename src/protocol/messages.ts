import { z } from "zod";
import { ProtocolError } from "../errors/errors.js";

// Closed message schema spoken on every channel: worker ports, and NDJSON lines
// on a child process's stdout. Both ends validate what they receive.

export const LOG_STREAMS = ["stdout", "stderr", "debug", "log", "info", "warn", "error"] as const;
export const CONSOLE_LEVELS = ["debug", "log", "info", "warn", "error"] as const;

export const logStreamSchema = z.enum(LOG_STREAMS);
export type LogStream = z.infer<typeof logStreamSchema>;
export type ConsoleLevel = (typeof CONSOLE_LEVELS)[number];

export const logEventSchema = z.object({
  kind: z.literal("log"),
  contextId: z.string().min(1),
  stream: logStreamSchema,
  seq: z.number().int().nonnegative(),
  payload: z.string(),
  timestamp: z.number(),
});
export type LogEvent = z.infer<typeof logEventSchema>;

export const panicEventSchema = z.object({
  kind: z.literal("panic"),
  contextId: z.string().min(1),
  message: z.string(),
  stack: z.string().optional(),
  timestamp: z.number(),
});
export type PanicEvent = z.infer<typeof panicEventSchema>;

export type HarnessEvent = LogEvent | PanicEvent;

export const testCaseSchema = z.object({
  name: z.string(),
  status: z.enum(["passed", "failed"]),
  message: z.string().optional(),
  durationMs: z.number().nonnegative(),
});
export type TestCase = z.infer<typeof testCaseSchema>;

// ─── parent → child ──────────────────────────────────────────────────────────

const installMessage = z.object({ type: z.literal("install") });

const spawnMessage = z.object({
  type: z.literal("spawn"),
  contextId: z.string().min(1),
  module: z.instanceof(WebAssembly.Module),
  memory: z.instanceof(WebAssembly.Memory).optional(),
  threadStackSize: z.number().optional(),
  filter: z.string().optional(),
  exact: z.boolean().optional(),
  /** Run this export as a thread body instead of discovering tests. */
  entry: z.string().optional(),
});

const terminateMessage = z.object({
  type: z.literal("terminate"),
  contextId: z.string().min(1),
});

export const parentMessageSchema = z.discriminatedUnion("type", [
  installMessage,
  spawnMessage,
  terminateMessage,
]);
export type ParentMessage = z.infer<typeof parentMessageSchema>;
export type SpawnMessage = z.infer<typeof spawnMessage>;

// ─── child → parent ──────────────────────────────────────────────────────────
// `contextId` is the routing key: the session that sent the message. Events
// and panics name their originating context separately, which differs when a
// session relays for a nested worker.

export const childMessageSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("activated") }),
  z.object({ type: z.literal("ready"), contextId: z.string() }),
  z.object({ type: z.literal("log"), contextId: z.string(), events: z.array(logEventSchema) }),
  z.object({
    type: z.literal("context"),
    contextId: z.string(),
    origin: z.string().min(1),
    parentId: z.string().min(1),
  }),
  z.object({
    type: z.literal("panic"),
    contextId: z.string(),
    origin: z.string().min(1),
    message: z.string(),
    stack: z.string().optional(),
  }),
  z.object({
    type: z.literal("fatal"),
    contextId: z.string(),
    name: z.string(),
    message: z.string(),
  }),
  z.object({
    type: z.literal("result"),
    contextId: z.string(),
    tests: z.array(testCaseSchema),
    filteredOut: z.number().int().nonnegative(),
  }),
  z.object({ type: z.literal("closed"), contextId: z.string() }),
]);
export type ChildMessage = z.infer<typeof childMessageSchema>;

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
    .join("; ");
}

export function parseParentMessage(data: unknown): ParentMessage {
  const parsed = parentMessageSchema.safeParse(data);
  if (!parsed.success) {
    throw new ProtocolError(`invalid parent message: ${describeIssues(parsed.error)}`);
  }
  return parsed.data;
}

export function parseChildMessage(data: unknown): ChildMessage {
  const parsed = childMessageSchema.safeParse(data);
  if (!parsed.success) {
    throw new ProtocolError(`invalid child message: ${describeIssues(parsed.error)}`);
  }
  return parsed.data;
}

/** Best-effort routing key of a message that failed validation. */
export function contextIdOf(data: unknown): string | undefined {
  if (typeof data === "object" && data !== null && "contextId" in data) {
    const id = data.contextId;
    return typeof id === "string" ? id : undefined;
  }
  return undefined;
}
