// Error taxonomy shared by every component of the harness.
//
// Only ConfigurationError is process-fatal. Everything else is local to one
// target: the scheduler turns it into a TestRunResult and moves on.

export type HarnessErrorCode =
  | "E_CONFIG"
  | "E_INSTANTIATE"
  | "E_TIMEOUT"
  | "E_PANIC"
  | "E_CHANNEL_LOSS"
  | "E_PROTOCOL";

export abstract class HarnessError extends Error {
  abstract readonly code: HarnessErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Invalid settings, raised before any side effect happens. */
export class ConfigurationError extends HarnessError {
  readonly code = "E_CONFIG";
}

/** Malformed module, link failure, or a failing start routine. */
export class InstantiationError extends HarnessError {
  readonly code = "E_INSTANTIATE";
}

export class TimeoutError extends HarnessError {
  readonly code = "E_TIMEOUT";

  constructor(readonly timeoutMs: number, what = "execution context") {
    super(`${what} did not finish within ${timeoutMs}ms`);
  }
}

/**
 * Uncaught error inside a context. Thrown from the `harness.panic` import and
 * synthesized from uncaught worker errors.
 */
export class PanicError extends HarnessError {
  readonly code = "E_PANIC";

  constructor(message: string, readonly panicStack?: string) {
    super(message);
  }
}

/** A context went away without sending its final message. */
export class ChannelLossError extends HarnessError {
  readonly code = "E_CHANNEL_LOSS";
}

/** A message failed schema validation at a channel boundary. */
export class ProtocolError extends HarnessError {
  readonly code = "E_PROTOCOL";
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
