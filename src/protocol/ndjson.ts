import { ProtocolError } from "../errors/errors.js";
import { parseChildMessage, type ChildMessage } from "./messages.js";

// Framing for messages on a child process's stdout. Each message is one line
// prefixed with an ASCII record separator (RFC 7464 JSON text sequences), so
// protocol lines can never be confused with whatever else the process prints.

export const RECORD_SEPARATOR = "\u001e";

export function encodeMessage(message: ChildMessage): string {
  return `${RECORD_SEPARATOR}${JSON.stringify(message)}\n`;
}

/** Returns `undefined` for lines that are not protocol records. */
export function decodeLine(line: string): ChildMessage | undefined {
  if (!line.startsWith(RECORD_SEPARATOR)) return undefined;
  let data: unknown;
  try {
    data = JSON.parse(line.slice(RECORD_SEPARATOR.length));
  } catch (e) {
    throw new ProtocolError(`malformed protocol record: ${e instanceof Error ? e.message : String(e)}`);
  }
  return parseChildMessage(data);
}
