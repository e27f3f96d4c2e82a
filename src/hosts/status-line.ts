import chalk from "chalk";
import type { OutputSink } from "../types.js";

const CLEAR_LINE = "\r\u001b[2K";

/**
 * A single rewritable progress line. Only terminals get one; any other sink
 * receives nothing at all, so piped output carries no `\r` or escapes.
 */
export class StatusLine {
  private visible = false;

  constructor(private readonly sink: OutputSink) {}

  get shown(): boolean {
    return this.visible;
  }

  show(text: string): void {
    if (!this.sink.isTTY) return;
    this.sink.write(`${CLEAR_LINE}${chalk.dim(text)}`);
    this.visible = true;
  }

  clear(): void {
    if (!this.visible) return;
    this.sink.write(CLEAR_LINE);
    this.visible = false;
  }
}
