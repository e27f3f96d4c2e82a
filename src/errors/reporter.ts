import chalk, { Chalk, type ChalkInstance } from "chalk";
import type { AggregateReport, MergedEvent, OutputSink, TestRunResult } from "../types.js";

export interface ReporterOptions {
  /** Stream events live instead of replaying them for targets that did not pass. */
  nocapture?: boolean;
  json?: boolean;
}

/** Colors for a sink: none at all unless it is a terminal. */
export function colorsFor(sink: OutputSink): ChalkInstance {
  return new Chalk({ level: sink.isTTY ? chalk.level : 0 });
}

export function formatEvent(event: MergedEvent): string {
  if (event.kind === "panic") {
    return `[${event.contextId}] panicked: ${event.message}`;
  }
  return `[${event.contextId}] ${event.stream}: ${event.payload}`;
}

export function formatStatus(result: TestRunResult, c: ChalkInstance): string {
  switch (result.status) {
    case "passed":
      return c.green("ok");
    case "failed":
      return c.red("FAILED");
    case "timed-out":
      return c.yellow("TIMED OUT");
    case "crashed":
      return c.red.bold("CRASHED");
  }
}

export function formatResult(result: TestRunResult, c: ChalkInstance, showEvents: boolean): string {
  let output = `target ${c.bold(result.target)} (${result.kind}) ... ${formatStatus(result, c)} (${Math.round(result.durationMs)}ms)\n`;
  for (const test of result.tests) {
    const status = test.status === "passed" ? c.green("ok") : c.red("FAILED");
    output += `test ${test.name} ... ${status}\n`;
    if (test.message !== undefined) {
      output += test.message
        .split("\n")
        .map((line) => `    ${line}\n`)
        .join("");
    }
  }
  if (result.error !== undefined) {
    output += `    ${c.red("error")}: ${result.error}\n`;
  }
  if (showEvents && result.events.length > 0) {
    output += `${c.dim(`---- ${result.target} output ----`)}\n`;
    output += result.events.map((event) => `${formatEvent(event)}\n`).join("");
  }
  return output;
}

export function formatSummary(report: AggregateReport, c: ChalkInstance): string {
  let passed = 0;
  let failed = 0;
  let filteredOut = 0;
  for (const result of report.results) {
    filteredOut += result.filteredOut;
    for (const test of result.tests) {
      if (test.status === "passed") passed++;
      else failed++;
    }
  }
  const verdict = report.status === "passed" ? c.green("ok") : c.red("FAILED");
  return (
    `test result: ${verdict}. ${passed} passed; ${failed} failed; ` +
    `${report.counts["timed-out"]} timed out; ${report.counts.crashed} crashed; ${filteredOut} filtered out\n`
  );
}

/**
 * Writes the human-readable run report. With `nocapture`, events are written
 * as they arrive and never repeated; otherwise a target's events are shown
 * only when it did not pass.
 */
export class Reporter {
  private readonly c: ChalkInstance;

  constructor(
    private readonly sink: OutputSink,
    private readonly options: ReporterOptions = {},
  ) {
    this.c = colorsFor(sink);
  }

  start(targets: number): void {
    if (this.options.json) return;
    this.sink.write(`running ${targets} ${targets === 1 ? "target" : "targets"}\n`);
  }

  event(event: MergedEvent): void {
    if (this.options.json || !this.options.nocapture) return;
    this.sink.write(`${formatEvent(event)}\n`);
  }

  result(result: TestRunResult): void {
    if (this.options.json) return;
    const showEvents = !this.options.nocapture && result.status !== "passed";
    this.sink.write(formatResult(result, this.c, showEvents));
  }

  finish(report: AggregateReport): void {
    if (this.options.json) {
      this.sink.write(`${JSON.stringify(report, null, 2)}\n`);
      return;
    }
    this.sink.write(`\n${formatSummary(report, this.c)}`);
  }
}
