import { ConfigurationError } from "../errors/errors.js";
import type { AggregateReport, RunStatus, TestRunResult } from "../types.js";

/** Higher is worse. */
export const STATUS_RANK: Record<RunStatus, number> = {
  passed: 0,
  failed: 1,
  "timed-out": 2,
  crashed: 3,
};

export const EXIT_CODES: Record<RunStatus, number> = {
  passed: 0,
  failed: 1,
  "timed-out": 124,
  crashed: 101,
};

/** Exit code for invalid settings, which stop the run before anything starts. */
export const CONFIG_EXIT_CODE = 2;

/** Exit code for an error that escapes the run itself, such as an unreadable module file. */
export const INTERNAL_EXIT_CODE = 3;

export function exitCodeForError(e: unknown): number {
  return e instanceof ConfigurationError ? CONFIG_EXIT_CODE : INTERNAL_EXIT_CODE;
}

export function worstStatus(statuses: Iterable<RunStatus>): RunStatus {
  let worst: RunStatus = "passed";
  for (const status of statuses) {
    if (STATUS_RANK[status] > STATUS_RANK[worst]) worst = status;
  }
  return worst;
}

export function buildReport(results: TestRunResult[]): AggregateReport {
  const counts: Record<RunStatus, number> = { passed: 0, failed: 0, "timed-out": 0, crashed: 0 };
  for (const result of results) counts[result.status]++;
  const status = worstStatus(results.map((result) => result.status));
  return { results, status, exitCode: EXIT_CODES[status], counts };
}
