import type { RunResult } from "./types";

/** A page snapshot could not be obtained from the operator or from disk. */
export class PageUnavailableError extends Error {
  constructor(
    message: string,
    readonly page: "case-status" | "cause-list"
  ) {
    super(message);
    this.name = "PageUnavailableError";
  }
}

/**
 * Raised by the run orchestrator. `partial` holds whatever was extracted
 * before the failure so it can still be saved.
 */
export class RunFailedError extends Error {
  constructor(
    message: string,
    readonly partial: RunResult,
    cause?: unknown
  ) {
    super(message, { cause });
    this.name = "RunFailedError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
