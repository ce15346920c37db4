import type { HarvestError } from "../errors.js";
import type { ExtractionRun } from "../extract/poller.js";

export interface FailureReport {
  level: "warn" | "error";
  event: "harvest_interrupted" | "harvest_failed";
  message: string;
  exitCode: number;
}

export function exitCodeForRun(run: Pick<ExtractionRun, "success">): number {
  return run.success ? 0 : 2;
}

/**
 * A failure caused by the user interrupting the session is a clean stop;
 * anything else is fatal.
 */
export function reportFailure(error: HarvestError, interrupted: boolean): FailureReport {
  if (interrupted) {
    return { level: "warn", event: "harvest_interrupted", message: "Stopped by user.", exitCode: 0 };
  }
  return { level: "error", event: "harvest_failed", message: error.message, exitCode: 1 };
}
