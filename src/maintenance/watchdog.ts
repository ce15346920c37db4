import { attempt } from "../utils/result.js";
import type { RoutineContext, RoutineExit } from "./routine.js";

export interface IdleWatchdogOptions extends Omit<RoutineContext, "sender"> {
  lastActivityAt: () => number;
  close: () => Promise<void>;
  idleTimeoutMs: number;
  checkIntervalMs: number;
  description: string;
  onTimeout?: (reason: string) => void;
  now?: () => number;
}

export function describeIdleTimeout(idleTimeoutMs: number, description: string): string {
  return `${Math.floor(idleTimeoutMs / 1000)}s without ${description}`;
}

/**
 * Ends the session once nothing has happened for `idleTimeoutMs`: notifies,
 * sets the stop flag, then closes the channel so suspended calls unblock.
 */
export async function runIdleWatchdog(options: IdleWatchdogOptions): Promise<RoutineExit> {
  const { lifecycle, logger } = options;
  const now = options.now ?? (() => Date.now());

  while (!lifecycle.isStopped()) {
    const running = await lifecycle.sleep(options.checkIntervalMs);
    if (!running) {
      break;
    }

    const idleMs = now() - options.lastActivityAt();
    if (idleMs < options.idleTimeoutMs) {
      continue;
    }

    const reason = describeIdleTimeout(options.idleTimeoutMs, options.description);
    if (options.onTimeout) {
      try {
        options.onTimeout(reason);
      } catch (error) {
        logger.warn(
          { event: "idle_timeout_callback_failed", error: error instanceof Error ? error.message : String(error) },
          "idle_timeout_callback_failed",
        );
      }
    }

    logger.warn({ event: "idle_timeout", idleMs, idleTimeoutMs: options.idleTimeoutMs }, `Stopping: ${reason}`);
    lifecycle.stop(reason);

    const closed = await attempt(options.close, "Failed to close control channel");
    if (!closed.ok) {
      logger.debug(
        { event: "idle_timeout_close_failed", errorCode: closed.error.code },
        "idle_timeout_close_failed",
      );
    }
    return "fired";
  }

  logger.debug({ event: "watchdog_stopped" }, "watchdog_stopped");
  return "stopped";
}
