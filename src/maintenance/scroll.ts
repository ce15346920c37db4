import { scrollBy, send } from "../cdp/commands.js";
import { attempt } from "../utils/result.js";
import type { RoutineContext, RoutineExit } from "./routine.js";

export interface ScrollRoutineOptions extends RoutineContext {
  offsetPx: number;
  nextDelayMs: () => number;
}

/**
 * Nudges the page down by a fixed offset at human-looking intervals until the
 * session stops. A failed scroll ends this routine only.
 */
export async function runScrollRoutine(options: ScrollRoutineOptions): Promise<RoutineExit> {
  const { sender, lifecycle, logger } = options;
  const command = scrollBy(options.offsetPx);
  let scrolls = 0;

  while (!lifecycle.isStopped()) {
    const running = await lifecycle.sleep(options.nextDelayMs());
    if (!running) {
      break;
    }

    const result = await attempt(() => send(sender, command), "Auto-scroll failed");
    if (!result.ok) {
      logger.warn(
        { event: "scroll_failed", errorCode: result.error.code, details: result.error.details, scrolls },
        result.error.message,
      );
      return "failed";
    }
    scrolls += 1;
  }

  logger.debug({ event: "scroll_stopped", scrolls }, "scroll_stopped");
  return "stopped";
}
