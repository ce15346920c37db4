import {
  activateTarget,
  bringToFront,
  type CdpCommand,
  send,
  setFocusEmulationEnabled,
  setIdleOverride,
  setWebLifecycleState,
} from "../cdp/commands.js";
import type { CommandSender } from "../cdp/client.js";
import { attempt, type Result } from "../utils/result.js";
import type { RoutineContext, RoutineExit } from "./routine.js";

export interface FocusKeeperOptions extends RoutineContext {
  targetId: string;
  intervalMs: number;
}

export function activeStateSequence(): CdpCommand[] {
  return [
    setFocusEmulationEnabled(true),
    setWebLifecycleState("active"),
    setIdleOverride(true, true),
  ];
}

/**
 * Makes the page believe it is focused, visible and in use. Stops at the
 * first failing command.
 */
export function enforceActiveState(sender: CommandSender): Promise<Result<void>> {
  return attempt(async () => {
    for (const command of activeStateSequence()) {
      await send(sender, command);
    }
  }, "Active-state enforcement failed");
}

export async function runFocusKeeper(options: FocusKeeperOptions): Promise<RoutineExit> {
  const { sender, lifecycle, logger } = options;
  let cycles = 0;

  while (!lifecycle.isStopped()) {
    const raised = await attempt(async () => {
      await send(sender, activateTarget(options.targetId));
      await send(sender, bringToFront());
    }, "Keep-focus failed");
    const enforced = raised.ok ? await enforceActiveState(sender) : raised;

    if (!enforced.ok) {
      logger.warn(
        { event: "focus_failed", errorCode: enforced.error.code, details: enforced.error.details, cycles },
        enforced.error.message,
      );
      return "failed";
    }
    cycles += 1;

    const running = await lifecycle.sleep(options.intervalMs);
    if (!running) {
      break;
    }
  }

  logger.debug({ event: "focus_stopped", cycles }, "focus_stopped");
  return "stopped";
}
