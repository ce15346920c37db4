import type { CommandSender } from "../cdp/client.js";
import { callPageFunction, type CdpCommand, dispatchMouseEvent, send } from "../cdp/commands.js";
import { HarvestError } from "../errors.js";
import type { SessionLifecycle } from "../session/lifecycle.js";
import { attempt, type Result } from "../utils/result.js";
import { HOVER_ITEM_FUNCTION, type ItemLocator } from "./pageScripts.js";
import { classifyEvaluation, type ItemBounds, type PollOutcome } from "./status.js";

export interface HoverSettings {
  /** Also fire mouseover/mouseenter/mousemove on the element itself. */
  domEvents: boolean;
  settleMs: number;
}

export interface PointerPoint {
  x: number;
  y: number;
}

// Unit offsets from the element centre; the path ends on the centre.
const JITTER_OFFSETS: ReadonlyArray<readonly [number, number]> = [
  [-1, -0.6],
  [0.7, -0.2],
  [-0.3, 0.8],
  [0, 0],
];
const MAX_JITTER_PX = 6;

function round(value: number): number {
  return Math.round(value * 100) / 100;
}

export function jitterPath(bounds: ItemBounds): PointerPoint[] {
  const centreX = bounds.x + bounds.width / 2;
  const centreY = bounds.y + bounds.height / 2;
  const spread = Math.min(MAX_JITTER_PX, bounds.width / 4, bounds.height / 4);

  return JITTER_OFFSETS.map(([dx, dy]) => ({
    x: round(centreX + dx * spread),
    y: round(centreY + dy * spread),
  }));
}

export interface HoverRefinementOptions {
  sender: CommandSender;
  lifecycle: SessionLifecycle;
  locator: ItemLocator;
  bounds: ItemBounds;
  evaluation: CdpCommand;
  settings: HoverSettings;
}

/**
 * Moves the pointer over the item, lets the page react, and reads the item
 * again. The caller decides what to do with a failure.
 */
export function refineWithHover(options: HoverRefinementOptions): Promise<Result<PollOutcome>> {
  const { sender, settings } = options;

  return attempt(async () => {
    for (const point of jitterPath(options.bounds)) {
      await send(sender, dispatchMouseEvent("mouseMoved", point.x, point.y));
    }
    if (settings.domEvents) {
      await send(sender, callPageFunction(HOVER_ITEM_FUNCTION, options.locator));
    }
    if (!(await options.lifecycle.sleep(settings.settleMs))) {
      throw new HarvestError("session_stopped", "Session stopped during hover", {
        index: options.locator.index,
        reason: options.lifecycle.getStopReason(),
      });
    }
    return classifyEvaluation(await send(sender, options.evaluation));
  }, "Hover refinement failed");
}
