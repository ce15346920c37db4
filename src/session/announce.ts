import { z } from "zod";
import type { CommandSender } from "../cdp/client.js";
import { callPageFunction, send } from "../cdp/commands.js";
import { HarvestError } from "../errors.js";
import { ANNOUNCE_FUNCTION, type AnnounceArgs } from "../extract/pageScripts.js";
import { readEvaluationValue } from "../extract/status.js";
import { attempt, type Result } from "../utils/result.js";

export const ANNOUNCE_PREFIX = "[cdp-harvester]";

const announceResultSchema = z.object({
  previousTitle: z.string(),
  newTitle: z.string(),
});

export type AnnounceResult = z.infer<typeof announceResultSchema>;

/**
 * Marks the driven tab so a human watching the browser can tell which one
 * is under remote control.
 */
export function announce(sender: CommandSender, message: string): Promise<Result<AnnounceResult>> {
  return attempt(async () => {
    const args: AnnounceArgs = { prefix: ANNOUNCE_PREFIX, message };
    const result = await send(sender, callPageFunction(ANNOUNCE_FUNCTION, args));
    const parsed = announceResultSchema.safeParse(readEvaluationValue(result));
    if (!parsed.success) {
      throw new HarvestError("protocol_error", "Page returned an unexpected announce result");
    }
    return parsed.data;
  }, "Failed to announce session");
}
