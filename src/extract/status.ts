import { z } from "zod";
import type { CdpResult } from "../cdp/messages.js";

export const EXTRACTION_STATUSES = ["waiting_for_container", "waiting_for_item", "out_of_range", "ok"] as const;
export type ExtractionStatus = (typeof EXTRACTION_STATUSES)[number];

/** Waiting states, plus anything the page returned that we cannot read. */
export type WaitingStatus = "waiting_for_container" | "waiting_for_item" | "unrecognized";

const boundsSchema = z.object({
  x: z.number(),
  y: z.number(),
  width: z.number(),
  height: z.number(),
});

export type ItemBounds = z.infer<typeof boundsSchema>;

const okPayloadSchema = z.object({
  status: z.literal("ok"),
  fields: z.record(z.string(), z.unknown()).default({}),
  bounds: boundsSchema.optional(),
});

export type OkPayload = z.infer<typeof okPayloadSchema>;

export type PollOutcome =
  | { kind: "ok"; payload: OkPayload; raw: Record<string, unknown> }
  | { kind: "out_of_range"; raw: Record<string, unknown> }
  | { kind: "waiting"; status: WaitingStatus };

const evaluationSchema = z.object({
  result: z.object({ value: z.unknown().optional() }).optional(),
  exceptionDetails: z.unknown().optional(),
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Pulls the by-value result out of a Runtime.evaluate response. A page-side
 * exception yields undefined.
 */
export function readEvaluationValue(result: CdpResult): unknown {
  const parsed = evaluationSchema.safeParse(result);
  if (!parsed.success || parsed.data.exceptionDetails !== undefined) {
    return undefined;
  }
  return parsed.data.result?.value;
}

export function classifyEvaluation(result: CdpResult): PollOutcome {
  const value = readEvaluationValue(result);
  if (!isRecord(value)) {
    return { kind: "waiting", status: "unrecognized" };
  }

  switch (value.status) {
    case "ok": {
      const payload = okPayloadSchema.safeParse(value);
      if (!payload.success) {
        return { kind: "waiting", status: "unrecognized" };
      }
      return { kind: "ok", payload: payload.data, raw: value };
    }
    case "out_of_range":
      return { kind: "out_of_range", raw: value };
    case "waiting_for_container":
    case "waiting_for_item":
      return { kind: "waiting", status: value.status };
    default:
      return { kind: "waiting", status: "unrecognized" };
  }
}

export function hasUsableBounds(bounds: ItemBounds | undefined): bounds is ItemBounds {
  if (!bounds) {
    return false;
  }
  const { x, y, width, height } = bounds;
  return [x, y, width, height].every(Number.isFinite) && width > 0 && height > 0;
}

/**
 * An item that exists but lacks its link still produces a record; it is just
 * not a successful one.
 */
export function hasRequiredField(fields: Record<string, unknown>, name: string): boolean {
  const value = fields[name];
  return typeof value === "string" && value.trim().length > 0;
}
