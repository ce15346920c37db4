import { z } from "zod";

export type CdpParams = Record<string, unknown>;
export type CdpResult = Record<string, unknown>;

export interface CdpRemoteError {
  code: number;
  message: string;
  data?: unknown;
}

export type InboundMessage =
  | { kind: "response"; id: number; result?: CdpResult; error?: CdpRemoteError }
  | { kind: "event"; method: string; params: CdpParams }
  | { kind: "malformed"; reason: string };

const remoteErrorSchema = z.object({
  code: z.number(),
  message: z.string(),
  data: z.unknown().optional(),
});

const responseSchema = z.object({
  id: z.number().int(),
  result: z.record(z.string(), z.unknown()).optional(),
  error: remoteErrorSchema.optional(),
});

const eventSchema = z.object({
  method: z.string().min(1),
  params: z.record(z.string(), z.unknown()).optional(),
});

export function encodeRequest(id: number, method: string, params?: CdpParams): string {
  if (params === undefined) {
    return JSON.stringify({ id, method });
  }
  return JSON.stringify({ id, method, params });
}

export function parseInbound(raw: string): InboundMessage {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return { kind: "malformed", reason: "invalid_json" };
  }

  if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) {
    return { kind: "malformed", reason: "not_an_object" };
  }

  // Responses always echo an id; events never carry one.
  if ("id" in parsed) {
    const response = responseSchema.safeParse(parsed);
    if (!response.success) {
      return { kind: "malformed", reason: "invalid_response" };
    }
    return { kind: "response", ...response.data };
  }

  const event = eventSchema.safeParse(parsed);
  if (!event.success) {
    return { kind: "malformed", reason: "invalid_event" };
  }
  return { kind: "event", method: event.data.method, params: event.data.params ?? {} };
}
