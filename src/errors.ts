export type HarvestErrorCode =
  | "transport_error"
  | "protocol_error"
  | "channel_closed"
  | "extraction_timeout"
  | "session_stopped"
  | "target_not_found"
  | "config_error"
  | "unknown";

export class HarvestError extends Error {
  public code: HarvestErrorCode;
  public details?: Record<string, unknown>;

  public constructor(code: HarvestErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = "HarvestError";
    this.code = code;
    this.details = details;
  }
}

export function isHarvestError(value: unknown): value is HarvestError {
  return value instanceof HarvestError;
}

export function toHarvestError(value: unknown, fallbackMessage = "Unknown harvest error"): HarvestError {
  if (isHarvestError(value)) {
    return value;
  }

  if (value instanceof Error) {
    return new HarvestError("unknown", value.message || fallbackMessage);
  }

  return new HarvestError("unknown", fallbackMessage, {
    value: typeof value === "string" ? value : JSON.stringify(value),
  });
}
