import { nanoid } from "nanoid";
import { type Logger } from "pino";
import type { CommandSender } from "../cdp/client.js";
import { callPageFunction, type CdpCommand, send } from "../cdp/commands.js";
import { HarvestError, toHarvestError } from "../errors.js";
import type { SessionLifecycle } from "../session/lifecycle.js";
import { attempt, type Result } from "../utils/result.js";
import { type HoverSettings, refineWithHover } from "./hover.js";
import {
  EXTRACT_ITEM_FUNCTION,
  type ExtractItemArgs,
  HIGHLIGHT_ITEM_FUNCTION,
  type HighlightItemArgs,
  type ItemLocator,
} from "./pageScripts.js";
import {
  classifyEvaluation,
  type ExtractionStatus,
  hasRequiredField,
  hasUsableBounds,
  type PollOutcome,
  type WaitingStatus,
} from "./status.js";

export interface ExtractionSettings {
  containerSelector: string;
  itemSelector: string;
  linkAttribute: string;
  /** Field whose presence makes a record successful. */
  requiredField: string;
  pollTimeoutMs: number;
  pollIntervalMs: number;
  hover: HoverSettings | null;
  highlightFailures: boolean;
}

export interface ExtractionRecord {
  readonly index: number;
  readonly status: ExtractionStatus;
  readonly success: boolean;
  readonly hovered: boolean;
  readonly fields: Readonly<Record<string, unknown>>;
  readonly raw: Readonly<Record<string, unknown>>;
}

export interface ExtractionRun {
  runId: string;
  records: ExtractionRecord[];
  /** AND of every record's success; true when nothing was recorded. */
  success: boolean;
  /** Index at which the page reported out_of_range, if it did. */
  stoppedEarlyAt: number | null;
}

export type RecordSink = (record: ExtractionRecord) => void | Promise<void>;

export interface PollingExtractorOptions {
  sender: CommandSender;
  lifecycle: SessionLifecycle;
  logger: Logger;
  settings: ExtractionSettings;
  runId?: string;
  /** Receives each record as soon as it is appended. */
  onRecord?: RecordSink;
  now?: () => number;
}

type SettledOutcome = Exclude<PollOutcome, { kind: "waiting" }>;

const FAILURE_HIGHLIGHT_COLOR = "#e53935";

export function indexRange(start: number, count: number): number[] {
  return Array.from({ length: Math.max(0, count) }, (_, offset) => start + offset);
}

export function itemLocator(settings: ExtractionSettings, index: number): ItemLocator {
  return {
    index,
    containerSelector: settings.containerSelector,
    itemSelector: settings.itemSelector,
  };
}

export function buildExtractionCommand(settings: ExtractionSettings, index: number): CdpCommand {
  const args: ExtractItemArgs = {
    ...itemLocator(settings, index),
    linkAttribute: settings.linkAttribute,
  };
  return callPageFunction(EXTRACT_ITEM_FUNCTION, args);
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null) {
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
    Object.freeze(value);
  }
  return value;
}

function assertAscendingIndices(indices: readonly number[]): void {
  let previous = -1;
  for (const index of indices) {
    if (!Number.isInteger(index) || index <= previous) {
      throw new HarvestError("config_error", "Indices must be ascending non-negative integers", {
        index,
        previous,
      });
    }
    previous = index;
  }
}

export class PollingExtractor {
  private readonly sender: CommandSender;
  private readonly lifecycle: SessionLifecycle;
  private readonly logger: Logger;
  private readonly settings: ExtractionSettings;
  private readonly runId: string;
  private readonly onRecord?: RecordSink;
  private readonly now: () => number;

  public constructor(options: PollingExtractorOptions) {
    this.sender = options.sender;
    this.lifecycle = options.lifecycle;
    this.settings = options.settings;
    this.runId = options.runId ?? nanoid(10);
    this.logger = options.logger.child({ rid: this.runId });
    this.onRecord = options.onRecord;
    this.now = options.now ?? (() => Date.now());
  }

  public async run(indices: readonly number[]): Promise<ExtractionRun> {
    assertAscendingIndices(indices);
    const startedAt = Date.now();
    const records: ExtractionRecord[] = [];
    let stoppedEarlyAt: number | null = null;

    for (const index of indices) {
      let record: ExtractionRecord | null;
      try {
        record = await this.extractIndex(index);
      } catch (error) {
        const harvestError = toHarvestError(error, `Failed to extract item ${index}`);
        harvestError.details = {
          ...(harvestError.details ?? {}),
          index,
          recordsFlushed: records.length,
        };
        this.logger.error(
          {
            event: "extract_failed",
            durationMs: Date.now() - startedAt,
            errorCode: harvestError.code,
            details: harvestError.details,
          },
          harvestError.message,
        );
        throw harvestError;
      }

      if (!record) {
        stoppedEarlyAt = index;
        this.logger.info({ event: "extract_out_of_range", index }, "extract_out_of_range");
        break;
      }

      records.push(record);
      if (this.onRecord) {
        await this.onRecord(record);
      }
    }

    const success = records.every((record) => record.success);
    this.logger.info(
      {
        event: "extract_done",
        durationMs: Date.now() - startedAt,
        records: records.length,
        success,
        stoppedEarlyAt,
      },
      "extract_done",
    );

    return { runId: this.runId, records, success, stoppedEarlyAt };
  }

  /**
   * Resolves to null when the page has no item at `index`.
   */
  public async extractIndex(index: number): Promise<ExtractionRecord | null> {
    const evaluation = buildExtractionCommand(this.settings, index);
    const outcome = await this.pollUntilSettled(index, evaluation);
    if (outcome.kind === "out_of_range") {
      return null;
    }

    let payload = outcome.payload;
    let raw = outcome.raw;
    let hovered = false;
    const hover = this.settings.hover;
    const bounds = payload.bounds;

    if (hover && hasUsableBounds(bounds)) {
      const refined = await refineWithHover({
        sender: this.sender,
        lifecycle: this.lifecycle,
        locator: itemLocator(this.settings, index),
        bounds,
        evaluation,
        settings: hover,
      });

      if (!refined.ok) {
        this.logger.warn(
          { event: "hover_failed", index, errorCode: refined.error.code, details: refined.error.details },
          refined.error.message,
        );
      } else if (refined.value.kind === "ok") {
        payload = refined.value.payload;
        raw = refined.value.raw;
        hovered = true;
      } else {
        this.logger.debug(
          { event: "hover_reread_ignored", index, outcome: refined.value.kind },
          "hover_reread_ignored",
        );
      }
    }

    const success = hasRequiredField(payload.fields, this.settings.requiredField);
    if (!success && this.settings.highlightFailures) {
      const highlighted = await this.highlightFailure(index);
      if (!highlighted.ok) {
        this.logger.debug(
          { event: "highlight_failed", index, errorCode: highlighted.error.code },
          "highlight_failed",
        );
      }
    }

    const status: ExtractionStatus = "ok";
    const record: ExtractionRecord = Object.freeze({
      index,
      status,
      success,
      hovered,
      fields: deepFreeze(structuredClone(payload.fields)),
      raw: deepFreeze(structuredClone(raw)),
    });

    this.logger.info(
      { event: "extract_record", index, success, hovered },
      "extract_record",
    );
    return record;
  }

  private async pollUntilSettled(index: number, evaluation: CdpCommand): Promise<SettledOutcome> {
    const deadline = this.now() + this.settings.pollTimeoutMs;
    let lastStatus: WaitingStatus | null = null;
    let attempts = 0;

    while (this.now() < deadline) {
      this.assertRunning(index);

      const answered = await attempt(() => send(this.sender, evaluation));
      attempts += 1;
      if (!answered.ok && answered.error.code !== "protocol_error") {
        throw answered.error;
      }
      this.lifecycle.markActivity();

      // A remote error (context destroyed mid-navigation and the like) is a page not ready yet.
      const outcome: PollOutcome = answered.ok
        ? classifyEvaluation(answered.value)
        : { kind: "waiting", status: "unrecognized" };
      if (!answered.ok) {
        this.logger.debug(
          { event: "extract_poll_rejected", index, errorCode: answered.error.code, attempts },
          answered.error.message,
        );
      }
      if (outcome.kind !== "waiting") {
        this.logger.debug(
          { event: "extract_poll_settled", index, outcome: outcome.kind, attempts },
          "extract_poll_settled",
        );
        return outcome;
      }

      if (outcome.status !== lastStatus) {
        this.logger.info(
          { event: "extract_waiting", index, status: outcome.status },
          `Waiting for DOM elements: ${outcome.status}`,
        );
        lastStatus = outcome.status;
      }

      await this.lifecycle.sleep(this.settings.pollIntervalMs);
    }

    throw new HarvestError("extraction_timeout", `Timed out waiting for item ${index}`, {
      timeoutMs: this.settings.pollTimeoutMs,
      attempts,
      lastStatus,
    });
  }

  private assertRunning(index: number): void {
    if (this.lifecycle.isStopped()) {
      throw new HarvestError("session_stopped", "Session stopped during extraction", {
        index,
        reason: this.lifecycle.getStopReason(),
      });
    }
  }

  private highlightFailure(index: number): Promise<Result<unknown>> {
    const args: HighlightItemArgs = { ...itemLocator(this.settings, index), color: FAILURE_HIGHLIGHT_COLOR };
    return attempt(() => send(this.sender, callPageFunction(HIGHLIGHT_ITEM_FUNCTION, args)), "Failed to highlight item");
  }
}
