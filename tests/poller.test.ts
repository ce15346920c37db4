import { describe, expect, it } from "vitest";
import { HarvestError } from "../src/errors.js";
import { EXTRACT_ITEM_FUNCTION, HIGHLIGHT_ITEM_FUNCTION, HOVER_ITEM_FUNCTION } from "../src/extract/pageScripts.js";
import {
  type ExtractionRecord,
  type ExtractionSettings,
  indexRange,
  PollingExtractor,
} from "../src/extract/poller.js";
import { SessionLifecycle } from "../src/session/lifecycle.js";
import { captureLogger } from "./helpers/captureLogger.js";
import {
  evaluationResult,
  expressionOf,
  type RecordedCall,
  type Responder,
  runsPageFunction,
  ScriptedSender,
} from "./helpers/scriptedSender.js";

const BOUNDS = { x: 10, y: 20, width: 100, height: 80 };

function settings(overrides: Partial<ExtractionSettings> = {}): ExtractionSettings {
  return {
    containerSelector: "div#search",
    itemSelector: "div[data-lpage]",
    linkAttribute: "data-lpage",
    requiredField: "link",
    pollTimeoutMs: 200,
    pollIntervalMs: 2,
    hover: null,
    highlightFailures: false,
    ...overrides,
  };
}

function isExtraction(call: RecordedCall): boolean {
  return runsPageFunction(call, EXTRACT_ITEM_FUNCTION);
}

function targetsIndex(call: RecordedCall, index: number): boolean {
  return expressionOf(call).includes(`{"index":${index},`);
}

function build(responder: Responder, overrides: Partial<ExtractionSettings> = {}) {
  const sender = new ScriptedSender(responder);
  const lifecycle = new SessionLifecycle();
  const captured = captureLogger();
  const records: ExtractionRecord[] = [];
  const extractor = new PollingExtractor({
    sender,
    lifecycle,
    logger: captured.logger,
    settings: settings(overrides),
    runId: "run-1",
    onRecord: (record) => {
      records.push(record);
    },
  });
  return { sender, lifecycle, captured, records, extractor };
}

describe("indexRange", () => {
  it("lists count consecutive indices", () => {
    expect(indexRange(3, 4)).toEqual([3, 4, 5, 6]);
    expect(indexRange(0, 0)).toEqual([]);
  });
});

describe("PollingExtractor", () => {
  it("records an item that is ready on the first poll", async () => {
    const { sender, records, extractor } = build(() =>
      evaluationResult({ status: "ok", fields: { link: "https://example.test/a", title: "A" } }),
    );

    const run = await extractor.run([0]);

    expect(run).toMatchObject({ runId: "run-1", success: true, stoppedEarlyAt: null });
    expect(run.records).toEqual([
      {
        index: 0,
        status: "ok",
        success: true,
        hovered: false,
        fields: { link: "https://example.test/a", title: "A" },
        raw: { status: "ok", fields: { link: "https://example.test/a", title: "A" } },
      },
    ]);
    expect(records).toEqual(run.records);
    expect(Object.isFrozen(run.records[0])).toBe(true);
    expect(sender.calls.filter(isExtraction)).toHaveLength(1);
  });

  it("ends the run without a record when the item does not exist", async () => {
    const { records, extractor, captured } = build(() => evaluationResult({ status: "out_of_range", available: 0 }));

    const run = await extractor.run([0, 1, 2]);

    expect(run.records).toEqual([]);
    expect(run.success).toBe(true);
    expect(run.stoppedEarlyAt).toBe(0);
    expect(records).toEqual([]);
    expect(captured.events("extract_out_of_range")).toHaveLength(1);
  });

  it("stops at the first index past the end of the list", async () => {
    const { sender, extractor } = build((call) =>
      targetsIndex(call, 0)
        ? evaluationResult({ status: "ok", fields: { link: "https://example.test/a" } })
        : evaluationResult({ status: "out_of_range", available: 1 }),
    );

    const run = await extractor.run([0, 1, 2]);

    expect(run.records.map((record) => record.index)).toEqual([0]);
    expect(run.stoppedEarlyAt).toBe(1);
    expect(sender.calls.filter(isExtraction)).toHaveLength(2);
  });

  it("logs each waiting state once and records the item when it appears", async () => {
    let polls = 0;
    const { extractor, captured } = build(() => {
      polls += 1;
      return polls <= 2
        ? evaluationResult({ status: "waiting_for_item" })
        : evaluationResult({ status: "ok", fields: { link: "https://example.test/a" } });
    });

    const run = await extractor.run([0]);

    expect(polls).toBe(3);
    expect(run.records).toHaveLength(1);
    expect(run.records[0].success).toBe(true);
    expect(captured.events("extract_waiting")).toHaveLength(1);
    expect(captured.events("extract_waiting")[0]).toMatchObject({
      index: 0,
      status: "waiting_for_item",
      msg: "Waiting for DOM elements: waiting_for_item",
    });
  });

  it("fails with extraction_timeout when the page never settles", async () => {
    const { extractor, records, captured } = build(
      () => evaluationResult({ status: "waiting_for_container" }),
      { pollTimeoutMs: 30 },
    );

    await expect(extractor.run([0])).rejects.toMatchObject({
      code: "extraction_timeout",
      message: "Timed out waiting for item 0",
      details: { timeoutMs: 30, lastStatus: "waiting_for_container", index: 0, recordsFlushed: 0 },
    });
    expect(records).toEqual([]);
    expect(captured.events("extract_failed")).toHaveLength(1);
  });

  it("keeps records already flushed when a later item times out", async () => {
    const { extractor, records } = build(
      (call) =>
        targetsIndex(call, 0)
          ? evaluationResult({ status: "ok", fields: { link: "https://example.test/a" } })
          : evaluationResult({ status: "waiting_for_item" }),
      { pollTimeoutMs: 30 },
    );

    await expect(extractor.run([0, 1])).rejects.toMatchObject({
      code: "extraction_timeout",
      details: { index: 1, recordsFlushed: 1 },
    });
    expect(records.map((record) => record.index)).toEqual([0]);
  });

  it("refreshes the last activity timestamp on every answered poll", async () => {
    let nowMs = 0;
    const sender = new ScriptedSender(() => {
      nowMs += 100;
      return evaluationResult({ status: "ok", fields: { link: "https://example.test/a" } });
    });
    const lifecycle = new SessionLifecycle(() => nowMs);
    const extractor = new PollingExtractor({
      sender,
      lifecycle,
      logger: captureLogger().logger,
      settings: settings(),
    });

    await extractor.run([0]);
    expect(lifecycle.getLastActivityAt()).toBe(100);
  });

  it("fails with session_stopped once the session has stopped", async () => {
    const { extractor, lifecycle, sender } = build(() => evaluationResult({ status: "ok", fields: {} }));
    lifecycle.stop("idle");

    await expect(extractor.run([0])).rejects.toMatchObject({
      code: "session_stopped",
      details: { index: 0, reason: "idle", recordsFlushed: 0 },
    });
    expect(sender.calls).toEqual([]);
  });

  it("stops polling when the session stops mid-wait", async () => {
    let polls = 0;
    const { extractor, lifecycle } = build(() => {
      polls += 1;
      if (polls === 1) {
        lifecycle.stop("inspector detached: target_closed");
      }
      return evaluationResult({ status: "waiting_for_container" });
    }, { pollIntervalMs: 10_000, pollTimeoutMs: 60_000 });

    const startedAt = Date.now();
    await expect(extractor.run([0])).rejects.toMatchObject({ code: "session_stopped" });
    expect(polls).toBe(1);
    expect(Date.now() - startedAt).toBeLessThan(5_000);
  });

  it("rejects indices that are not strictly ascending", async () => {
    const { extractor } = build(() => ({}));
    await expect(extractor.run([2, 1])).rejects.toMatchObject({ code: "config_error" });
  });

  it("keeps polling through a remote evaluation error", async () => {
    let polls = 0;
    const { extractor, captured } = build(() => {
      polls += 1;
      if (polls === 1) {
        throw new HarvestError("protocol_error", "Runtime.evaluate failed: Execution context was destroyed.");
      }
      return evaluationResult({ status: "ok", fields: { link: "https://example.test/a" } });
    });

    const run = await extractor.run([0]);

    expect(polls).toBe(2);
    expect(run.records.map((record) => [record.index, record.success])).toEqual([[0, true]]);
    expect(captured.events("extract_waiting")).toHaveLength(1);
    expect(captured.events("extract_waiting")[0]).toMatchObject({ status: "unrecognized" });
  });

  it("counts remote evaluation errors against the deadline", async () => {
    const { extractor } = build(() => {
      throw new HarvestError("protocol_error", "Runtime.evaluate failed: Cannot find context with specified id");
    }, { pollTimeoutMs: 30 });

    await expect(extractor.run([0])).rejects.toMatchObject({
      code: "extraction_timeout",
      details: { lastStatus: "unrecognized" },
    });
  });

  it("fails at once when the channel itself breaks", async () => {
    let polls = 0;
    const { extractor } = build(() => {
      polls += 1;
      throw new HarvestError("transport_error", "Control channel dropped");
    });

    await expect(extractor.run([0])).rejects.toMatchObject({
      code: "transport_error",
      details: { index: 0, recordsFlushed: 0 },
    });
    expect(polls).toBe(1);
  });

  it("freezes the whole record, nested values included", async () => {
    const page = { status: "ok", fields: { link: "https://example.test/a" }, bounds: { x: 0, y: 0, width: 0, height: 0 } };
    const { extractor } = build(() => evaluationResult(page));

    const [record] = (await extractor.run([0])).records;
    page.fields.link = "https://example.test/changed";

    expect(record.fields).toEqual({ link: "https://example.test/a" });
    expect(Object.isFrozen(record.fields)).toBe(true);
    expect(Object.isFrozen(record.raw.fields)).toBe(true);
    expect(Object.isFrozen(record.raw.bounds)).toBe(true);
  });

  it("highlights items that miss the required field", async () => {
    const { sender, extractor } = build(
      (call) =>
        isExtraction(call)
          ? evaluationResult({ status: "ok", fields: { link: "  ", title: "No link" } })
          : {},
      { highlightFailures: true },
    );

    const run = await extractor.run([0]);

    expect(run.success).toBe(false);
    expect(run.records[0]).toMatchObject({ success: false, fields: { link: "  ", title: "No link" } });
    const highlights = sender.calls.filter((call) => runsPageFunction(call, HIGHLIGHT_ITEM_FUNCTION));
    expect(highlights).toHaveLength(1);
    expect(expressionOf(highlights[0])).toContain('"color":"#e53935"');
  });

  it("still records the item when highlighting fails", async () => {
    const { extractor, captured } = build((call) => {
      if (runsPageFunction(call, HIGHLIGHT_ITEM_FUNCTION)) {
        throw new Error("Cannot find context with specified id");
      }
      return evaluationResult({ status: "ok", fields: {} });
    }, { highlightFailures: true });

    const run = await extractor.run([0]);

    expect(run.records).toHaveLength(1);
    expect(captured.events("highlight_failed")).toHaveLength(1);
  });

  describe("hover refinement", () => {
    const hover = { domEvents: true, settleMs: 1 };

    it("replaces the record with the post-hover read", async () => {
      let extractions = 0;
      const { sender, extractor } = build((call) => {
        if (!isExtraction(call)) {
          return {};
        }
        extractions += 1;
        return extractions === 1
          ? evaluationResult({ status: "ok", fields: { link: "" }, bounds: BOUNDS })
          : evaluationResult({ status: "ok", fields: { link: "https://example.test/b" }, bounds: BOUNDS });
      }, { hover });

      const run = await extractor.run([0]);

      expect(run.records[0]).toMatchObject({
        success: true,
        hovered: true,
        fields: { link: "https://example.test/b" },
      });
      expect(sender.methods()).toEqual([
        "Runtime.evaluate",
        "Input.dispatchMouseEvent",
        "Input.dispatchMouseEvent",
        "Input.dispatchMouseEvent",
        "Input.dispatchMouseEvent",
        "Runtime.evaluate",
        "Runtime.evaluate",
      ]);
      expect(sender.calls[4].params).toEqual({ type: "mouseMoved", x: 60, y: 60 });
      expect(runsPageFunction(sender.calls[5], HOVER_ITEM_FUNCTION)).toBe(true);
      expect(isExtraction(sender.calls[6])).toBe(true);
    });

    it("keeps the pre-hover record when the pointer cannot be moved", async () => {
      const { sender, extractor, captured } = build((call) => {
        if (call.method === "Input.dispatchMouseEvent") {
          throw new Error("Input dispatch failed");
        }
        return evaluationResult({ status: "ok", fields: { link: "https://example.test/a" }, bounds: BOUNDS });
      }, { hover });

      const run = await extractor.run([0]);

      expect(run.records[0]).toMatchObject({
        success: true,
        hovered: false,
        fields: { link: "https://example.test/a" },
      });
      expect(sender.calls.filter(isExtraction)).toHaveLength(1);
      expect(captured.events("hover_failed")).toHaveLength(1);
    });

    it("ignores a post-hover read that is not ok", async () => {
      let extractions = 0;
      const { extractor, captured } = build((call) => {
        if (!isExtraction(call)) {
          return {};
        }
        extractions += 1;
        return extractions === 1
          ? evaluationResult({ status: "ok", fields: { link: "https://example.test/a" }, bounds: BOUNDS })
          : evaluationResult({ status: "waiting_for_item" });
      }, { hover });

      const run = await extractor.run([0]);

      expect(run.records[0]).toMatchObject({ hovered: false, fields: { link: "https://example.test/a" } });
      expect(captured.events("hover_reread_ignored")).toHaveLength(1);
    });

    it("does not read the item again once the session stops during hover", async () => {
      const { sender, extractor, lifecycle, captured } = build((call) => {
        if (call.method === "Input.dispatchMouseEvent") {
          lifecycle.stop("interrupted");
          return {};
        }
        return isExtraction(call)
          ? evaluationResult({ status: "ok", fields: { link: "https://example.test/a" }, bounds: BOUNDS })
          : {};
      }, { hover });

      const run = await extractor.run([0]);

      expect(run.records[0]).toMatchObject({ hovered: false, fields: { link: "https://example.test/a" } });
      expect(sender.calls.filter(isExtraction)).toHaveLength(1);
      expect(captured.events("hover_failed")[0]).toMatchObject({ errorCode: "session_stopped" });
    });

    it("skips hovering items without usable bounds", async () => {
      const { sender, extractor } = build(() =>
        evaluationResult({ status: "ok", fields: { link: "https://example.test/a" } }),
      { hover: { domEvents: false, settleMs: 1 } });

      await extractor.run([0]);

      expect(sender.methods()).toEqual(["Runtime.evaluate"]);
    });
  });
});
