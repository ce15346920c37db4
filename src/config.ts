import { HarvestError } from "./errors.js";
import type { LogLevel } from "./logger.js";

export interface HarvesterConfig {
  version: string;

  cdpEndpoint: string;
  cdpTargetId?: string;
  pageUrl?: string;
  announceMessage?: string;
  connectTimeoutMs: number;

  extractStartIndex: number;
  extractCount: number;
  extractContainerSelector: string;
  extractItemSelector: string;
  extractLinkAttribute: string;
  extractRequiredField: string;
  pollTimeoutMs: number;
  pollIntervalMs: number;

  hoverEnabled: boolean;
  hoverDomEvents: boolean;
  hoverSettleMs: number;
  highlightFailures: boolean;

  scrollEnabled: boolean;
  scrollOffsetPx: number;
  scrollMeanMs: number;
  scrollStddevMs: number;
  scrollMinMs: number;
  scrollMaxMs: number;

  focusEnabled: boolean;
  focusIntervalMs: number;

  idleTimeoutMs: number;
  idleCheckIntervalMs: number;

  logLevel: LogLevel;
  logFormat: "json" | "pretty";
}

const DEFAULT_CDP_ENDPOINT = "http://127.0.0.1:2102";

// Google Images result grid; every thumbnail tile carries its landing page in data-lpage.
const DEFAULT_CONTAINER_SELECTOR = "div#search";
const DEFAULT_ITEM_SELECTOR = "div[data-lpage]";
const DEFAULT_LINK_ATTRIBUTE = "data-lpage";

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined) return fallback;
  const lowered = value.trim().toLowerCase();
  if (["1", "true", "yes", "y", "on"].includes(lowered)) return true;
  if (["0", "false", "no", "n", "off"].includes(lowered)) return false;
  return fallback;
}

function parseNumber(value: string | undefined, fallback: number, min = 0): number {
  if (value === undefined) return fallback;
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || Number.isNaN(parsed)) return fallback;
  return Math.max(parsed, min);
}

function parseLogLevel(value: string | undefined): LogLevel {
  if (value === "debug" || value === "info" || value === "warn" || value === "error") {
    return value;
  }
  return "info";
}

function parseLogFormat(value: string | undefined): HarvesterConfig["logFormat"] {
  if (value === "pretty" || value === "json") {
    return value;
  }
  return "json";
}

function parseOptional(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  if (!trimmed) {
    return undefined;
  }
  return trimmed;
}

function parseEndpoint(value: string | undefined): string {
  const endpoint = parseOptional(value) ?? DEFAULT_CDP_ENDPOINT;
  return endpoint.replace(/\/+$/, "");
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): HarvesterConfig {
  return {
    version: env.HARVESTER_VERSION || "0.1.0",

    cdpEndpoint: parseEndpoint(env.CDP_ENDPOINT),
    cdpTargetId: parseOptional(env.CDP_TARGET_ID),
    pageUrl: parseOptional(env.PAGE_URL),
    announceMessage: parseOptional(env.ANNOUNCE_MESSAGE),
    connectTimeoutMs: parseNumber(env.CONNECT_TIMEOUT_MS, 10_000, 1),

    extractStartIndex: parseNumber(env.EXTRACT_START_INDEX, 0, 0),
    extractCount: parseNumber(env.EXTRACT_COUNT, 1, 1),
    extractContainerSelector: parseOptional(env.EXTRACT_CONTAINER_SELECTOR) ?? DEFAULT_CONTAINER_SELECTOR,
    extractItemSelector: parseOptional(env.EXTRACT_ITEM_SELECTOR) ?? DEFAULT_ITEM_SELECTOR,
    extractLinkAttribute: parseOptional(env.EXTRACT_LINK_ATTRIBUTE) ?? DEFAULT_LINK_ATTRIBUTE,
    extractRequiredField: parseOptional(env.EXTRACT_REQUIRED_FIELD) ?? "link",
    pollTimeoutMs: parseNumber(env.POLL_TIMEOUT_MS, 20_000, 1),
    pollIntervalMs: parseNumber(env.POLL_INTERVAL_MS, 500, 1),

    hoverEnabled: parseBoolean(env.HOVER_ENABLED, true),
    hoverDomEvents: parseBoolean(env.HOVER_DOM_EVENTS, true),
    hoverSettleMs: parseNumber(env.HOVER_SETTLE_MS, 600, 0),
    highlightFailures: parseBoolean(env.HIGHLIGHT_FAILURES, true),

    scrollEnabled: parseBoolean(env.SCROLL_ENABLED, true),
    scrollOffsetPx: parseNumber(env.SCROLL_OFFSET_PX, 40, 1),
    scrollMeanMs: parseNumber(env.SCROLL_MEAN_MS, 500, 0),
    scrollStddevMs: parseNumber(env.SCROLL_STDDEV_MS, 150, 0),
    scrollMinMs: parseNumber(env.SCROLL_MIN_MS, 200, 0),
    scrollMaxMs: parseNumber(env.SCROLL_MAX_MS, 5000, 0),

    focusEnabled: parseBoolean(env.FOCUS_ENABLED, true),
    focusIntervalMs: parseNumber(env.FOCUS_INTERVAL_MS, 2000, 1),

    idleTimeoutMs: parseNumber(env.IDLE_TIMEOUT_MS, 120_000, 1),
    idleCheckIntervalMs: parseNumber(env.IDLE_CHECK_INTERVAL_MS, 5000, 1),

    logLevel: parseLogLevel(env.LOG_LEVEL),
    logFormat: parseLogFormat(env.LOG_FORMAT),
  };
}

export function validateConfig(config: HarvesterConfig): void {
  if (config.scrollMinMs > config.scrollMaxMs) {
    throw new HarvestError("config_error", "SCROLL_MIN_MS must not exceed SCROLL_MAX_MS", {
      scrollMinMs: config.scrollMinMs,
      scrollMaxMs: config.scrollMaxMs,
    });
  }
}
