import { nanoid } from "nanoid";
import { type Logger } from "pino";
import { type CdpEvent, type ConnectOptions, ControlChannelClient } from "../cdp/client.js";
import { enablePage, enableRuntime, navigate, send } from "../cdp/commands.js";
import { formatTarget, type TargetDescriptor } from "../cdp/targets.js";
import type { HarvesterConfig } from "../config.js";
import { HarvestError } from "../errors.js";
import {
  type ExtractionRun,
  type ExtractionSettings,
  indexRange,
  PollingExtractor,
  type RecordSink,
} from "../extract/poller.js";
import type { RandomSource } from "../maintenance/delay.js";
import {
  BackgroundTaskSupervisor,
  type FocusSettings,
  type ScrollSettings,
  type SupervisorReport,
  type WatchdogSettings,
} from "../maintenance/supervisor.js";
import { attempt } from "../utils/result.js";
import { announce } from "./announce.js";
import { SessionLifecycle } from "./lifecycle.js";

export interface HarvestOptions {
  config: HarvesterConfig;
  logger: Logger;
  target: TargetDescriptor;
  onRecord?: RecordSink;
  onIdleTimeout?: (reason: string) => void;
  /** Aborting stops the session and closes the channel. */
  signal?: AbortSignal;
  openTransport?: ConnectOptions["openTransport"];
  random?: RandomSource;
}

export interface HarvestResult extends ExtractionRun {
  maintenance: SupervisorReport;
}

export interface MaintenanceSettings {
  scroll?: ScrollSettings;
  focus?: FocusSettings;
  watchdog?: WatchdogSettings;
}

export function extractionSettingsFromConfig(config: HarvesterConfig): ExtractionSettings {
  return {
    containerSelector: config.extractContainerSelector,
    itemSelector: config.extractItemSelector,
    linkAttribute: config.extractLinkAttribute,
    requiredField: config.extractRequiredField,
    pollTimeoutMs: config.pollTimeoutMs,
    pollIntervalMs: config.pollIntervalMs,
    hover: config.hoverEnabled
      ? { domEvents: config.hoverDomEvents, settleMs: config.hoverSettleMs }
      : null,
    highlightFailures: config.highlightFailures,
  };
}

export function maintenanceSettingsFromConfig(config: HarvesterConfig): MaintenanceSettings {
  return {
    scroll: config.scrollEnabled
      ? {
          offsetPx: config.scrollOffsetPx,
          delay: {
            meanMs: config.scrollMeanMs,
            stddevMs: config.scrollStddevMs,
            minMs: config.scrollMinMs,
            maxMs: config.scrollMaxMs,
          },
        }
      : undefined,
    focus: config.focusEnabled ? { intervalMs: config.focusIntervalMs } : undefined,
    watchdog: {
      idleTimeoutMs: config.idleTimeoutMs,
      checkIntervalMs: config.idleCheckIntervalMs,
      description: "evaluation responses",
    },
  };
}

/**
 * One full session against a target: connect, prepare the page, keep it
 * active in the background while extracting, then tear everything down.
 */
export async function runHarvest(options: HarvestOptions): Promise<HarvestResult> {
  const { config, target } = options;
  if (!target.channelAddress) {
    throw new HarvestError("config_error", "Target has no channel address", { targetId: target.id });
  }

  const runId = nanoid(10);
  const logger = options.logger.child({ rid: runId });
  const lifecycle = new SessionLifecycle();

  const onEvent = (event: CdpEvent): void => {
    if (event.method === "Inspector.detached") {
      const reason = typeof event.params.reason === "string" ? event.params.reason : "unknown";
      lifecycle.stop(`inspector detached: ${reason}`);
    }
  };

  const client = await ControlChannelClient.connect(target.channelAddress, {
    logger,
    onEvent,
    connectTimeoutMs: config.connectTimeoutMs,
    openTransport: options.openTransport,
  });

  const abort = (): void => {
    lifecycle.stop("interrupted");
    client.close().catch((error: unknown) => {
      logger.debug({ event: "channel_close_failed", error: String(error) }, "channel_close_failed");
    });
  };
  if (options.signal?.aborted) {
    abort();
  } else {
    options.signal?.addEventListener("abort", abort, { once: true });
  }

  const supervisor = new BackgroundTaskSupervisor({
    sender: client,
    lifecycle,
    logger,
    targetId: target.id,
    close: () => client.close(),
    onIdleTimeout: options.onIdleTimeout,
    random: options.random,
    ...maintenanceSettingsFromConfig(config),
  });

  const extractor = new PollingExtractor({
    sender: client,
    lifecycle,
    logger: options.logger,
    settings: extractionSettingsFromConfig(config),
    runId,
    onRecord: options.onRecord,
  });

  let run: ExtractionRun;
  let maintenance: SupervisorReport;
  try {
    await send(client, enablePage());
    await send(client, enableRuntime());

    if (config.announceMessage) {
      const announced = await announce(client, config.announceMessage);
      if (announced.ok) {
        logger.info({ event: "announce", ...announced.value }, "announce");
      } else {
        logger.warn({ event: "announce_failed", errorCode: announced.error.code }, announced.error.message);
      }
    }

    if (config.pageUrl) {
      logger.info({ event: "navigate", url: config.pageUrl, target: formatTarget(target) }, "navigate");
      await send(client, navigate(config.pageUrl));
    }

    lifecycle.markActivity();
    supervisor.start();
    run = await extractor.run(indexRange(config.extractStartIndex, config.extractCount));
  } finally {
    options.signal?.removeEventListener("abort", abort);
    maintenance = await supervisor.stop("harvest_finished");
    const closed = await attempt(() => client.close(), "Failed to close control channel");
    if (!closed.ok) {
      logger.debug({ event: "channel_close_failed", errorCode: closed.error.code }, "channel_close_failed");
    }
  }

  return { ...run, maintenance };
}
