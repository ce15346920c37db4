#!/usr/bin/env node

import { formatTarget, resolveTarget } from "./src/cdp/targets.js";
import { loadConfig, validateConfig } from "./src/config.js";
import { toHarvestError } from "./src/errors.js";
import { createLogger } from "./src/logger.js";
import { formatRecordLine } from "./src/output.js";
import { exitCodeForRun, reportFailure } from "./src/session/exit.js";
import { runHarvest } from "./src/session/harvest.js";

const config = loadConfig(process.env);
const logger = createLogger({ level: config.logLevel, format: config.logFormat });

process.on("unhandledRejection", (reason) => {
  logger.error({ event: "unhandled_rejection", reason }, "unhandled_rejection");
});

process.on("uncaughtException", (error) => {
  logger.error({ event: "uncaught_exception", error }, "uncaught_exception");
});

const interrupt = new AbortController();
process.once("SIGINT", () => {
  logger.debug({ event: "sigint" }, "sigint");
  interrupt.abort();
});

try {
  validateConfig(config);

  const target = await resolveTarget(config.cdpEndpoint, config.cdpTargetId);
  logger.info({ event: "target_selected", target: formatTarget(target) }, "target_selected");

  const result = await runHarvest({
    config,
    logger,
    target,
    signal: interrupt.signal,
    onRecord: (record) => {
      process.stdout.write(formatRecordLine(record));
    },
    onIdleTimeout: (reason) => {
      logger.warn({ event: "idle_timeout_notified", reason }, reason);
    },
  });

  logger.info(
    {
      event: "harvest_done",
      records: result.records.length,
      success: result.success,
      stoppedEarlyAt: result.stoppedEarlyAt,
      maintenance: result.maintenance,
    },
    "harvest_done",
  );
  process.exitCode = exitCodeForRun(result);
} catch (error) {
  const harvestError = toHarvestError(error, "Harvest failed");
  const report = reportFailure(harvestError, interrupt.signal.aborted);
  logger[report.level](
    { event: report.event, errorCode: harvestError.code, details: harvestError.details },
    report.message,
  );
  process.exitCode = report.exitCode;
}
