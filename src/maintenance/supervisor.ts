import { type Logger } from "pino";
import type { CommandSender } from "../cdp/client.js";
import { toHarvestError } from "../errors.js";
import type { SessionLifecycle } from "../session/lifecycle.js";
import { createScrollDelaySampler, type RandomSource, type ScrollDelayOptions } from "./delay.js";
import { runFocusKeeper } from "./focus.js";
import type { RoutineExit } from "./routine.js";
import { runScrollRoutine } from "./scroll.js";
import { runIdleWatchdog } from "./watchdog.js";

export type RoutineName = "scroll" | "focus" | "watchdog";
export type SupervisorReport = Partial<Record<RoutineName, RoutineExit>>;

export interface ScrollSettings {
  offsetPx: number;
  delay: ScrollDelayOptions;
}

export interface FocusSettings {
  intervalMs: number;
}

export interface WatchdogSettings {
  idleTimeoutMs: number;
  checkIntervalMs: number;
  description: string;
}

export interface BackgroundTaskSupervisorOptions {
  sender: CommandSender;
  lifecycle: SessionLifecycle;
  logger: Logger;
  targetId: string;
  /** Invoked by the watchdog after it stops the session. */
  close: () => Promise<void>;
  scroll?: ScrollSettings;
  focus?: FocusSettings;
  watchdog?: WatchdogSettings;
  onIdleTimeout?: (reason: string) => void;
  /** Defaults to the lifecycle's last activity. */
  lastActivityAt?: () => number;
  random?: RandomSource;
  now?: () => number;
}

/**
 * Owns the session's maintenance routines. Routines share the lifecycle, so
 * stopping it (here or from the watchdog) ends all of them.
 */
export class BackgroundTaskSupervisor {
  private readonly options: BackgroundTaskSupervisorOptions;
  private readonly running = new Map<RoutineName, Promise<RoutineExit>>();
  private started = false;

  public constructor(options: BackgroundTaskSupervisorOptions) {
    this.options = options;
  }

  public start(): void {
    if (this.started) {
      return;
    }
    this.started = true;

    const { sender, lifecycle, logger } = this.options;
    const { scroll, focus, watchdog } = this.options;

    if (scroll) {
      const nextDelayMs = createScrollDelaySampler(scroll.delay, this.options.random);
      this.launch("scroll", () => runScrollRoutine({
        sender,
        lifecycle,
        logger,
        offsetPx: scroll.offsetPx,
        nextDelayMs,
      }));
    }

    if (focus) {
      this.launch("focus", () => runFocusKeeper({
        sender,
        lifecycle,
        logger,
        targetId: this.options.targetId,
        intervalMs: focus.intervalMs,
      }));
    }

    if (watchdog) {
      this.launch("watchdog", () => runIdleWatchdog({
        lifecycle,
        logger,
        lastActivityAt: this.options.lastActivityAt ?? (() => lifecycle.getLastActivityAt()),
        close: this.options.close,
        idleTimeoutMs: watchdog.idleTimeoutMs,
        checkIntervalMs: watchdog.checkIntervalMs,
        description: watchdog.description,
        onTimeout: this.options.onIdleTimeout,
        now: this.options.now,
      }));
    }
  }

  public getRoutineNames(): RoutineName[] {
    return [...this.running.keys()];
  }

  public async settled(): Promise<SupervisorReport> {
    const report: SupervisorReport = {};
    for (const [name, task] of this.running) {
      report[name] = await task;
    }
    return report;
  }

  public async stop(reason = "supervisor_stopped"): Promise<SupervisorReport> {
    this.options.lifecycle.stop(reason);
    const report = await this.settled();
    this.options.logger.debug({ event: "supervisor_stopped", report }, "supervisor_stopped");
    return report;
  }

  private launch(name: RoutineName, routine: () => Promise<RoutineExit>): void {
    const task = Promise.resolve()
      .then(routine)
      .catch((error: unknown): RoutineExit => {
        const harvestError = toHarvestError(error, `${name} routine crashed`);
        this.options.logger.error(
          { event: "routine_crashed", routine: name, errorCode: harvestError.code, details: harvestError.details },
          harvestError.message,
        );
        return "failed";
      });
    this.running.set(name, task);
    this.options.logger.debug({ event: "routine_started", routine: name }, "routine_started");
  }
}
