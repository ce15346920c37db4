import { type Logger } from "pino";
import type { CommandSender } from "../cdp/client.js";
import type { SessionLifecycle } from "../session/lifecycle.js";

export type RoutineExit = "stopped" | "failed" | "fired";

export interface RoutineContext {
  sender: CommandSender;
  lifecycle: SessionLifecycle;
  logger: Logger;
}
