import { HarvestError } from "../errors.js";
import type { CommandSender } from "./client.js";
import type { CdpParams, CdpResult } from "./messages.js";

export interface CdpCommand {
  method: string;
  params?: CdpParams;
}

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export type WebLifecycleState = "active" | "frozen";
export type MouseEventType = "mouseMoved" | "mousePressed" | "mouseReleased";

export interface EvaluateOptions {
  returnByValue?: boolean;
  awaitPromise?: boolean;
}

export function send(sender: CommandSender, command: CdpCommand): Promise<CdpResult> {
  return sender.call(command.method, command.params);
}

export function enablePage(): CdpCommand {
  return { method: "Page.enable" };
}

export function enableRuntime(): CdpCommand {
  return { method: "Runtime.enable" };
}

export function navigate(url: string): CdpCommand {
  return { method: "Page.navigate", params: { url } };
}

export function activateTarget(targetId: string): CdpCommand {
  return { method: "Target.activateTarget", params: { targetId } };
}

export function bringToFront(): CdpCommand {
  return { method: "Page.bringToFront" };
}

export function setFocusEmulationEnabled(enabled: boolean): CdpCommand {
  return { method: "Emulation.setFocusEmulationEnabled", params: { enabled } };
}

export function setWebLifecycleState(state: WebLifecycleState): CdpCommand {
  return { method: "Page.setWebLifecycleState", params: { state } };
}

export function setIdleOverride(isUserActive: boolean, isScreenUnlocked: boolean): CdpCommand {
  return { method: "Emulation.setIdleOverride", params: { isUserActive, isScreenUnlocked } };
}

export function dispatchMouseEvent(type: MouseEventType, x: number, y: number): CdpCommand {
  return { method: "Input.dispatchMouseEvent", params: { type, x, y } };
}

export function evaluate(expression: string, options: EvaluateOptions = {}): CdpCommand {
  const params: CdpParams = { expression, returnByValue: options.returnByValue ?? true };
  if (options.awaitPromise) {
    params.awaitPromise = true;
  }
  return { method: "Runtime.evaluate", params };
}

export function scrollBy(offsetPx: number): CdpCommand {
  if (!Number.isFinite(offsetPx)) {
    throw new HarvestError("config_error", "Scroll offset must be a finite number", { offsetPx });
  }
  return evaluate(`window.scrollBy(0, ${Math.round(offsetPx)});`, { returnByValue: false });
}

/**
 * Evaluates a fixed page-side function against JSON arguments. Values never
 * reach the expression as source text, only as a JSON literal.
 */
export function callPageFunction(source: string, args: JsonValue): CdpCommand {
  return evaluate(`(${source})(${JSON.stringify(args)})`, { returnByValue: true });
}
