import { z } from "zod";
import { HarvestError, isHarvestError } from "../errors.js";

export interface TargetDescriptor {
  id: string;
  url: string;
  title: string;
  channelAddress: string;
}

const targetInfoSchema = z.object({
  id: z.string(),
  type: z.string().optional(),
  url: z.string().optional(),
  title: z.string().optional(),
  webSocketDebuggerUrl: z.string().optional(),
});

export type TargetInfo = z.infer<typeof targetInfoSchema>;

const TARGET_LIST_TIMEOUT_MS = 5_000;

export type FetchLike = (url: string, init?: { signal?: AbortSignal }) => Promise<{
  ok: boolean;
  status: number;
  json(): Promise<unknown>;
}>;

export async function fetchTargets(endpoint: string, fetchImpl: FetchLike = fetch): Promise<TargetInfo[]> {
  const listUrl = `${endpoint.replace(/\/+$/, "")}/json/list`;

  let body: unknown;
  try {
    const response = await fetchImpl(listUrl, { signal: AbortSignal.timeout(TARGET_LIST_TIMEOUT_MS) });
    if (!response.ok) {
      throw new HarvestError("transport_error", "DevTools endpoint rejected the target listing", {
        url: listUrl,
        status: response.status,
      });
    }
    body = await response.json();
  } catch (error) {
    if (isHarvestError(error)) {
      throw error;
    }
    throw new HarvestError("transport_error", "DevTools endpoint is unreachable", {
      url: listUrl,
      rawMessage: error instanceof Error ? error.message : String(error),
    });
  }

  const parsed = z.array(targetInfoSchema).safeParse(body);
  if (!parsed.success) {
    throw new HarvestError("transport_error", "DevTools endpoint returned an invalid target list", {
      url: listUrl,
      issues: parsed.error.issues.length,
    });
  }
  return parsed.data;
}

export function formatTarget(target: TargetInfo | TargetDescriptor): string {
  const url = target.url || "about:blank";
  const title = target.title ? `  title=${JSON.stringify(target.title)}` : "";
  return `${url} (targetId=${target.id})${title}`;
}

export function toTargetDescriptor(target: TargetInfo): TargetDescriptor {
  if (!target.webSocketDebuggerUrl) {
    throw new HarvestError("config_error", "Selected target is missing webSocketDebuggerUrl", {
      targetId: target.id,
    });
  }

  return {
    id: target.id,
    url: target.url ?? "",
    title: target.title ?? "",
    channelAddress: target.webSocketDebuggerUrl,
  };
}

/**
 * Picks the requested target, or the first page target when no id is given.
 */
export function selectTarget(targets: TargetInfo[], targetId?: string): TargetDescriptor {
  if (targetId) {
    const match = targets.find((target) => target.id === targetId);
    if (!match) {
      throw new HarvestError("target_not_found", `No tab found with targetId=${targetId}`, { targetId });
    }
    return toTargetDescriptor(match);
  }

  const firstPage = targets.find((target) => target.type === "page");
  if (!firstPage) {
    throw new HarvestError("target_not_found", "No page targets exposed by the remote browser", {
      targets: targets.length,
    });
  }
  return toTargetDescriptor(firstPage);
}

export async function resolveTarget(
  endpoint: string,
  targetId?: string,
  fetchImpl: FetchLike = fetch,
): Promise<TargetDescriptor> {
  return selectTarget(await fetchTargets(endpoint, fetchImpl), targetId);
}
