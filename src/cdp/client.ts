import { type Logger } from "pino";
import { HarvestError, toHarvestError } from "../errors.js";
import { type CdpParams, type CdpResult, encodeRequest, parseInbound } from "./messages.js";
import { type ChannelTransport, openWebSocketTransport, type WebSocketTransportOptions } from "./transport.js";

/**
 * The one operation every other component needs from the channel.
 */
export interface CommandSender {
  call(method: string, params?: CdpParams): Promise<CdpResult>;
}

export interface CdpEvent {
  method: string;
  params: CdpParams;
}

export type CdpEventSink = (event: CdpEvent) => void;

export interface ControlChannelClientOptions {
  logger: Logger;
  onEvent?: CdpEventSink;
}

export interface ConnectOptions extends ControlChannelClientOptions {
  connectTimeoutMs: number;
  openTransport?: (address: string, options: WebSocketTransportOptions) => Promise<ChannelTransport>;
}

interface PendingRequest {
  method: string;
  resolve: (result: CdpResult) => void;
  reject: (error: HarvestError) => void;
}

export class ControlChannelClient implements CommandSender {
  private readonly transport: ChannelTransport;
  private readonly logger: Logger;
  private readonly onEvent?: CdpEventSink;
  private readonly pending = new Map<number, PendingRequest>();
  private lastId = 0;
  private closed = false;
  private closing: Promise<void> | null = null;

  public static async connect(address: string, options: ConnectOptions): Promise<ControlChannelClient> {
    const openTransport = options.openTransport ?? openWebSocketTransport;
    const startedAt = Date.now();
    const transport = await openTransport(address, { connectTimeoutMs: options.connectTimeoutMs });
    options.logger.info(
      { event: "channel_connected", address, durationMs: Date.now() - startedAt },
      "channel_connected",
    );
    return new ControlChannelClient(transport, options);
  }

  public constructor(transport: ChannelTransport, options: ControlChannelClientOptions) {
    this.transport = transport;
    this.logger = options.logger;
    this.onEvent = options.onEvent;
    this.transport.onMessage((data) => this.dispatch(data));
    this.transport.onClose((reason) => this.handleTransportClosed(reason));
  }

  public isClosed(): boolean {
    return this.closed;
  }

  public getPendingCount(): number {
    return this.pending.size;
  }

  public call(method: string, params?: CdpParams): Promise<CdpResult> {
    if (this.closed) {
      return Promise.reject(new HarvestError("channel_closed", "Control channel is closed", { method }));
    }

    this.lastId += 1;
    const id = this.lastId;
    const response = new Promise<CdpResult>((resolve, reject) => {
      this.pending.set(id, { method, resolve, reject });
    });

    Promise.resolve()
      .then(() => this.transport.send(encodeRequest(id, method, params)))
      .catch((error: unknown) => {
        const entry = this.take(id);
        if (!entry) {
          // Already failed by teardown.
          return;
        }
        const cause = toHarvestError(error, "Failed to write to control channel");
        entry.reject(new HarvestError("transport_error", cause.message, {
          ...(cause.details ?? {}),
          method,
          id,
        }));
      });

    return response;
  }

  /**
   * Fails every pending call with `channel_closed`, then closes the stream.
   * Safe to call more than once.
   */
  public close(): Promise<void> {
    if (this.closing) {
      return this.closing;
    }

    this.closed = true;
    const failed = this.failPending(
      (entry) => new HarvestError("channel_closed", "Control channel closed before a response arrived", {
        method: entry.method,
      }),
    );
    this.logger.debug({ event: "channel_close", failedPending: failed }, "channel_close");
    this.closing = this.transport.close();
    return this.closing;
  }

  private dispatch(data: string): void {
    const message = parseInbound(data);

    switch (message.kind) {
      case "response": {
        const entry = this.take(message.id);
        if (!entry) {
          this.logger.debug({ event: "cdp_unmatched_response", id: message.id }, "cdp_unmatched_response");
          return;
        }
        if (message.error) {
          entry.reject(new HarvestError("protocol_error", `${entry.method} failed: ${message.error.message}`, {
            method: entry.method,
            id: message.id,
            remote: message.error,
          }));
          return;
        }
        entry.resolve(message.result ?? {});
        return;
      }
      case "event": {
        this.logger.debug({ event: "cdp_event", method: message.method }, "cdp_event");
        if (!this.onEvent) {
          return;
        }
        try {
          this.onEvent({ method: message.method, params: message.params });
        } catch (error) {
          this.logger.warn(
            { event: "cdp_event_sink_failed", method: message.method, error: toHarvestError(error).message },
            "cdp_event_sink_failed",
          );
        }
        return;
      }
      case "malformed":
        this.logger.warn({ event: "cdp_malformed_message", reason: message.reason }, "cdp_malformed_message");
        return;
    }
  }

  private handleTransportClosed(reason: string): void {
    if (this.closed) {
      return;
    }

    this.closed = true;
    this.closing = Promise.resolve();
    const failed = this.failPending(
      (entry) => new HarvestError("transport_error", "Control channel dropped", {
        method: entry.method,
        reason,
      }),
    );
    this.logger.warn({ event: "channel_dropped", reason, failedPending: failed }, "channel_dropped");
  }

  private take(id: number): PendingRequest | undefined {
    const entry = this.pending.get(id);
    if (entry) {
      this.pending.delete(id);
    }
    return entry;
  }

  private failPending(buildError: (entry: PendingRequest) => HarvestError): number {
    const entries = [...this.pending.values()];
    this.pending.clear();
    for (const entry of entries) {
      entry.reject(buildError(entry));
    }
    return entries.length;
  }
}
