import WebSocket from "ws";
import { HarvestError } from "../errors.js";

/**
 * Bidirectional text-frame stream underneath the control channel.
 */
export interface ChannelTransport {
  send(data: string): Promise<void>;
  close(): Promise<void>;
  onMessage(handler: (data: string) => void): void;
  onClose(handler: (reason: string) => void): void;
}

export interface WebSocketTransportOptions {
  connectTimeoutMs: number;
}

const MAX_FRAME_BYTES = 256 * 1024 * 1024;

class WebSocketTransport implements ChannelTransport {
  private lastError: string | null = null;

  public constructor(private readonly socket: WebSocket) {
    // ws emits "error" right before "close"; keep it for the close reason.
    this.socket.on("error", (error: Error) => {
      this.lastError = error.message;
    });
  }

  public send(data: string): Promise<void> {
    return new Promise((resolve, reject) => {
      this.socket.send(data, (error) => {
        if (error) {
          reject(new HarvestError("transport_error", "Failed to write to control channel", {
            rawMessage: error.message,
          }));
          return;
        }
        resolve();
      });
    });
  }

  public close(): Promise<void> {
    if (this.socket.readyState === WebSocket.CLOSED) {
      return Promise.resolve();
    }

    return new Promise((resolve) => {
      this.socket.once("close", () => resolve());
      this.socket.close();
    });
  }

  public onMessage(handler: (data: string) => void): void {
    this.socket.on("message", (data: WebSocket.RawData) => {
      handler(data.toString());
    });
  }

  public onClose(handler: (reason: string) => void): void {
    this.socket.on("close", (code: number, reason: Buffer) => {
      if (reason.length > 0) {
        handler(reason.toString());
        return;
      }
      handler(this.lastError ?? `code ${code}`);
    });
  }
}

export function openWebSocketTransport(
  address: string,
  options: WebSocketTransportOptions,
): Promise<ChannelTransport> {
  return new Promise((resolve, reject) => {
    // DevTools frames can be large (full DOM snapshots).
    const socket = new WebSocket(address, { perMessageDeflate: false, maxPayload: MAX_FRAME_BYTES });

    const timeout = setTimeout(() => {
      socket.terminate();
      reject(new HarvestError("transport_error", "Timed out connecting to control channel", {
        address,
        timeoutMs: options.connectTimeoutMs,
      }));
    }, options.connectTimeoutMs);

    socket.once("open", () => {
      clearTimeout(timeout);
      resolve(new WebSocketTransport(socket));
    });

    socket.once("error", (error: Error) => {
      clearTimeout(timeout);
      reject(new HarvestError("transport_error", "Control channel is unreachable", {
        address,
        rawMessage: error.message,
      }));
    });
  });
}
