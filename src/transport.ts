/**
 * Media transport abstraction between the call bridge and the telephony
 * WebSocket, so the bridge can run against an in-memory transport in tests.
 */

import WebSocket from "ws";
import { AsyncQueue } from "./async-queue.js";
import { withTimeout } from "./cancellation-token.js";
import type { Logger } from "./logger.js";

export interface MediaTransport {
  /** Inbound text messages in arrival order; ends when the peer disconnects. */
  messages(): AsyncIterable<string>;
  /** Returns false when the transport is no longer open. */
  send(message: string): boolean;
  /** Close, waiting at most `timeoutMs` for the peer. Never rejects. */
  close(timeoutMs: number): Promise<void>;
  isOpen(): boolean;
}

/**
 * MediaTransport over an accepted `ws` connection.
 */
export class WebSocketTransport implements MediaTransport {
  private readonly inbound = new AsyncQueue<string>();
  private closed = false;

  constructor(
    private readonly ws: WebSocket,
    private readonly logger?: Logger,
  ) {
    ws.on("message", (data: WebSocket.RawData, isBinary: boolean) => {
      if (isBinary) {
        this.logger?.warn("[WebSocketTransport] Ignoring binary frame");
        return;
      }
      this.inbound.push(Buffer.isBuffer(data) ? data.toString("utf8") : Buffer.concat(toBuffers(data)).toString("utf8"));
    });
    ws.on("close", () => {
      this.closed = true;
      this.inbound.close();
    });
    ws.on("error", (error: Error) => {
      this.logger?.warn("[WebSocketTransport] Socket error", error);
    });
  }

  messages(): AsyncIterable<string> {
    return this.inbound;
  }

  send(message: string): boolean {
    if (this.ws.readyState !== WebSocket.OPEN) {
      return false;
    }
    this.ws.send(message);
    return true;
  }

  isOpen(): boolean {
    return !this.closed && this.ws.readyState === WebSocket.OPEN;
  }

  async close(timeoutMs: number): Promise<void> {
    this.inbound.close();
    if (this.ws.readyState === WebSocket.CLOSED) {
      this.closed = true;
      return;
    }

    const closed = new Promise<boolean>((resolve) => this.ws.once("close", () => resolve(true)));
    if (this.ws.readyState !== WebSocket.CLOSING) {
      this.ws.close(1000);
    }
    const done = await withTimeout(closed, timeoutMs, false);
    if (!done) {
      this.logger?.warn(`[WebSocketTransport] Close timed out after ${timeoutMs}ms, terminating`);
      this.ws.terminate();
    }
    this.closed = true;
  }
}

function toBuffers(data: ArrayBuffer | Buffer[]): Buffer[] {
  return Array.isArray(data) ? data : [Buffer.from(data)];
}
