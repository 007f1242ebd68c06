/**
 * Media Stream Server
 *
 * WebSocket server accepting telephony media streams. Each connection gets
 * its own CallBridge, which runs until the stream stops or the peer goes away.
 */

import { EventEmitter } from "node:events";
import type { AddressInfo } from "node:net";
import { WebSocket, WebSocketServer } from "ws";
import { CallBridge } from "./call-bridge.js";
import type { Logger } from "./logger.js";
import type { SessionProvider } from "./session-pool.js";
import { WebSocketTransport } from "./transport.js";
import type { CallSessionSnapshot } from "./types.js";

export interface MediaStreamServerConfig {
  /** Port to listen on (0 picks a free port) */
  port: number;
  /** Bind address (default: 0.0.0.0) */
  bind?: string;
  /** WebSocket path (default: /media-stream) */
  path?: string;
  provider: SessionProvider;
  /** Connection attempts allowed per minute per IP (0 disables the limit) */
  maxConnectionsPerMinute?: number;
  /** Keep-alive ping interval */
  pingIntervalMs?: number;
  interTurnDelayMs?: number;
  transportCloseTimeoutMs?: number;
  logger?: Logger;
}

/**
 * Rate limiting tracker for connection attempts.
 */
interface RateLimitEntry {
  count: number;
  resetAt: number;
}

/** Max message size in bytes (1MB) */
const MAX_PAYLOAD = 1024 * 1024;

/**
 * Events:
 * - `callStarted` (snapshot) once a stream is bridged to a backend session
 * - `callEnded` (snapshot) after the call's cleanup
 */
export class MediaStreamServer extends EventEmitter {
  private wss: WebSocketServer | null = null;
  private readonly bridges = new Map<string, { bridge: CallBridge; done: Promise<CallSessionSnapshot> }>();
  private readonly alive = new WeakSet<WebSocket>();
  private connectionAttempts: Map<string, RateLimitEntry> = new Map();
  private pingInterval?: NodeJS.Timeout;
  private nextConnectionId = 0;
  private readonly config: MediaStreamServerConfig;
  private logger?: Logger;

  constructor(config: MediaStreamServerConfig) {
    super();
    this.config = config;
    this.logger = config.logger;
  }

  /**
   * Start listening. Resolves once the port is bound.
   */
  async start(): Promise<void> {
    if (this.wss) return;

    return new Promise((resolve, reject) => {
      const wss = new WebSocketServer({
        port: this.config.port,
        host: this.config.bind ?? "0.0.0.0",
        path: this.config.path ?? "/media-stream",
        maxPayload: MAX_PAYLOAD,
        verifyClient: (info, callback) => {
          const ip = info.req.socket.remoteAddress ?? "unknown";
          if (!this.admit(ip)) {
            this.logger?.warn(`[MediaStreamServer] Rate limit exceeded for IP: ${ip}`);
            callback(false, 429, "Too Many Requests");
            return;
          }
          callback(true);
        },
      });
      this.wss = wss;

      wss.on("connection", (ws: WebSocket) => {
        this.handleConnection(ws);
      });

      wss.once("listening", () => {
        this.pingInterval = setInterval(() => this.checkAlive(), this.config.pingIntervalMs ?? 30000);
        this.logger?.info(`[MediaStreamServer] Listening on ${this.config.bind ?? "0.0.0.0"}:${this.getPort()}`);
        resolve();
      });

      wss.once("error", (error: Error) => {
        this.wss = null;
        reject(error);
      });
    });
  }

  /**
   * Stop accepting streams, end every active call and wait for its cleanup.
   */
  async stop(): Promise<void> {
    if (this.pingInterval) {
      clearInterval(this.pingInterval);
      this.pingInterval = undefined;
    }

    const active = [...this.bridges.values()];
    await Promise.all(active.map(({ bridge }) => bridge.shutdown()));
    await Promise.all(active.map(({ done }) => done));
    this.connectionAttempts.clear();

    const wss = this.wss;
    this.wss = null;
    if (wss) {
      await new Promise<void>((resolve) => wss.close(() => resolve()));
    }
    this.logger?.info(`[MediaStreamServer] Stopped (${active.length} call(s) ended)`);
  }

  /**
   * Bound port (useful when configured with port 0).
   */
  getPort(): number {
    const address = this.wss?.address();
    return isAddressInfo(address) ? address.port : this.config.port;
  }

  getActiveCallCount(): number {
    return this.bridges.size;
  }

  getSession(callSid: string): CallSessionSnapshot | undefined {
    for (const { bridge } of this.bridges.values()) {
      const snapshot = bridge.getSnapshot();
      if (snapshot.callSid === callSid) return snapshot;
    }
    return undefined;
  }

  private handleConnection(ws: WebSocket): void {
    const connectionId = `conn-${++this.nextConnectionId}`;
    this.logger?.info(`[MediaStreamServer] Stream connected: ${connectionId}`);

    this.alive.add(ws);
    ws.on("pong", () => {
      this.alive.add(ws);
    });

    const bridge = new CallBridge({
      transport: new WebSocketTransport(ws, this.logger),
      provider: this.config.provider,
      interTurnDelayMs: this.config.interTurnDelayMs,
      transportCloseTimeoutMs: this.config.transportCloseTimeoutMs,
      logger: this.logger,
    });
    bridge.on("streamStarted", (snapshot: CallSessionSnapshot) => {
      this.emit("callStarted", snapshot);
    });

    const done = bridge.run().then((snapshot) => {
      this.bridges.delete(connectionId);
      this.logger?.info(`[MediaStreamServer] Stream disconnected: ${connectionId} (${snapshot.endReason})`);
      this.emit("callEnded", snapshot);
      return snapshot;
    });
    this.bridges.set(connectionId, { bridge, done });
  }

  private checkAlive(): void {
    for (const ws of this.wss?.clients ?? []) {
      if (!this.alive.has(ws)) {
        this.logger?.warn("[MediaStreamServer] Terminating unresponsive WebSocket");
        ws.terminate();
        continue;
      }
      this.alive.delete(ws);
      ws.ping();
    }
  }

  private admit(ip: string): boolean {
    const limit = this.config.maxConnectionsPerMinute ?? 0;
    if (limit <= 0) return true;

    const now = Date.now();
    const attempts = this.connectionAttempts.get(ip);
    if (!attempts || now >= attempts.resetAt) {
      this.connectionAttempts.set(ip, { count: 1, resetAt: now + 60000 });
      return true;
    }
    if (attempts.count >= limit) {
      return false;
    }
    attempts.count++;
    return true;
  }
}

function isAddressInfo(address: AddressInfo | string | null | undefined): address is AddressInfo {
  return typeof address === "object" && address !== null;
}
