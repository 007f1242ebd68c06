/**
 * Backend Session Pool
 *
 * Keeps a small stock of already-connected backend sessions so an incoming
 * call can start streaming without waiting for the backend handshake.
 *
 * - acquire() hands out the oldest available session, or connects a fresh
 *   one when the stock is empty or the popped session has gone stale.
 * - release() always closes the session; sessions are never reused across calls.
 * - A background refill tops the stock back up. Refills are serialized so
 *   depth is always computed from one consistent view.
 */

import { CancellationToken, sleep } from "./cancellation-token.js";
import type { BackendSession, SessionFactory } from "./live-session.js";
import type { Logger } from "./logger.js";

/**
 * Source of backend sessions for calls.
 */
export interface SessionProvider {
  /** Returns null when no connected session could be obtained. */
  acquire(callId: string): Promise<BackendSession | null>;
  /** Closes the session held for the call. Unknown ids are a no-op. */
  release(callId: string): Promise<void>;
}

export interface SessionPoolConfig {
  createSession: SessionFactory;
  /** Target number of idle + in-use sessions */
  size: number;
  systemPrompt?: string;
  /** Pause between consecutive creations during a refill */
  creationDelayMs?: number;
  maintenanceIntervalMs?: number;
  logger?: Logger;
}

export interface PoolStats {
  available: number;
  inUse: number;
  targetSize: number;
  running: boolean;
}

/**
 * Connects a new session for each call; nothing is kept warm.
 */
export class DirectSessionProvider implements SessionProvider {
  private readonly sessions = new Map<string, BackendSession>();

  constructor(
    private readonly createSession: SessionFactory,
    private readonly systemPrompt?: string,
    private readonly logger?: Logger,
  ) {}

  async acquire(callId: string): Promise<BackendSession | null> {
    await this.release(callId);
    const session = this.createSession();
    if (!(await session.connect(this.systemPrompt))) {
      this.logger?.error(`[DirectSessionProvider] Backend connect failed for call ${callId}`);
      await closeQuietly(session, this.logger);
      return null;
    }
    this.sessions.set(callId, session);
    return session;
  }

  async release(callId: string): Promise<void> {
    const session = this.sessions.get(callId);
    if (!session) return;
    this.sessions.delete(callId);
    await closeQuietly(session, this.logger);
  }

  getActiveCount(): number {
    return this.sessions.size;
  }
}

/**
 * Pool of pre-connected backend sessions.
 */
export class SessionPool implements SessionProvider {
  private available: BackendSession[] = [];
  private inUse = new Map<string, BackendSession>();
  private running = false;
  private stopping = false;
  private maintenance: CancellationToken | null = null;
  private maintenanceLoop: Promise<void> | null = null;
  private refilling: Promise<void> | null = null;
  private refillRequested = false;
  private readonly creationDelayMs: number;
  private readonly maintenanceIntervalMs: number;
  private logger?: Logger;

  constructor(private readonly config: SessionPoolConfig) {
    if (!Number.isInteger(config.size) || config.size < 0) {
      throw new RangeError(`Pool size must be a non-negative integer, got ${config.size}`);
    }
    this.creationDelayMs = config.creationDelayMs ?? 500;
    this.maintenanceIntervalMs = config.maintenanceIntervalMs ?? 30000;
    this.logger = config.logger;
  }

  /**
   * Fill the pool once, then keep it topped up in the background.
   */
  async start(): Promise<void> {
    if (this.running) return;
    this.running = true;
    this.stopping = false;
    this.logger?.info(`[SessionPool] Starting (target size ${this.config.size})`);

    // created before the first fill so a stop() during it can cancel
    const token = new CancellationToken();
    this.maintenance = token;

    await this.refill();
    if (token.isCancelled()) return;

    this.maintenanceLoop = this.runMaintenance(token);
  }

  async acquire(callId: string): Promise<BackendSession | null> {
    if (this.inUse.has(callId)) {
      this.logger?.warn(`[SessionPool] Call ${callId} already holds a session, releasing it first`);
      await this.release(callId);
    }

    let session = this.available.shift();
    if (session && !session.isConnected()) {
      this.logger?.warn(`[SessionPool] Discarding stale session ${session.id}`);
      void closeQuietly(session, this.logger);
      session = undefined;
    }

    if (!session) {
      this.logger?.info(`[SessionPool] No idle session for call ${callId}, connecting on demand`);
      const fresh = await this.createConnected();
      if (!fresh) {
        this.requestRefill();
        return null;
      }
      session = fresh;
    }

    this.inUse.set(callId, session);
    this.logger?.debug(
      `[SessionPool] Session ${session.id} → call ${callId} (available: ${this.available.length}, in use: ${this.inUse.size})`,
    );
    this.requestRefill();
    return session;
  }

  async release(callId: string): Promise<void> {
    const session = this.inUse.get(callId);
    if (!session) return;
    this.inUse.delete(callId);
    await closeQuietly(session, this.logger);
    this.logger?.debug(`[SessionPool] Released session ${session.id} from call ${callId}`);
    this.requestRefill();
  }

  async stop(): Promise<void> {
    if (!this.running && !this.stopping) return;
    this.running = false;
    this.stopping = true;
    this.logger?.info("[SessionPool] Stopping");

    this.maintenance?.abort();
    await this.maintenanceLoop;
    await this.refilling;

    const idle = this.available.splice(0);
    const busy = [...this.inUse.values()];
    this.inUse.clear();
    await Promise.all([...idle, ...busy].map((session) => closeQuietly(session, this.logger)));

    this.maintenance = null;
    this.maintenanceLoop = null;
    this.stopping = false;
    this.logger?.info(`[SessionPool] Stopped (closed ${idle.length} idle, ${busy.length} in use)`);
  }

  getStats(): PoolStats {
    return {
      available: this.available.length,
      inUse: this.inUse.size,
      targetSize: this.config.size,
      running: this.running,
    };
  }

  /**
   * Top the pool up to its target size. Concurrent callers share the
   * running refill, plus at most one follow-up pass.
   */
  refill(): Promise<void> {
    if (this.refilling) {
      this.refillRequested = true;
      return this.refilling;
    }
    this.refilling = this.runRefills().finally(() => {
      this.refilling = null;
    });
    return this.refilling;
  }

  private requestRefill(): void {
    if (!this.running) return;
    this.refill().catch((err: unknown) => {
      this.logger?.error("[SessionPool] Background refill failed", err);
    });
  }

  private async runRefills(): Promise<void> {
    do {
      this.refillRequested = false;
      await this.refillOnce();
    } while (this.refillRequested && !this.stopping);
  }

  private async refillOnce(): Promise<void> {
    const needed = this.config.size - this.available.length - this.inUse.size;
    if (needed <= 0) return;

    this.logger?.debug(`[SessionPool] Refilling ${needed} session(s)`);
    for (let i = 0; i < needed; i++) {
      if (this.stopping) return;
      if (i > 0 && !(await sleep(this.creationDelayMs, this.maintenance?.signal))) return;

      const session = await this.createConnected();
      if (!session) continue;
      if (this.stopping) {
        await closeQuietly(session, this.logger);
        return;
      }
      this.available.push(session);
    }
  }

  private async createConnected(): Promise<BackendSession | null> {
    let session: BackendSession;
    try {
      session = this.config.createSession();
    } catch (err) {
      this.logger?.error("[SessionPool] Session factory failed", err);
      return null;
    }

    if (await session.connect(this.config.systemPrompt)) {
      return session;
    }
    this.logger?.warn(`[SessionPool] Session ${session.id} failed to connect`);
    await closeQuietly(session, this.logger);
    return null;
  }

  private async runMaintenance(token: CancellationToken): Promise<void> {
    while (!token.isCancelled()) {
      if (!(await sleep(this.maintenanceIntervalMs, token.signal))) return;
      try {
        await this.refill();
      } catch (err) {
        this.logger?.error("[SessionPool] Maintenance refill failed", err);
      }
      const stats = this.getStats();
      this.logger?.info(
        `[SessionPool] Status: ${stats.available} available, ${stats.inUse} in use, target ${stats.targetSize}`,
      );
    }
  }
}

/**
 * Close a session, logging instead of propagating failures.
 */
export async function closeQuietly(session: BackendSession, logger?: Logger): Promise<void> {
  try {
    await session.close();
  } catch (err) {
    logger?.warn(`[SessionPool] Failed to close session ${session.id}`, err);
  }
}
