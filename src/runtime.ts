/**
 * Live Call Bridge Runtime
 *
 * Creates and wires the service components:
 * - LiveSession factory (backend client)
 * - SessionPool or DirectSessionProvider (session supply)
 * - MediaStreamServer (telephony WebSocket server)
 */

import { toMediaStreamUrl } from "./call-control.js";
import { type CallBridgeConfig, resolveSystemPrompt } from "./config.js";
import { LiveSession, type SessionFactory } from "./live-session.js";
import type { Logger } from "./logger.js";
import { MediaStreamServer } from "./media-stream-server.js";
import { DirectSessionProvider, SessionPool, type SessionProvider } from "./session-pool.js";
import type { CallSessionSnapshot } from "./types.js";

/**
 * Runtime initialization parameters.
 */
export interface BridgeRuntimeParams {
  config: CallBridgeConfig;
  logger?: Logger;
  /** Override how backend sessions are built (tests) */
  createSession?: SessionFactory;
}

/**
 * Runtime instance containing all components.
 */
export interface BridgeRuntime {
  config: CallBridgeConfig;
  server: MediaStreamServer;
  provider: SessionProvider;
  pool: SessionPool | null;
  /** URL to put in the answer document's `<Stream>`; set when `serve.publicUrl` is configured */
  mediaStreamUrl?: string;
  start(): Promise<void>;
  stop(): Promise<void>;
}

/**
 * Create the bridge runtime. Nothing listens or connects until `start()`.
 */
export function createBridgeRuntime(params: BridgeRuntimeParams): BridgeRuntime {
  const { config, logger } = params;
  const systemPrompt = resolveSystemPrompt(config);
  if (!systemPrompt) {
    logger?.warn("[runtime] No system prompt configured; backend sessions use the model default");
  }

  const createSession: SessionFactory =
    params.createSession ??
    (() =>
      new LiveSession({
        apiKey: config.backend.apiKey,
        model: config.backend.model,
        url: config.backend.url,
        voice: config.backend.voice,
        activityDetection: config.backend.activityDetection,
        connectTimeoutMs: config.backend.connectTimeoutMs,
        closeTimeoutMs: config.backend.closeTimeoutMs,
        logger,
      }));

  const pool = config.pool.enabled
    ? new SessionPool({
        createSession,
        size: config.pool.size,
        systemPrompt,
        creationDelayMs: config.pool.creationDelayMs,
        maintenanceIntervalMs: config.pool.maintenanceIntervalMs,
        logger,
      })
    : null;
  const provider: SessionProvider = pool ?? new DirectSessionProvider(createSession, systemPrompt, logger);

  const mediaStreamUrl = config.serve.publicUrl
    ? toMediaStreamUrl(config.serve.publicUrl, config.serve.path)
    : undefined;

  const server = new MediaStreamServer({
    port: config.serve.port,
    bind: config.serve.bind,
    path: config.serve.path,
    maxConnectionsPerMinute: config.serve.maxConnectionsPerMinute,
    pingIntervalMs: config.serve.pingIntervalMs,
    interTurnDelayMs: config.bridge.interTurnDelayMs,
    transportCloseTimeoutMs: config.bridge.transportCloseTimeoutMs,
    provider,
    logger,
  });

  const onCallStarted = (snapshot: CallSessionSnapshot): void => {
    const stats = pool?.getStats();
    logger?.info(
      `[runtime] Call ${snapshot.callSid} bridged` +
        (stats ? ` (pool: ${stats.available} available, ${stats.inUse} in use)` : ""),
    );
  };
  const onCallEnded = (snapshot: CallSessionSnapshot): void => {
    const seconds = ((snapshot.endedAt ?? Date.now()) - snapshot.startedAt) / 1000;
    logger?.info(`[runtime] Call ${snapshot.callSid ?? "unknown"} ended after ${seconds.toFixed(1)}s (${snapshot.endReason})`);
  };

  let started = false;

  return {
    config,
    server,
    provider,
    pool,
    mediaStreamUrl,

    async start() {
      if (started) return;
      started = true;
      server.on("callStarted", onCallStarted);
      server.on("callEnded", onCallEnded);

      if (pool) {
        try {
          await pool.start();
        } catch (err) {
          // calls still work, each connecting on demand
          logger?.error("[runtime] Session pool failed to start", err);
        }
      }
      await server.start();
      logger?.info(`[runtime] Media stream server ready on port ${server.getPort()}${config.serve.path}`);
      if (mediaStreamUrl) {
        logger?.info(`[runtime] Telephony provider should stream to ${mediaStreamUrl}`);
      }
    },

    async stop() {
      if (!started) return;
      started = false;
      try {
        await server.stop();
      } finally {
        server.off("callStarted", onCallStarted);
        server.off("callEnded", onCallEnded);
        await pool?.stop();
      }
      logger?.info("[runtime] Stopped");
    },
  };
}
