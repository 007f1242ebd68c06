/**
 * Service entry point: configuration from the environment, stop on SIGINT/SIGTERM.
 */

import { loadConfigFromEnv } from "./config.js";
import { createLogger } from "./logger.js";
import { createBridgeRuntime } from "./runtime.js";

async function main(): Promise<void> {
  const config = loadConfigFromEnv();
  const logger = createLogger({ name: "live-call-bridge", level: config.logLevel });
  const runtime = createBridgeRuntime({ config, logger });

  let stopping = false;
  const shutdown = (signal: string): void => {
    if (stopping) return;
    stopping = true;
    logger.info(`[main] ${signal} received, shutting down`);
    runtime.stop().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error("[main] Shutdown failed", err);
        process.exit(1);
      },
    );
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));

  await runtime.start();
}

main().catch((err: unknown) => {
  console.error("live-call-bridge failed to start:", err);
  process.exit(1);
});
