/**
 * Live Call Bridge Configuration
 *
 * Zod schemas for the service configuration, plus loading from environment
 * variables.
 */

import { readFileSync } from "node:fs";
import { z } from "zod";
import { DEFAULT_LIVE_URL } from "./live-session.js";

/**
 * WebSocket server configuration.
 */
export const ServeConfigSchema = z.object({
  /** Port to listen on (default: 8080) */
  port: z.number().int().min(0).max(65535).default(8080),
  /** Bind address (default: 0.0.0.0) */
  bind: z.string().default("0.0.0.0"),
  /** Media stream WebSocket path */
  path: z.string().startsWith("/").default("/media-stream"),
  /** Public base URL the telephony provider reaches us on (http(s)://host) */
  publicUrl: z.string().url().optional(),
  /** Connection attempts per minute per IP, 0 = unlimited */
  maxConnectionsPerMinute: z.number().int().min(0).default(0),
  pingIntervalMs: z.number().int().min(1000).default(30000),
});

/**
 * Backend voice activity detection.
 */
export const ActivityDetectionSchema = z.object({
  disabled: z.boolean().default(false),
  startSensitivity: z.enum(["high", "low"]).default("high"),
  endSensitivity: z.enum(["high", "low"]).default("high"),
  /** Audio kept before detected speech start */
  prefixPaddingMs: z.number().int().min(0).max(2000).default(20),
  /** Silence that ends the caller's turn */
  silenceDurationMs: z.number().int().min(0).max(5000).default(250),
});

/**
 * Streaming AI backend configuration.
 */
export const BackendConfigSchema = z.object({
  apiKey: z.string().min(1, "backend.apiKey is required"),
  model: z.string().min(1).default("gemini-live-2.5-flash-preview"),
  url: z.string().url().default(DEFAULT_LIVE_URL),
  /** Prebuilt voice name; backend default when unset */
  voice: z.string().optional(),
  activityDetection: ActivityDetectionSchema.default({}),
  connectTimeoutMs: z.number().int().min(100).default(15000),
  closeTimeoutMs: z.number().int().min(100).default(5000),
});

/**
 * Pre-connected backend session pool.
 */
export const PoolConfigSchema = z.object({
  /** When off, every call connects its own session */
  enabled: z.boolean().default(true),
  size: z.number().int().min(0).max(50).default(2),
  creationDelayMs: z.number().int().min(0).default(500),
  maintenanceIntervalMs: z.number().int().min(1000).default(30000),
});

/**
 * Per-call relay behaviour.
 */
export const BridgeConfigSchema = z.object({
  /** Pause after a backend turn before listening for the next one */
  interTurnDelayMs: z.number().int().min(0).max(5000).default(50),
  transportCloseTimeoutMs: z.number().int().min(100).default(5000),
});

export const LogLevelSchema = z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]);

/**
 * Complete service configuration.
 */
export const CallBridgeConfigSchema = z.object({
  serve: ServeConfigSchema.default({}),
  backend: BackendConfigSchema,
  pool: PoolConfigSchema.default({}),
  bridge: BridgeConfigSchema.default({}),
  /** Inline system prompt; takes precedence over systemPromptFile */
  systemPrompt: z.string().optional(),
  systemPromptFile: z.string().optional(),
  logLevel: LogLevelSchema.default("info"),
});

export type CallBridgeConfig = z.infer<typeof CallBridgeConfigSchema>;

/**
 * Validate and parse a raw config object.
 *
 * @throws ZodError when the config is invalid
 */
export function parseBridgeConfig(raw: unknown): CallBridgeConfig {
  return CallBridgeConfigSchema.parse(raw);
}

type Env = Record<string, string | undefined>;

function envInt(env: Env, name: string): number | undefined {
  const value = env[name]?.trim();
  return value ? Number(value) : undefined;
}

function envBool(env: Env, name: string): boolean | undefined {
  const value = env[name]?.trim().toLowerCase();
  if (!value) return undefined;
  if (["1", "true", "yes", "on"].includes(value)) return true;
  if (["0", "false", "no", "off"].includes(value)) return false;
  throw new Error(`${name} must be a boolean, got '${env[name]}'`);
}

function envStr(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

/**
 * Build the configuration from environment variables.
 *
 * | Variable | Setting |
 * |---|---|
 * | `PORT` / `CALL_BRIDGE_PORT` | serve.port |
 * | `CALL_BRIDGE_BIND`, `CALL_BRIDGE_PATH`, `CALL_BRIDGE_PUBLIC_URL` | serve.* |
 * | `GEMINI_API_KEY`, `GEMINI_MODEL`, `GEMINI_LIVE_URL`, `GEMINI_VOICE` | backend.* |
 * | `CALL_BRIDGE_POOL_ENABLED`, `CALL_BRIDGE_POOL_SIZE` | pool.* |
 * | `CALL_BRIDGE_SYSTEM_PROMPT`, `CALL_BRIDGE_SYSTEM_PROMPT_FILE` | system prompt |
 * | `LOG_LEVEL` | logLevel |
 */
export function loadConfigFromEnv(env: Env = process.env): CallBridgeConfig {
  return parseBridgeConfig({
    serve: {
      port: envInt(env, "CALL_BRIDGE_PORT") ?? envInt(env, "PORT"),
      bind: envStr(env, "CALL_BRIDGE_BIND"),
      path: envStr(env, "CALL_BRIDGE_PATH"),
      publicUrl: envStr(env, "CALL_BRIDGE_PUBLIC_URL"),
    },
    backend: {
      apiKey: envStr(env, "GEMINI_API_KEY") ?? "",
      model: envStr(env, "GEMINI_MODEL"),
      url: envStr(env, "GEMINI_LIVE_URL"),
      voice: envStr(env, "GEMINI_VOICE"),
    },
    pool: {
      enabled: envBool(env, "CALL_BRIDGE_POOL_ENABLED"),
      size: envInt(env, "CALL_BRIDGE_POOL_SIZE"),
    },
    systemPrompt: envStr(env, "CALL_BRIDGE_SYSTEM_PROMPT"),
    systemPromptFile: envStr(env, "CALL_BRIDGE_SYSTEM_PROMPT_FILE"),
    logLevel: envStr(env, "LOG_LEVEL"),
  });
}

/**
 * The system prompt sent when a backend session is set up.
 *
 * @throws Error when a prompt file is configured but missing or empty
 */
export function resolveSystemPrompt(config: Pick<CallBridgeConfig, "systemPrompt" | "systemPromptFile">): string | undefined {
  if (config.systemPrompt?.trim()) {
    return config.systemPrompt.trim();
  }
  if (!config.systemPromptFile) {
    return undefined;
  }

  const prompt = readFileSync(config.systemPromptFile, "utf8").trim();
  if (!prompt) {
    throw new Error(`System prompt file '${config.systemPromptFile}' is empty`);
  }
  return prompt;
}
