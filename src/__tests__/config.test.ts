import { describe, it, expect, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { ZodError } from "zod";
import { loadConfigFromEnv, parseBridgeConfig, resolveSystemPrompt } from "../config.js";
import { DEFAULT_LIVE_URL } from "../live-session.js";

describe("parseBridgeConfig", () => {
  it("fills defaults around the API key", () => {
    const config = parseBridgeConfig({ backend: { apiKey: "test-secret" } });

    expect(config.serve).toEqual({
      port: 8080,
      bind: "0.0.0.0",
      path: "/media-stream",
      maxConnectionsPerMinute: 0,
      pingIntervalMs: 30000,
    });
    expect(config.backend).toEqual({
      apiKey: "test-secret",
      model: "gemini-live-2.5-flash-preview",
      url: DEFAULT_LIVE_URL,
      activityDetection: {
        disabled: false,
        startSensitivity: "high",
        endSensitivity: "high",
        prefixPaddingMs: 20,
        silenceDurationMs: 250,
      },
      connectTimeoutMs: 15000,
      closeTimeoutMs: 5000,
    });
    expect(config.pool).toEqual({ enabled: true, size: 2, creationDelayMs: 500, maintenanceIntervalMs: 30000 });
    expect(config.bridge).toEqual({ interTurnDelayMs: 50, transportCloseTimeoutMs: 5000 });
    expect(config.logLevel).toBe("info");
  });

  it("requires an API key", () => {
    expect(() => parseBridgeConfig({ backend: { apiKey: "" } })).toThrow(ZodError);
    expect(() => parseBridgeConfig({})).toThrow(ZodError);
  });

  it("rejects out-of-range values", () => {
    expect(() => parseBridgeConfig({ backend: { apiKey: "test-secret" }, pool: { size: -1 } })).toThrow(ZodError);
    expect(() => parseBridgeConfig({ backend: { apiKey: "test-secret" }, serve: { path: "media" } })).toThrow(ZodError);
  });
});

describe("loadConfigFromEnv", () => {
  it("maps environment variables onto settings", () => {
    const config = loadConfigFromEnv({
      GEMINI_API_KEY: "test-secret",
      GEMINI_VOICE: "Puck",
      PORT: "9000",
      CALL_BRIDGE_PATH: "/calls",
      CALL_BRIDGE_POOL_ENABLED: "false",
      CALL_BRIDGE_POOL_SIZE: "4",
      LOG_LEVEL: "debug",
    });

    expect(config.serve.port).toBe(9000);
    expect(config.serve.path).toBe("/calls");
    expect(config.backend.voice).toBe("Puck");
    expect(config.pool).toMatchObject({ enabled: false, size: 4 });
    expect(config.logLevel).toBe("debug");
  });

  it("prefers CALL_BRIDGE_PORT over PORT", () => {
    expect(loadConfigFromEnv({ GEMINI_API_KEY: "test-secret", PORT: "9000", CALL_BRIDGE_PORT: "9100" }).serve.port).toBe(
      9100,
    );
  });

  it("rejects malformed values", () => {
    expect(() => loadConfigFromEnv({ GEMINI_API_KEY: "test-secret", CALL_BRIDGE_POOL_ENABLED: "maybe" })).toThrow(
      "CALL_BRIDGE_POOL_ENABLED must be a boolean, got 'maybe'",
    );
    expect(() => loadConfigFromEnv({ GEMINI_API_KEY: "test-secret", PORT: "http" })).toThrow(ZodError);
    expect(() => loadConfigFromEnv({})).toThrow(ZodError);
  });
});

describe("resolveSystemPrompt", () => {
  const dirs: string[] = [];

  afterEach(() => {
    for (const dir of dirs.splice(0)) rmSync(dir, { recursive: true, force: true });
  });

  function promptFile(contents: string): string {
    const dir = mkdtempSync(join(tmpdir(), "call-bridge-"));
    dirs.push(dir);
    const file = join(dir, "prompt.txt");
    writeFileSync(file, contents);
    return file;
  }

  it("prefers the inline prompt", () => {
    expect(resolveSystemPrompt({ systemPrompt: "  be brief  ", systemPromptFile: promptFile("ignored") })).toBe(
      "be brief",
    );
  });

  it("reads the prompt file", () => {
    expect(resolveSystemPrompt({ systemPrompt: "   ", systemPromptFile: promptFile("You answer calls.\n") })).toBe(
      "You answer calls.",
    );
  });

  it("rejects an empty prompt file", () => {
    const file = promptFile("\n\n");
    expect(() => resolveSystemPrompt({ systemPromptFile: file })).toThrow(`System prompt file '${file}' is empty`);
  });

  it("returns undefined when nothing is configured", () => {
    expect(resolveSystemPrompt({})).toBeUndefined();
  });
});
