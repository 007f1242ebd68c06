/**
 * Live API Session
 *
 * WebSocket session with the streaming speech-to-speech backend
 * (BidiGenerateContent). The backend does its own voice activity detection,
 * so the bridge only streams caller audio in and relays synthesized audio out.
 *
 * Audio Pipeline:
 *   Caller audio (16kHz PCM) → realtimeInput → model → inlineData (24kHz PCM)
 *
 * Lifecycle:
 *   1. connect() → open socket, send `setup`, wait for `setupComplete`
 *   2. sendAudio() as caller frames arrive
 *   3. receiveResponses() once per model turn; re-invoke after it ends
 *   4. close()
 */

import { randomUUID } from "node:crypto";
import WebSocket from "ws";
import { AsyncQueue } from "./async-queue.js";
import { withTimeout } from "./cancellation-token.js";
import type { Logger } from "./logger.js";
import type { ResponseChunk } from "./types.js";

export const DEFAULT_LIVE_URL =
  "wss://generativelanguage.googleapis.com/ws/google.ai.generativelanguage.v1beta.GenerativeService.BidiGenerateContent";

/** Output rate assumed when a response part's mime type carries none. */
export const DEFAULT_RESPONSE_SAMPLE_RATE = 24000;

export type BackendSessionState = "disconnected" | "connected" | "closed";

/**
 * Backend session contract used by the pool and the call bridge.
 */
export interface BackendSession {
  readonly id: string;
  readonly state: BackendSessionState;
  /** Resolves false on any failure; never rejects. */
  connect(systemPrompt?: string): Promise<boolean>;
  isConnected(): boolean;
  /** Resolves false (without throwing) when the audio could not be sent. */
  sendAudio(pcm16: Buffer, sampleRate: number): Promise<boolean>;
  /**
   * Audio for the current model turn, in arrival order. Ends at turn
   * completion, on session close, or when the signal aborts.
   */
  receiveResponses(signal?: AbortSignal): AsyncGenerator<ResponseChunk, void, undefined>;
  /** Idempotent and bounded in time. */
  close(): Promise<void>;
}

export type SessionFactory = () => BackendSession;

export type ActivitySensitivity = "high" | "low";

export interface ActivityDetectionConfig {
  disabled: boolean;
  startSensitivity: ActivitySensitivity;
  endSensitivity: ActivitySensitivity;
  prefixPaddingMs: number;
  silenceDurationMs: number;
}

/**
 * Configuration for a live session.
 */
export interface LiveSessionConfig {
  apiKey: string;
  model: string;
  /** WebSocket endpoint; the API key is appended as `key` */
  url?: string;
  voice?: string;
  activityDetection?: ActivityDetectionConfig;
  connectTimeoutMs?: number;
  closeTimeoutMs?: number;
  logger?: Logger;
}

type ServerEvent = { kind: "audio"; chunk: ResponseChunk } | { kind: "turnComplete" };

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function rawToString(data: WebSocket.RawData): string {
  if (Buffer.isBuffer(data)) return data.toString("utf8");
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  return Buffer.from(data).toString("utf8");
}

/**
 * Sample rate from a mime type such as `audio/pcm;rate=24000`.
 */
export function parseSampleRate(mimeType: string, fallback = DEFAULT_RESPONSE_SAMPLE_RATE): number {
  const match = /rate=(\d+)/i.exec(mimeType);
  const rate = match ? Number(match[1]) : NaN;
  return Number.isInteger(rate) && rate > 0 ? rate : fallback;
}

function sensitivity(kind: "START" | "END", value: ActivitySensitivity): string {
  return `${kind}_SENSITIVITY_${value.toUpperCase()}`;
}

/**
 * Build the `setup` message opening a session.
 */
export function buildSetupMessage(
  config: Pick<LiveSessionConfig, "model" | "voice" | "activityDetection">,
  systemPrompt?: string,
): JsonObject {
  const generationConfig: JsonObject = { responseModalities: ["AUDIO"] };
  if (config.voice) {
    generationConfig.speechConfig = {
      voiceConfig: { prebuiltVoiceConfig: { voiceName: config.voice } },
    };
  }

  const setup: JsonObject = {
    model: config.model.startsWith("models/") ? config.model : `models/${config.model}`,
    generationConfig,
  };

  if (systemPrompt) {
    setup.systemInstruction = { parts: [{ text: systemPrompt }] };
  }

  const vad = config.activityDetection;
  if (vad) {
    setup.realtimeInputConfig = {
      automaticActivityDetection: {
        disabled: vad.disabled,
        startOfSpeechSensitivity: sensitivity("START", vad.startSensitivity),
        endOfSpeechSensitivity: sensitivity("END", vad.endSensitivity),
        prefixPaddingMs: vad.prefixPaddingMs,
        silenceDurationMs: vad.silenceDurationMs,
      },
    };
  }

  return { setup };
}

/**
 * Live API session over a raw WebSocket.
 */
export class LiveSession implements BackendSession {
  readonly id = randomUUID();
  private ws: WebSocket | null = null;
  private _state: BackendSessionState = "disconnected";
  private readonly config: LiveSessionConfig;
  private readonly events = new AsyncQueue<ServerEvent>();
  private closing: Promise<void> | null = null;
  private logger?: Logger;
  private audioChunksSent = 0;

  constructor(config: LiveSessionConfig) {
    this.config = config;
    this.logger = config.logger;
  }

  get state(): BackendSessionState {
    return this._state;
  }

  /**
   * Open the socket and complete the setup handshake.
   */
  connect(systemPrompt?: string): Promise<boolean> {
    if (this._state === "connected") {
      return Promise.resolve(true);
    }
    if (this._state === "closed" || this.ws) {
      return Promise.resolve(false);
    }

    let ws: WebSocket;
    try {
      ws = new WebSocket(this.endpoint());
    } catch (err) {
      this.logger?.error(`[LiveSession] ${this.id} failed to open socket`, err);
      this._state = "closed";
      this.events.close();
      return Promise.resolve(false);
    }
    this.ws = ws;

    return new Promise<boolean>((resolve) => {
      let settled = false;
      const settle = (ok: boolean): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        resolve(ok);
      };

      const timer = setTimeout(() => {
        this.logger?.warn(`[LiveSession] ${this.id} setup timed out`);
        this._state = "closed";
        this.events.close();
        ws.terminate();
        settle(false);
      }, this.config.connectTimeoutMs ?? 15000);

      ws.on("open", () => {
        this.logger?.debug(`[LiveSession] ${this.id} socket open, sending setup`);
        ws.send(JSON.stringify(buildSetupMessage(this.config, systemPrompt)));
      });

      ws.on("message", (data: WebSocket.RawData) => {
        const message = this.parseServerMessage(data);
        if (!message) return;
        if ("setupComplete" in message) {
          if (this._state === "disconnected") {
            this._state = "connected";
            this.logger?.info(`[LiveSession] ${this.id} connected (${this.config.model})`);
          }
          settle(this._state === "connected");
          return;
        }
        this.handleServerMessage(message);
      });

      ws.on("error", (error: Error) => {
        this.logger?.error(`[LiveSession] ${this.id} WebSocket error`, error);
        settle(false);
      });

      ws.on("close", (code: number, reason: Buffer) => {
        const reasonStr = reason.toString() || "none";
        this.logger?.debug(`[LiveSession] ${this.id} socket closed (code: ${code}, reason: ${reasonStr})`);
        this._state = "closed";
        this.events.close();
        settle(false);
      });
    });
  }

  isConnected(): boolean {
    return this._state === "connected" && this.ws?.readyState === WebSocket.OPEN;
  }

  async sendAudio(pcm16: Buffer, sampleRate: number): Promise<boolean> {
    const ws = this.ws;
    if (!ws || !this.isConnected()) {
      return false;
    }

    const message = JSON.stringify({
      realtimeInput: {
        audio: { data: pcm16.toString("base64"), mimeType: `audio/pcm;rate=${sampleRate}` },
      },
    });

    return new Promise<boolean>((resolve) => {
      try {
        ws.send(message, (err?: Error) => {
          if (err) {
            this.logger?.warn(`[LiveSession] ${this.id} audio send failed`, err);
            resolve(false);
          } else {
            this.audioChunksSent++;
            resolve(true);
          }
        });
      } catch (err) {
        this.logger?.warn(`[LiveSession] ${this.id} audio send failed`, err);
        resolve(false);
      }
    });
  }

  async *receiveResponses(signal?: AbortSignal): AsyncGenerator<ResponseChunk, void, undefined> {
    while (true) {
      const event = await this.events.shift(signal);
      if (!event || event.kind === "turnComplete") {
        return;
      }
      yield event.chunk;
    }
  }

  close(): Promise<void> {
    if (!this.closing) {
      this.closing = this.doClose();
    }
    return this.closing;
  }

  private async doClose(): Promise<void> {
    const ws = this.ws;
    this._state = "closed";
    this.events.close();
    if (!ws || ws.readyState === WebSocket.CLOSED) {
      return;
    }

    const closed = new Promise<boolean>((resolve) => ws.once("close", () => resolve(true)));
    ws.close(1000, "session closed");
    const done = await withTimeout(closed, this.config.closeTimeoutMs ?? 5000, false);
    if (!done) {
      this.logger?.warn(`[LiveSession] ${this.id} close timed out, terminating socket`);
      ws.terminate();
    }
    this.logger?.debug(`[LiveSession] ${this.id} closed after ${this.audioChunksSent} audio chunks`);
  }

  private endpoint(): string {
    const url = new URL(this.config.url ?? DEFAULT_LIVE_URL);
    if (this.config.apiKey) {
      url.searchParams.set("key", this.config.apiKey);
    }
    return url.toString();
  }

  private parseServerMessage(data: WebSocket.RawData): JsonObject | null {
    try {
      const parsed: unknown = JSON.parse(rawToString(data));
      if (isObject(parsed)) return parsed;
      this.logger?.warn(`[LiveSession] ${this.id} ignoring non-object message`);
    } catch (err) {
      this.logger?.error(`[LiveSession] ${this.id} failed to parse message`, err);
    }
    return null;
  }

  /**
   * Route server content: audio parts are queued for the current turn,
   * text and transcriptions are only logged.
   */
  private handleServerMessage(message: JsonObject): void {
    if (isObject(message.goAway)) {
      this.logger?.warn(`[LiveSession] ${this.id} server going away (timeLeft: ${String(message.goAway.timeLeft)})`);
      return;
    }

    const content = message.serverContent;
    if (!isObject(content)) {
      return;
    }

    if (content.interrupted === true) {
      this.logger?.info(`[LiveSession] ${this.id} model turn interrupted`);
    }

    const turn = content.modelTurn;
    if (isObject(turn) && Array.isArray(turn.parts)) {
      for (const part of turn.parts) {
        if (!isObject(part)) continue;
        const inline = part.inlineData;
        if (isObject(inline) && typeof inline.data === "string") {
          const mimeType = typeof inline.mimeType === "string" ? inline.mimeType : "audio/pcm";
          this.events.push({
            kind: "audio",
            chunk: {
              data: Buffer.from(inline.data, "base64"),
              sampleRate: parseSampleRate(mimeType),
              mimeType,
            },
          });
        } else if (typeof part.text === "string") {
          this.logger?.debug(`[LiveSession] ${this.id} model text: ${part.text.slice(0, 200)}`);
        }
      }
    }

    for (const key of ["inputTranscription", "outputTranscription"] as const) {
      const transcription = content[key];
      if (isObject(transcription) && typeof transcription.text === "string") {
        this.logger?.debug(`[LiveSession] ${this.id} ${key}: ${transcription.text}`);
      }
    }

    if (content.turnComplete === true) {
      this.events.push({ kind: "turnComplete" });
    }
  }
}
