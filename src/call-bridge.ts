/**
 * Call Bridge
 *
 * Drives one telephony media stream through its lifecycle and relays audio
 * between the caller and a backend session:
 *
 *   awaiting_handshake → awaiting_stream_start → bridging → draining → closed
 *
 * Audio Pipeline:
 *   Caller (8kHz μ-law) → decode → resample → backend (16kHz PCM)
 *   Backend (24kHz PCM) → resample → encode → caller (8kHz μ-law)
 *
 * The two directions run as independent tasks on the event loop and share
 * only the `isBackendSpeaking` flag. Caller audio arriving while the backend
 * is speaking clears the flag; the backend's own activity detection decides
 * whether that is a real interruption.
 */

import { EventEmitter } from "node:events";
import { decodeMuLaw, encodeMuLaw, resample } from "./audio-utils.js";
import { CancellationToken, sleep } from "./cancellation-token.js";
import type { BackendSession } from "./live-session.js";
import type { Logger } from "./logger.js";
import type { SessionProvider } from "./session-pool.js";
import {
  MessageParseError,
  buildMediaOut,
  decodeMediaPayload,
  isTelephonyMuLaw,
  parseInboundMessage,
  serializeOutboundMessage,
} from "./stream-messages.js";
import type { MediaTransport } from "./transport.js";
import type {
  CallCounters,
  CallPhase,
  CallSessionSnapshot,
  EndReason,
  InboundMessage,
  MediaFormat,
  MediaMessage,
  StartMessage,
} from "./types.js";

/** Rate the backend expects caller audio at. */
export const BACKEND_INPUT_RATE = 16000;
/** Telephony playback rate. */
export const TELEPHONY_RATE = 8000;

const PHASE_ORDER: readonly CallPhase[] = [
  "awaiting_handshake",
  "awaiting_stream_start",
  "bridging",
  "draining",
  "closed",
];

/**
 * The peer broke the stream protocol (wrong message order, bad start).
 */
export class ProtocolViolationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ProtocolViolationError";
  }
}

export interface CallBridgeOptions {
  transport: MediaTransport;
  provider: SessionProvider;
  /** Pause after each backend turn before re-subscribing */
  interTurnDelayMs?: number;
  transportCloseTimeoutMs?: number;
  logger?: Logger;
}

/**
 * One call's session state machine.
 *
 * Events:
 * - `phase` ({ from, to })
 * - `streamStarted` (snapshot), once the backend session is attached
 * - `interrupted` (snapshot), caller audio while the backend was speaking
 * - `closed` (snapshot), after cleanup
 */
export class CallBridge extends EventEmitter {
  private _phase: CallPhase = "awaiting_handshake";
  private callSid?: string;
  private streamSid?: string;
  private mediaFormat?: MediaFormat;
  private isBackendSpeaking = false;
  private session: BackendSession | null = null;
  private readonly relayToken = new CancellationToken();
  private backendTask: Promise<void> | null = null;
  private readonly counters: CallCounters = {
    mediaFramesReceived: 0,
    mediaBytesReceived: 0,
    chunksForwarded: 0,
    framesDropped: 0,
    responseChunksReceived: 0,
    mediaFramesSent: 0,
    mediaBytesSent: 0,
    turnsCompleted: 0,
    interruptions: 0,
  };
  private readonly startedAt = Date.now();
  private endedAt?: number;
  private endReason?: EndReason;
  private running: Promise<CallSessionSnapshot> | null = null;
  private readonly transport: MediaTransport;
  private readonly provider: SessionProvider;
  private readonly interTurnDelayMs: number;
  private readonly transportCloseTimeoutMs: number;
  private logger?: Logger;

  constructor(options: CallBridgeOptions) {
    super();
    this.transport = options.transport;
    this.provider = options.provider;
    this.interTurnDelayMs = options.interTurnDelayMs ?? 50;
    this.transportCloseTimeoutMs = options.transportCloseTimeoutMs ?? 5000;
    this.logger = options.logger;
  }

  get phase(): CallPhase {
    return this._phase;
  }

  getSnapshot(): CallSessionSnapshot {
    return {
      callSid: this.callSid,
      streamSid: this.streamSid,
      phase: this._phase,
      isBackendSpeaking: this.isBackendSpeaking,
      mediaFormat: this.mediaFormat,
      counters: { ...this.counters },
      startedAt: this.startedAt,
      endedAt: this.endedAt,
      endReason: this.endReason,
    };
  }

  /**
   * Run the call to completion. Resolves with the final snapshot; never rejects.
   */
  run(): Promise<CallSessionSnapshot> {
    if (!this.running) {
      this.running = this.execute();
    }
    return this.running;
  }

  /**
   * Ask a running call to wind down (e.g. on server shutdown).
   */
  async shutdown(): Promise<void> {
    this.endReason ??= "shutdown";
    await this.transport.close(this.transportCloseTimeoutMs);
  }

  private async execute(): Promise<CallSessionSnapshot> {
    const inbound = this.transport.messages()[Symbol.asyncIterator]();
    let reason: EndReason = "error";

    try {
      const handshake = await this.nextMessage(inbound);
      if (handshake?.event !== "connected") {
        throw new ProtocolViolationError(`Expected 'connected', got ${describe(handshake)}`);
      }
      this.logger?.debug(`[CallBridge] Handshake (protocol: ${handshake.protocol}, version: ${handshake.version})`);
      this.transition("awaiting_stream_start");

      const start = await this.nextMessage(inbound);
      if (start?.event !== "start") {
        throw new ProtocolViolationError(`Expected 'start', got ${describe(start)}`);
      }
      this.acceptStart(start);

      const callSid = start.start.callSid;
      const session = await this.provider.acquire(callSid);
      if (!session) {
        this.logger?.error(`[CallBridge] No backend session for call ${callSid}`);
        reason = "backend-unavailable";
      } else {
        this.session = session;
        this.transition("bridging");
        this.emit("streamStarted", this.getSnapshot());

        this.backendTask = this.relayBackendToCaller(session, this.relayToken);
        reason = await this.relayCallerToBackend(inbound, session);
      }
    } catch (err) {
      if (err instanceof ProtocolViolationError || err instanceof MessageParseError) {
        this.logger?.warn(`[CallBridge] Protocol violation: ${err.message}`);
        reason = "protocol-violation";
      } else {
        this.logger?.error("[CallBridge] Call failed", err);
        reason = "error";
      }
    }

    this.endReason ??= reason;
    await this.teardown();
    return this.getSnapshot();
  }

  private async nextMessage(inbound: AsyncIterator<string>): Promise<InboundMessage | null> {
    const result = await inbound.next();
    if (result.done) {
      return null;
    }
    return parseInboundMessage(result.value);
  }

  private acceptStart(start: StartMessage): void {
    this.callSid = start.start.callSid;
    this.streamSid = start.start.streamSid;
    this.mediaFormat = start.start.mediaFormat;

    const { encoding, sampleRate, channels } = start.start.mediaFormat;
    this.logger?.info(
      `[CallBridge] Stream ${this.streamSid} started for call ${this.callSid} (${encoding}, ${sampleRate}Hz, ${channels}ch)`,
    );
    if (!isTelephonyMuLaw(start.start.mediaFormat)) {
      this.logger?.warn(`[CallBridge] Unexpected media format for call ${this.callSid}, treating as 8kHz μ-law`);
    }
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Caller → backend
  // ───────────────────────────────────────────────────────────────────────────

  private async relayCallerToBackend(inbound: AsyncIterator<string>, session: BackendSession): Promise<EndReason> {
    while (true) {
      const result = await inbound.next();
      if (result.done) {
        this.logger?.info(`[CallBridge] Transport closed for call ${this.callSid}`);
        return "transport-closed";
      }

      let message: InboundMessage;
      try {
        message = parseInboundMessage(result.value);
      } catch (err) {
        this.logger?.warn(`[CallBridge] Skipping malformed message on call ${this.callSid}`, err);
        continue;
      }

      switch (message.event) {
        case "media":
          await this.forwardMedia(message, session);
          break;
        case "stop":
          this.logger?.info(`[CallBridge] Stream stopped for call ${this.callSid}`);
          return "stream-stopped";
        case "mark":
          this.logger?.debug(`[CallBridge] Mark played: ${message.mark.name}`);
          break;
        case "dtmf":
          this.logger?.info(`[CallBridge] DTMF '${message.dtmf.digit}' on call ${this.callSid}`);
          break;
        default:
          this.logger?.warn(`[CallBridge] Ignoring unexpected '${message.event}' while bridging`);
          break;
      }
    }
  }

  private async forwardMedia(message: MediaMessage, session: BackendSession): Promise<void> {
    if (message.media.track !== "inbound") {
      return;
    }

    const mulaw = decodeMediaPayload(message);
    this.counters.mediaFramesReceived++;
    this.counters.mediaBytesReceived += mulaw.length;

    const pcm = decodeMuLaw(mulaw, this.logger);
    if (pcm.length === 0) {
      this.dropFrame("empty after decode");
      return;
    }

    if (this.isBackendSpeaking) {
      this.isBackendSpeaking = false;
      this.counters.interruptions++;
      this.logger?.info(`[CallBridge] Caller spoke over backend on call ${this.callSid}`);
      this.emit("interrupted", this.getSnapshot());
    }

    try {
      const pcm16k = resample(pcm, TELEPHONY_RATE, BACKEND_INPUT_RATE);
      if (await session.sendAudio(pcm16k, BACKEND_INPUT_RATE)) {
        this.counters.chunksForwarded++;
      } else {
        this.dropFrame("backend send failed");
      }
    } catch (err) {
      this.dropFrame("backend send threw", err);
    }
  }

  private dropFrame(why: string, err?: unknown): void {
    this.counters.framesDropped++;
    const msg = `[CallBridge] Dropped caller frame on call ${this.callSid}: ${why}`;
    const args = err === undefined ? [] : [err];
    // first drop per call is a warning, the rest are noise
    if (this.counters.framesDropped === 1) {
      this.logger?.warn(msg, ...args);
    } else {
      this.logger?.debug(msg, ...args);
    }
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Backend → caller
  // ───────────────────────────────────────────────────────────────────────────

  private async relayBackendToCaller(session: BackendSession, token: CancellationToken): Promise<void> {
    try {
      while (!token.isCancelled()) {
        if (!session.isConnected()) {
          this.logger?.warn(`[CallBridge] Backend session ended for call ${this.callSid}`);
          return;
        }

        for await (const chunk of session.receiveResponses(token.signal)) {
          if (token.isCancelled()) break;
          this.counters.responseChunksReceived++;
          this.isBackendSpeaking = true;
          this.playToCaller(chunk.data, chunk.sampleRate);
        }
        this.isBackendSpeaking = false;

        if (token.isCancelled()) return;
        if (session.isConnected()) {
          this.counters.turnsCompleted++;
        }
        await sleep(this.interTurnDelayMs, token.signal);
      }
    } catch (err) {
      this.logger?.error(`[CallBridge] Backend relay failed for call ${this.callSid}`, err);
    } finally {
      this.isBackendSpeaking = false;
    }
  }

  private playToCaller(pcm: Buffer, sampleRate: number): void {
    const streamSid = this.streamSid;
    if (!streamSid) return;

    let mulaw: Buffer;
    try {
      mulaw = encodeMuLaw(resample(pcm, sampleRate, TELEPHONY_RATE), this.logger);
    } catch (err) {
      this.logger?.warn(`[CallBridge] Dropped backend chunk on call ${this.callSid}`, err);
      return;
    }
    if (mulaw.length === 0) return;

    if (this.transport.send(serializeOutboundMessage(buildMediaOut(streamSid, mulaw)))) {
      this.counters.mediaFramesSent++;
      this.counters.mediaBytesSent += mulaw.length;
    } else {
      this.logger?.debug(`[CallBridge] Transport closed, dropped ${mulaw.length} bytes for call ${this.callSid}`);
    }
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Teardown
  // ───────────────────────────────────────────────────────────────────────────

  private transition(to: CallPhase): void {
    const from = this._phase;
    if (PHASE_ORDER.indexOf(to) <= PHASE_ORDER.indexOf(from)) {
      throw new Error(`Invalid call phase transition ${from} → ${to}`);
    }
    this._phase = to;
    this.logger?.debug(`[CallBridge] ${this.callSid ?? "pending"}: ${from} → ${to}`);
    this.emit("phase", { from, to });
  }

  private async teardown(): Promise<void> {
    if (this._phase === "bridging") {
      this.transition("draining");
      this.relayToken.abort();
      await this.backendTask;
    }
    this.relayToken.abort();
    this.transition("closed");

    const steps: Array<[string, () => Promise<void>]> = [];
    const callSid = this.callSid;
    if (this.session && callSid) {
      steps.push(["release backend session", () => this.provider.release(callSid)]);
    }
    steps.push(["close transport", () => this.transport.close(this.transportCloseTimeoutMs)]);

    for (const [name, step] of steps) {
      try {
        await step();
      } catch (err) {
        this.logger?.warn(`[CallBridge] Cleanup step '${name}' failed for call ${callSid ?? "pending"}`, err);
      }
    }

    this.session = null;
    this.endedAt = Date.now();
    this.logger?.info(
      `[CallBridge] Call ${callSid ?? "pending"} closed (${this.endReason}): ` +
        `${this.counters.chunksForwarded} chunks in, ${this.counters.mediaFramesSent} frames out`,
    );
    this.emit("closed", this.getSnapshot());
  }
}

function describe(message: InboundMessage | null): string {
  return message ? `'${message.event}'` : "end of stream";
}
