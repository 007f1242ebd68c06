/**
 * Live Call Bridge Types
 *
 * Type definitions for the telephony media-stream protocol and for the
 * per-call session state shared between the bridge and its observers.
 */

/**
 * Media format announced by the telephony provider in the `start` event.
 */
export interface MediaFormat {
  encoding: string;
  sampleRate: number;
  channels: number;
}

/**
 * Session end reasons.
 */
export type EndReason =
  | "stream-stopped"
  | "transport-closed"
  | "protocol-violation"
  | "backend-unavailable"
  | "shutdown"
  | "error";

// ─────────────────────────────────────────────────────────────────────────────
// Messages from telephony provider → bridge
// ─────────────────────────────────────────────────────────────────────────────

/**
 * First message on a new stream.
 */
export interface ConnectedMessage {
  event: "connected";
  protocol: string;
  version: string;
}

/**
 * Stream metadata; must follow `connected`.
 */
export interface StartMessage {
  event: "start";
  sequenceNumber?: string;
  streamSid: string;
  start: {
    streamSid: string;
    accountSid: string;
    callSid: string;
    tracks: string[];
    mediaFormat: MediaFormat;
    customParameters: Record<string, string>;
  };
}

/**
 * Caller audio (base64 μ-law, 8kHz mono, typically 20ms per frame).
 */
export interface MediaMessage {
  event: "media";
  sequenceNumber?: string;
  streamSid?: string;
  media: {
    track: string;
    chunk?: string;
    timestamp?: string;
    /** Base64-encoded μ-law audio */
    payload: string;
  };
}

/**
 * End of stream.
 */
export interface StopMessage {
  event: "stop";
  sequenceNumber?: string;
  streamSid?: string;
  stop?: {
    accountSid?: string;
    callSid?: string;
  };
}

/**
 * Playback acknowledgement for a mark we sent.
 */
export interface MarkMessage {
  event: "mark";
  sequenceNumber?: string;
  streamSid?: string;
  mark: { name: string };
}

/**
 * Keypad digit pressed by the caller.
 */
export interface DtmfMessage {
  event: "dtmf";
  sequenceNumber?: string;
  streamSid?: string;
  dtmf: { track?: string; digit: string };
}

export type InboundMessage =
  | ConnectedMessage
  | StartMessage
  | MediaMessage
  | StopMessage
  | MarkMessage
  | DtmfMessage;

export type InboundEvent = InboundMessage["event"];

// ─────────────────────────────────────────────────────────────────────────────
// Messages from bridge → telephony provider
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Audio to play to the caller (base64 μ-law, 8kHz mono).
 */
export interface MediaOutMessage {
  event: "media";
  streamSid: string;
  media: { payload: string };
}

/**
 * Request a `mark` echo once queued audio has played.
 */
export interface MarkOutMessage {
  event: "mark";
  streamSid: string;
  mark: { name: string };
}

/**
 * Discard audio queued for playback.
 */
export interface ClearMessage {
  event: "clear";
  streamSid: string;
}

export type OutboundMessage = MediaOutMessage | MarkOutMessage | ClearMessage;

// ─────────────────────────────────────────────────────────────────────────────
// Session state
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Lifecycle of one call. Transitions only move forward.
 */
export type CallPhase =
  | "awaiting_handshake"
  | "awaiting_stream_start"
  | "bridging"
  | "draining"
  | "closed";

export interface CallCounters {
  mediaFramesReceived: number;
  mediaBytesReceived: number;
  chunksForwarded: number;
  framesDropped: number;
  responseChunksReceived: number;
  mediaFramesSent: number;
  mediaBytesSent: number;
  turnsCompleted: number;
  interruptions: number;
}

/**
 * Read-only view of a call session.
 */
export interface CallSessionSnapshot {
  callSid?: string;
  streamSid?: string;
  phase: CallPhase;
  isBackendSpeaking: boolean;
  mediaFormat?: MediaFormat;
  counters: CallCounters;
  startedAt: number;
  endedAt?: number;
  endReason?: EndReason;
}

/**
 * Raw PCM audio with its format. Always 16-bit mono little-endian.
 */
export interface AudioFrame {
  readonly data: Buffer;
  readonly sampleRate: number;
  readonly channels: 1;
  readonly sampleWidth: 2;
}

/**
 * One piece of synthesized speech from the backend.
 */
export interface ResponseChunk {
  data: Buffer;
  sampleRate: number;
  mimeType: string;
}
