/**
 * Media Stream Message Parsing and Serialization
 *
 * Handles JSON encoding/decoding for the telephony provider's media-stream
 * WebSocket protocol.
 */

import type {
  ClearMessage,
  ConnectedMessage,
  DtmfMessage,
  InboundMessage,
  MarkMessage,
  MarkOutMessage,
  MediaFormat,
  MediaMessage,
  MediaOutMessage,
  OutboundMessage,
  StartMessage,
  StopMessage,
} from "./types.js";

/**
 * Error thrown when message parsing fails.
 */
export class MessageParseError extends Error {
  constructor(
    message: string,
    public readonly rawMessage?: string,
  ) {
    super(message);
    this.name = "MessageParseError";
  }
}

/** Max message size in characters (1MB) */
const MAX_MESSAGE_SIZE = 1024 * 1024;

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Parse an inbound message from the telephony provider.
 *
 * @param raw Raw JSON text from the WebSocket
 * @throws MessageParseError if parsing fails
 */
export function parseInboundMessage(raw: string): InboundMessage {
  if (raw.length > MAX_MESSAGE_SIZE) {
    throw new MessageParseError("Message too large", undefined);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    throw new MessageParseError("Invalid JSON", raw);
  }

  if (!isObject(json)) {
    throw new MessageParseError("Message must be an object", raw);
  }

  if (typeof json.event !== "string") {
    throw new MessageParseError("Message missing 'event' field", raw);
  }

  switch (json.event) {
    case "connected":
      return parseConnected(json);
    case "start":
      return parseStart(json, raw);
    case "media":
      return parseMedia(json, raw);
    case "stop":
      return parseStop(json);
    case "mark":
      return parseMark(json, raw);
    case "dtmf":
      return parseDtmf(json, raw);
    default:
      throw new MessageParseError(`Unknown event: ${json.event}`, raw);
  }
}

/**
 * Serialize an outbound message to JSON.
 */
export function serializeOutboundMessage(message: OutboundMessage): string {
  return JSON.stringify(message);
}

// ─────────────────────────────────────────────────────────────────────────────
// Individual message parsers
// ─────────────────────────────────────────────────────────────────────────────

function parseConnected(msg: JsonObject): ConnectedMessage {
  return {
    event: "connected",
    protocol: optionalString(msg, "protocol") ?? "",
    version: optionalString(msg, "version") ?? "",
  };
}

function parseStart(msg: JsonObject, raw: string): StartMessage {
  const start = requireObject(msg, "start", raw);
  const streamSid = requireSid(start, "streamSid", raw);
  const callSid = requireSid(start, "callSid", raw);

  const tracks = start.tracks;
  const customParameters = start.customParameters;

  return {
    event: "start",
    sequenceNumber: optionalString(msg, "sequenceNumber"),
    streamSid: optionalString(msg, "streamSid") ?? streamSid,
    start: {
      streamSid,
      callSid,
      accountSid: optionalString(start, "accountSid") ?? "",
      tracks: Array.isArray(tracks) ? tracks.filter((t): t is string => typeof t === "string") : [],
      mediaFormat: requireMediaFormat(start, raw),
      customParameters: isObject(customParameters) ? stringEntries(customParameters) : {},
    },
  };
}

function parseMedia(msg: JsonObject, raw: string): MediaMessage {
  const media = requireObject(msg, "media", raw);
  return {
    event: "media",
    sequenceNumber: optionalString(msg, "sequenceNumber"),
    streamSid: optionalString(msg, "streamSid"),
    media: {
      track: optionalString(media, "track") ?? "inbound",
      chunk: optionalString(media, "chunk"),
      timestamp: optionalString(media, "timestamp"),
      payload: requireString(media, "payload", raw),
    },
  };
}

function parseStop(msg: JsonObject): StopMessage {
  const stop = msg.stop;
  return {
    event: "stop",
    sequenceNumber: optionalString(msg, "sequenceNumber"),
    streamSid: optionalString(msg, "streamSid"),
    stop: isObject(stop)
      ? { accountSid: optionalString(stop, "accountSid"), callSid: optionalString(stop, "callSid") }
      : undefined,
  };
}

function parseMark(msg: JsonObject, raw: string): MarkMessage {
  const mark = requireObject(msg, "mark", raw);
  return {
    event: "mark",
    sequenceNumber: optionalString(msg, "sequenceNumber"),
    streamSid: optionalString(msg, "streamSid"),
    mark: { name: requireString(mark, "name", raw) },
  };
}

function parseDtmf(msg: JsonObject, raw: string): DtmfMessage {
  const dtmf = requireObject(msg, "dtmf", raw);
  return {
    event: "dtmf",
    sequenceNumber: optionalString(msg, "sequenceNumber"),
    streamSid: optionalString(msg, "streamSid"),
    dtmf: { track: optionalString(dtmf, "track"), digit: requireString(dtmf, "digit", raw) },
  };
}

// ─────────────────────────────────────────────────────────────────────────────
// Field validators
// ─────────────────────────────────────────────────────────────────────────────

function requireString(msg: JsonObject, field: string, raw: string): string {
  const value = msg[field];
  if (typeof value !== "string") {
    throw new MessageParseError(`Missing or invalid '${field}' field`, raw);
  }
  return value;
}

function optionalString(msg: JsonObject, field: string): string | undefined {
  const value = msg[field];
  if (typeof value === "string") return value;
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  return undefined;
}

function requireObject(msg: JsonObject, field: string, raw: string): JsonObject {
  const value = msg[field];
  if (!isObject(value)) {
    throw new MessageParseError(`Missing or invalid '${field}' field`, raw);
  }
  return value;
}

function requireSid(msg: JsonObject, field: string, raw: string): string {
  const value = requireString(msg, field, raw);
  if (!validateSid(value)) {
    throw new MessageParseError(`Invalid '${field}' format`, raw);
  }
  return value;
}

/** Numbers sometimes arrive as strings ("8000"). */
function requirePositiveInt(msg: JsonObject, field: string, raw: string): number {
  const value = msg[field];
  const parsed = typeof value === "string" && value.trim() !== "" ? Number(value) : value;
  if (typeof parsed !== "number" || !Number.isInteger(parsed) || parsed <= 0) {
    throw new MessageParseError(`Missing or invalid '${field}' field`, raw);
  }
  return parsed;
}

function requireMediaFormat(start: JsonObject, raw: string): MediaFormat {
  const format = requireObject(start, "mediaFormat", raw);
  return {
    encoding: requireString(format, "encoding", raw),
    sampleRate: requirePositiveInt(format, "sampleRate", raw),
    channels: requirePositiveInt(format, "channels", raw),
  };
}

function stringEntries(obj: JsonObject): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (typeof value === "string") {
      result[key] = value;
    }
  }
  return result;
}

// ─────────────────────────────────────────────────────────────────────────────
// Message builders
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Build a media message carrying μ-law audio for the caller.
 */
export function buildMediaOut(streamSid: string, mulaw: Buffer): MediaOutMessage {
  return {
    event: "media",
    streamSid,
    media: { payload: mulaw.toString("base64") },
  };
}

export function buildMark(streamSid: string, name: string): MarkOutMessage {
  return { event: "mark", streamSid, mark: { name } };
}

export function buildClear(streamSid: string): ClearMessage {
  return { event: "clear", streamSid };
}

/**
 * Decode the base64 μ-law payload of a media message.
 */
export function decodeMediaPayload(message: MediaMessage): Buffer {
  return Buffer.from(message.media.payload, "base64");
}

/**
 * The expected telephony format: 8kHz mono μ-law.
 */
export function isTelephonyMuLaw(format: MediaFormat): boolean {
  return format.encoding === "audio/x-mulaw" && format.sampleRate === 8000 && format.channels === 1;
}

/**
 * Validate call/stream identifier format.
 * Only allows alphanumeric characters, hyphens, and underscores, max 128.
 */
const SID_REGEX = /^[a-zA-Z0-9_-]{1,128}$/;

export function validateSid(sid: string): boolean {
  return SID_REGEX.test(sid);
}
