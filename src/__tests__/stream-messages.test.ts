import { describe, it, expect } from "vitest";
import {
  MessageParseError,
  buildClear,
  buildMark,
  buildMediaOut,
  decodeMediaPayload,
  isTelephonyMuLaw,
  parseInboundMessage,
  serializeOutboundMessage,
  validateSid,
} from "../stream-messages.js";

const startEvent = {
  event: "start",
  sequenceNumber: "1",
  streamSid: "MZ0001",
  start: {
    streamSid: "MZ0001",
    accountSid: "AC0001",
    callSid: "CA0001",
    tracks: ["inbound"],
    mediaFormat: { encoding: "audio/x-mulaw", sampleRate: 8000, channels: 1 },
    customParameters: { campaign: "spring" },
  },
};

describe("parseInboundMessage", () => {
  it("parses connected", () => {
    expect(parseInboundMessage(JSON.stringify({ event: "connected", protocol: "Call", version: "1.0.0" }))).toEqual({
      event: "connected",
      protocol: "Call",
      version: "1.0.0",
    });
  });

  it("parses start", () => {
    const msg = parseInboundMessage(JSON.stringify(startEvent));
    expect(msg.event).toBe("start");
    if (msg.event !== "start") return;
    expect(msg.start.callSid).toBe("CA0001");
    expect(msg.start.streamSid).toBe("MZ0001");
    expect(msg.start.mediaFormat).toEqual({ encoding: "audio/x-mulaw", sampleRate: 8000, channels: 1 });
    expect(msg.start.customParameters).toEqual({ campaign: "spring" });
  });

  it("accepts a numeric string sample rate", () => {
    const event = {
      ...startEvent,
      start: { ...startEvent.start, mediaFormat: { encoding: "audio/x-mulaw", sampleRate: "8000", channels: 1 } },
    };
    const msg = parseInboundMessage(JSON.stringify(event));
    expect(msg.event === "start" && msg.start.mediaFormat.sampleRate).toBe(8000);
  });

  it("rejects start without a call id", () => {
    const event = { ...startEvent, start: { ...startEvent.start, callSid: undefined } };
    expect(() => parseInboundMessage(JSON.stringify(event))).toThrow("Missing or invalid 'callSid' field");
  });

  it("rejects start with a malformed stream id", () => {
    const event = { ...startEvent, start: { ...startEvent.start, streamSid: "../etc" } };
    expect(() => parseInboundMessage(JSON.stringify(event))).toThrow("Invalid 'streamSid' format");
  });

  it("rejects start without a media format", () => {
    const event = { ...startEvent, start: { ...startEvent.start, mediaFormat: undefined } };
    expect(() => parseInboundMessage(JSON.stringify(event))).toThrow("Missing or invalid 'mediaFormat' field");
  });

  it("parses media", () => {
    const msg = parseInboundMessage(
      JSON.stringify({
        event: "media",
        sequenceNumber: "3",
        streamSid: "MZ0001",
        media: { track: "inbound", chunk: "2", timestamp: "40", payload: "//8=" },
      }),
    );
    expect(msg).toEqual({
      event: "media",
      sequenceNumber: "3",
      streamSid: "MZ0001",
      media: { track: "inbound", chunk: "2", timestamp: "40", payload: "//8=" },
    });
    if (msg.event === "media") {
      expect([...decodeMediaPayload(msg)]).toEqual([0xff, 0xff]);
    }
  });

  it("rejects media without a payload", () => {
    expect(() => parseInboundMessage(JSON.stringify({ event: "media", media: { track: "inbound" } }))).toThrow(
      MessageParseError,
    );
  });

  it("parses stop, mark and dtmf", () => {
    expect(parseInboundMessage('{"event":"stop","streamSid":"MZ0001","stop":{"callSid":"CA0001"}}')).toEqual({
      event: "stop",
      sequenceNumber: undefined,
      streamSid: "MZ0001",
      stop: { accountSid: undefined, callSid: "CA0001" },
    });
    expect(parseInboundMessage('{"event":"mark","mark":{"name":"greeting"}}').event).toBe("mark");
    const dtmf = parseInboundMessage('{"event":"dtmf","dtmf":{"track":"inbound_track","digit":"5"}}');
    expect(dtmf.event === "dtmf" && dtmf.dtmf.digit).toBe("5");
  });

  it("rejects invalid JSON and keeps the raw text", () => {
    try {
      parseInboundMessage("{nope");
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(MessageParseError);
      expect(err instanceof MessageParseError && err.rawMessage).toBe("{nope");
    }
  });

  it("rejects non-objects, missing and unknown events", () => {
    expect(() => parseInboundMessage("[]")).toThrow("Message must be an object");
    expect(() => parseInboundMessage("{}")).toThrow("Message missing 'event' field");
    expect(() => parseInboundMessage('{"event":"bogus"}')).toThrow("Unknown event: bogus");
  });

  it("rejects oversized messages", () => {
    expect(() => parseInboundMessage("x".repeat(1024 * 1024 + 1))).toThrow("Message too large");
  });
});

describe("outbound messages", () => {
  it("builds a media message with base64 payload", () => {
    const msg = buildMediaOut("MZ0001", Buffer.from([0xff, 0x7f]));
    expect(serializeOutboundMessage(msg)).toBe('{"event":"media","streamSid":"MZ0001","media":{"payload":"/38="}}');
  });

  it("builds mark and clear", () => {
    expect(buildMark("MZ0001", "end-of-turn")).toEqual({
      event: "mark",
      streamSid: "MZ0001",
      mark: { name: "end-of-turn" },
    });
    expect(buildClear("MZ0001")).toEqual({ event: "clear", streamSid: "MZ0001" });
  });
});

describe("validation helpers", () => {
  it("accepts provider-style ids and rejects others", () => {
    expect(validateSid("CA0123abcd")).toBe(true);
    expect(validateSid("")).toBe(false);
    expect(validateSid("a b")).toBe(false);
    expect(validateSid("x".repeat(129))).toBe(false);
  });

  it("recognizes 8kHz mono μ-law", () => {
    expect(isTelephonyMuLaw({ encoding: "audio/x-mulaw", sampleRate: 8000, channels: 1 })).toBe(true);
    expect(isTelephonyMuLaw({ encoding: "audio/x-mulaw", sampleRate: 16000, channels: 1 })).toBe(false);
  });
});
