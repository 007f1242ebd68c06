import { describe, it, expect } from "vitest";
import {
  DEFAULT_GREETING,
  buildAnswerResponse,
  isCallStatus,
  isMachineAnswer,
  isTerminalCallStatus,
  toMediaStreamUrl,
} from "../call-control.js";

const HEADER = '<?xml version="1.0" encoding="UTF-8"?>';

describe("buildAnswerResponse", () => {
  it("hangs up on answering machines and fax", () => {
    for (const answeredBy of ["machine_start", "machine_end_beep", "fax"]) {
      expect(buildAnswerResponse({ answeredBy, mediaStreamUrl: "wss://bridge.example.com/media-stream" })).toBe(
        `${HEADER}<Response><Hangup/></Response>`,
      );
    }
  });

  it("greets a person and connects the media stream", () => {
    expect(
      buildAnswerResponse({
        answeredBy: "human",
        mediaStreamUrl: "wss://bridge.example.com/media-stream?a=1&b=2",
        greeting: "Hi <there>",
      }),
    ).toBe(
      `${HEADER}<Response><Say>Hi &lt;there&gt;</Say>` +
        `<Connect><Stream url="wss://bridge.example.com/media-stream?a=1&amp;b=2"/></Connect></Response>`,
    );
  });

  it("uses the default greeting when detection is unavailable", () => {
    expect(buildAnswerResponse({ mediaStreamUrl: "wss://h/s" })).toBe(
      `${HEADER}<Response><Say>${DEFAULT_GREETING}</Say><Connect><Stream url="wss://h/s"/></Connect></Response>`,
    );
  });

  it("skips the greeting when it is empty", () => {
    expect(buildAnswerResponse({ answeredBy: "unknown", mediaStreamUrl: "wss://h/s", greeting: "" })).toBe(
      `${HEADER}<Response><Connect><Stream url="wss://h/s"/></Connect></Response>`,
    );
  });
});

describe("toMediaStreamUrl", () => {
  it("switches the scheme and appends the path", () => {
    expect(toMediaStreamUrl("https://bridge.example.com/")).toBe("wss://bridge.example.com/media-stream");
    expect(toMediaStreamUrl("http://localhost:8080", "calls")).toBe("ws://localhost:8080/calls");
  });
});

describe("call status helpers", () => {
  it("classifies answers and statuses", () => {
    expect(isMachineAnswer("machine_end_silence")).toBe(true);
    expect(isMachineAnswer("human")).toBe(false);
    expect(isMachineAnswer(undefined)).toBe(false);
    expect(isCallStatus("ringing")).toBe(true);
    expect(isCallStatus("ringing-ish")).toBe(false);
    expect(isTerminalCallStatus("no-answer")).toBe(true);
    expect(isTerminalCallStatus("in-progress")).toBe(false);
  });
});
