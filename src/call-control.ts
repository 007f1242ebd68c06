/**
 * Call-control helpers for the HTTP layer that answers calls.
 *
 * Pure functions only: deciding whether an answered call gets connected to
 * the media stream, and rendering the answer document that tells the
 * telephony provider to do so.
 */

import type { Logger } from "./logger.js";

/**
 * AnsweredBy values that mean nobody is there to talk to.
 */
export const MACHINE_ANSWERS = [
  "fax",
  "machine_start",
  "machine_end_beep",
  "machine_end_silence",
  "machine_end_other",
] as const;

export const CALL_STATUSES = [
  "initiated",
  "ringing",
  "answered",
  "in-progress",
  "completed",
  "busy",
  "no-answer",
  "failed",
  "canceled",
] as const;

export type CallStatus = (typeof CALL_STATUSES)[number];

const TERMINAL_STATUSES: ReadonlySet<string> = new Set<CallStatus>([
  "completed",
  "busy",
  "no-answer",
  "failed",
  "canceled",
]);

export const DEFAULT_GREETING = "Connecting you now, one moment please.";

export function isMachineAnswer(answeredBy?: string | null): boolean {
  return typeof answeredBy === "string" && MACHINE_ANSWERS.some((value) => value === answeredBy);
}

export function isCallStatus(value: string): value is CallStatus {
  return CALL_STATUSES.some((status) => status === value);
}

export function isTerminalCallStatus(status: string): boolean {
  return TERMINAL_STATUSES.has(status);
}

/**
 * Media-stream WebSocket URL for a public base URL
 * (`https://host` → `wss://host/media-stream`).
 */
export function toMediaStreamUrl(baseUrl: string, path = "/media-stream"): string {
  const wsBase = baseUrl.replace(/^https:\/\//i, "wss://").replace(/^http:\/\//i, "ws://").replace(/\/+$/, "");
  return `${wsBase}${path.startsWith("/") ? path : `/${path}`}`;
}

export function escapeXml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

export interface AnswerOptions {
  answeredBy?: string | null;
  mediaStreamUrl: string;
  /** Spoken before connecting; empty string skips it */
  greeting?: string;
  logger?: Logger;
}

/**
 * Answer document: hang up on machines and fax, otherwise greet and connect
 * the call to the media stream.
 */
export function buildAnswerResponse(options: AnswerOptions): string {
  const header = '<?xml version="1.0" encoding="UTF-8"?>';

  if (isMachineAnswer(options.answeredBy)) {
    options.logger?.info(`[CallControl] Answered by ${options.answeredBy}, hanging up`);
    return `${header}<Response><Hangup/></Response>`;
  }

  options.logger?.info(
    `[CallControl] Connecting call (answered by ${options.answeredBy ?? "unknown"}) to ${options.mediaStreamUrl}`,
  );
  const greeting = options.greeting ?? DEFAULT_GREETING;
  const say = greeting ? `<Say>${escapeXml(greeting)}</Say>` : "";
  return (
    `${header}<Response>${say}` +
    `<Connect><Stream url="${escapeXml(options.mediaStreamUrl)}"/></Connect>` +
    `</Response>`
  );
}
