/**
 * Audio Format Utilities for the telephony ↔ backend bridge
 *
 * Handles conversion between:
 * - Telephony: 8kHz G.711 μ-law, mono, one byte per sample
 * - Backend input: 16kHz PCM, 16-bit mono, little-endian
 * - Backend output: 24kHz PCM (rate carried per chunk), 16-bit mono, little-endian
 *
 * Conversions are lossy and aim at perceptual continuity: μ-law is
 * logarithmic companding, and resampling is linear interpolation behind an
 * anti-aliasing filter when the rate goes down.
 */

import { applyLowPassFilter } from "./filters.js";
import type { Logger } from "./logger.js";
import type { AudioFrame } from "./types.js";

const MULAW_BIAS = 0x84;
const MULAW_CLIP = 32635;

/** μ-law byte for a zero-amplitude sample. */
export const MULAW_SILENCE = 0xff;

const SEGMENT_END = [0xff, 0x1ff, 0x3ff, 0x7ff, 0xfff, 0x1fff, 0x3fff, 0x7fff] as const;
const SEGMENT_BASE = [0, 132, 396, 924, 1980, 4092, 8316, 16764] as const;

// ───────────────────────────────────────────────────────────────────────────
// μ-law decoding
// ───────────────────────────────────────────────────────────────────────────

function decodeSample(byte: number): number {
  const u = ~byte & 0xff;
  const exponent = (u >> 4) & 0x07;
  const mantissa = u & 0x0f;
  const magnitude = (((mantissa << 3) + MULAW_BIAS) << exponent) - MULAW_BIAS;
  return u & 0x80 ? -magnitude : magnitude;
}

const DECODE_TABLE: Int16Array = (() => {
  const table = new Int16Array(256);
  for (let i = 0; i < 256; i++) {
    table[i] = decodeSample(i);
  }
  return table;
})();

function decodeWithTable(companded: Uint8Array): Buffer {
  const output = Buffer.alloc(companded.length * 2);
  for (let i = 0; i < companded.length; i++) {
    output.writeInt16LE(DECODE_TABLE[companded[i]], i * 2);
  }
  return output;
}

/**
 * Reference μ-law decoder working from segment base values.
 * Produces the same samples as the lookup table.
 */
export function decodeMuLawReference(companded: Uint8Array): Buffer {
  const output = Buffer.alloc(companded.length * 2);
  for (let i = 0; i < companded.length; i++) {
    const u = ~companded[i] & 0xff;
    const exponent = (u >> 4) & 0x07;
    const mantissa = u & 0x0f;
    const magnitude = SEGMENT_BASE[exponent] + (mantissa << (exponent + 3));
    output.writeInt16LE(u & 0x80 ? -magnitude : magnitude, i * 2);
  }
  return output;
}

/**
 * Decode G.711 μ-law bytes to 16-bit LE PCM at the same sample rate.
 *
 * Never throws: the lookup-table decoder falls back to the reference decoder,
 * and if that fails too the failure is logged and an empty buffer returned.
 */
export function decodeMuLaw(companded: Uint8Array, logger?: Logger): Buffer {
  if (companded.length === 0) {
    return Buffer.alloc(0);
  }
  try {
    return decodeWithTable(companded);
  } catch (err) {
    logger?.warn("[audio] μ-law table decode failed, using reference decoder", err);
  }
  try {
    return decodeMuLawReference(companded);
  } catch (err) {
    logger?.error("[audio] μ-law decode failed, dropping frame", err);
    return Buffer.alloc(0);
  }
}

// ───────────────────────────────────────────────────────────────────────────
// μ-law encoding
// ───────────────────────────────────────────────────────────────────────────

function encodeSample(sample: number): number {
  const sign = sample < 0 ? 0x80 : 0;
  let magnitude = Math.min(sign ? -sample : sample, MULAW_CLIP) + MULAW_BIAS;

  let segment = 0;
  while (segment < 7 && magnitude > SEGMENT_END[segment]) {
    segment++;
  }
  magnitude = (magnitude >> (segment + 3)) & 0x0f;
  return ~(sign | (segment << 4) | magnitude) & 0xff;
}

function encodeWithSegments(pcm16: Buffer): Buffer {
  const samples = Math.floor(pcm16.length / 2);
  const output = Buffer.alloc(samples);
  for (let i = 0; i < samples; i++) {
    output[i] = encodeSample(pcm16.readInt16LE(i * 2));
  }
  return output;
}

/**
 * Reference μ-law encoder scanning for the exponent bit by bit.
 * Produces the same bytes as the segment-table encoder.
 */
export function encodeMuLawReference(pcm16: Buffer): Buffer {
  const samples = Math.floor(pcm16.length / 2);
  const output = Buffer.alloc(samples);
  for (let i = 0; i < samples; i++) {
    let sample = pcm16.readInt16LE(i * 2);
    const sign = sample < 0 ? 0x80 : 0;
    if (sign) sample = -sample;
    if (sample > MULAW_CLIP) sample = MULAW_CLIP;
    sample += MULAW_BIAS;

    let exponent = 7;
    for (let mask = 0x4000; (sample & mask) === 0 && exponent > 0; mask >>= 1) {
      exponent--;
    }
    const mantissa = (sample >> (exponent + 3)) & 0x0f;
    output[i] = ~(sign | (exponent << 4) | mantissa) & 0xff;
  }
  return output;
}

/**
 * Encode 16-bit LE PCM to G.711 μ-law, one byte per sample.
 * A trailing odd byte is ignored. Never throws (see {@link decodeMuLaw}).
 */
export function encodeMuLaw(pcm16: Buffer, logger?: Logger): Buffer {
  if (pcm16.length < 2) {
    return Buffer.alloc(0);
  }
  try {
    return encodeWithSegments(pcm16);
  } catch (err) {
    logger?.warn("[audio] μ-law encode failed, using reference encoder", err);
  }
  try {
    return encodeMuLawReference(pcm16);
  } catch (err) {
    logger?.error("[audio] μ-law encode failed, dropping chunk", err);
    return Buffer.alloc(0);
  }
}

// ───────────────────────────────────────────────────────────────────────────
// Resampling
// ───────────────────────────────────────────────────────────────────────────

function assertRate(name: string, rate: number): void {
  if (!Number.isInteger(rate) || rate <= 0) {
    throw new RangeError(`${name} must be a positive integer, got ${rate}`);
  }
}

/**
 * Resample 16-bit LE mono PCM between arbitrary rates.
 *
 * Equal rates return the input buffer itself. Otherwise the output holds
 * `round(N * toRate / fromRate)` samples, computed by linear interpolation;
 * downsampling runs the anti-aliasing filter first.
 */
export function resample(pcm16: Buffer, fromRate: number, toRate: number): Buffer {
  assertRate("fromRate", fromRate);
  assertRate("toRate", toRate);

  if (fromRate === toRate) {
    return pcm16;
  }

  const inputSamples = Math.floor(pcm16.length / 2);
  if (inputSamples === 0) {
    return Buffer.alloc(0);
  }

  const source = toRate < fromRate ? applyLowPassFilter(pcm16, fromRate, toRate) : pcm16;
  const outputSamples = Math.round((inputSamples * toRate) / fromRate);
  const output = Buffer.alloc(outputSamples * 2);
  const step = fromRate / toRate;

  for (let i = 0; i < outputSamples; i++) {
    const srcPos = i * step;
    const srcIdx = Math.floor(srcPos);
    const frac = srcPos - srcIdx;

    const s0 = readSample(source, srcIdx);
    const s1 = readSample(source, srcIdx + 1);
    output.writeInt16LE(clamp16(Math.round(s0 + frac * (s1 - s0))), i * 2);
  }

  return output;
}

/**
 * Read a sample from a buffer; indices past the end repeat the last sample.
 */
function readSample(buffer: Buffer, sampleIndex: number): number {
  const lastIdx = Math.floor(buffer.length / 2) - 1;
  if (sampleIndex < 0 || lastIdx < 0) return 0;
  return buffer.readInt16LE(Math.min(sampleIndex, lastIdx) * 2);
}

/**
 * Clamp value to 16-bit signed integer range.
 */
export function clamp16(value: number): number {
  return Math.max(-32768, Math.min(32767, value));
}

export function createAudioFrame(data: Buffer, sampleRate: number): AudioFrame {
  assertRate("sampleRate", sampleRate);
  return { data, sampleRate, channels: 1, sampleWidth: 2 };
}

/** Resample a frame, returning a new frame (or the same one at equal rates). */
export function convertFrame(frame: AudioFrame, toRate: number): AudioFrame {
  if (frame.sampleRate === toRate) {
    return frame;
  }
  return createAudioFrame(resample(frame.data, frame.sampleRate, toRate), toRate);
}
