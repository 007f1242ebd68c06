import { describe, it, expect, vi } from "vitest";
import {
  MULAW_SILENCE,
  convertFrame,
  createAudioFrame,
  decodeMuLaw,
  decodeMuLawReference,
  encodeMuLaw,
  encodeMuLawReference,
  resample,
} from "../audio-utils.js";
import { applyLowPassFilter, generateFirCoefficients } from "../filters.js";
import { calculateCorrelation, generateTone } from "./audio-fixtures.js";

function pcm(samples: number[]): Buffer {
  const buffer = Buffer.alloc(samples.length * 2);
  samples.forEach((s, i) => buffer.writeInt16LE(s, i * 2));
  return buffer;
}

function samplesOf(buffer: Buffer): number[] {
  const out: number[] = [];
  for (let i = 0; i + 1 < buffer.length; i += 2) out.push(buffer.readInt16LE(i));
  return out;
}

function rms(samples: number[]): number {
  return Math.sqrt(samples.reduce((acc, s) => acc + s * s, 0) / samples.length);
}

describe("decodeMuLaw", () => {
  it("decodes silence to zero", () => {
    expect(samplesOf(decodeMuLaw(Buffer.from([MULAW_SILENCE])))).toEqual([0]);
  });

  it("decodes the extreme codes", () => {
    // 0x00 is the most negative code, 0x80 the most positive
    expect(samplesOf(decodeMuLaw(Buffer.from([0x00, 0x80])))).toEqual([-32124, 32124]);
  });

  it("produces one 16-bit sample per input byte", () => {
    expect(decodeMuLaw(Buffer.alloc(160, 0xff)).length).toBe(320);
  });

  it("returns empty output for empty input", () => {
    expect(decodeMuLaw(Buffer.alloc(0)).length).toBe(0);
  });

  it("matches the reference decoder for every code", () => {
    const all = Buffer.from(Array.from({ length: 256 }, (_, i) => i));
    expect(decodeMuLaw(all).equals(decodeMuLawReference(all))).toBe(true);
  });

  it("does not log on the primary path", () => {
    const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    decodeMuLaw(Buffer.from([1, 2, 3]), logger);
    expect(logger.warn).not.toHaveBeenCalled();
    expect(logger.error).not.toHaveBeenCalled();
  });
});

describe("encodeMuLaw", () => {
  it("encodes zero as the silence code", () => {
    expect([...encodeMuLaw(pcm([0]))]).toEqual([MULAW_SILENCE]);
  });

  it("clips full-scale samples to the extreme codes", () => {
    expect([...encodeMuLaw(pcm([32767, -32768]))]).toEqual([0x80, 0x00]);
  });

  it("ignores a trailing odd byte", () => {
    expect(encodeMuLaw(Buffer.alloc(3)).length).toBe(1);
    expect(encodeMuLaw(Buffer.alloc(1)).length).toBe(0);
  });

  it("matches the reference encoder", () => {
    const samples: number[] = [];
    for (let x = -32768; x <= 32767; x += 7) samples.push(x);
    const input = pcm(samples);
    expect(encodeMuLaw(input).equals(encodeMuLawReference(input))).toBe(true);
  });

  it("round-trips within half a quantization step", () => {
    const samples: number[] = [];
    for (let x = -32768; x <= 32767; x += 13) samples.push(x);
    const decoded = samplesOf(decodeMuLaw(encodeMuLaw(pcm(samples))));

    decoded.forEach((y, i) => {
      const x = samples[i];
      expect(Math.abs(y - x)).toBeLessThanOrEqual(Math.max(4, (Math.abs(x) + 132) / 16));
    });
  });
});

describe("resample", () => {
  it("returns the input unchanged at equal rates", () => {
    const input = pcm([1, 2, 3]);
    expect(resample(input, 8000, 8000)).toBe(input);
  });

  it("doubles the sample count from 8kHz to 16kHz", () => {
    // 20ms @ 8kHz = 160 samples
    expect(resample(Buffer.alloc(320), 8000, 16000).length).toBe(640);
  });

  it("thirds the sample count from 24kHz to 8kHz", () => {
    expect(resample(Buffer.alloc(960), 24000, 8000).length).toBe(320);
  });

  it("rounds the output length", () => {
    // 5 samples * 16000 / 24000 = 3.33 → 3
    expect(resample(Buffer.alloc(10), 24000, 16000).length).toBe(6);
  });

  it("interpolates linearly when upsampling", () => {
    expect(samplesOf(resample(pcm([0, 100]), 8000, 16000))).toEqual([0, 50, 100, 100]);
  });

  it("handles empty input", () => {
    expect(resample(Buffer.alloc(0), 8000, 16000).length).toBe(0);
  });

  it("rejects non-positive rates", () => {
    expect(() => resample(Buffer.alloc(4), 0, 8000)).toThrow(RangeError);
    expect(() => resample(Buffer.alloc(4), 8000, -1)).toThrow(RangeError);
  });

  it("keeps in-band speech when downsampling", () => {
    const tone24k = generateTone(24000, 100, 300, 0.5);
    const expected = generateTone(8000, 100, 300, 0.5);
    const correlation = calculateCorrelation(resample(tone24k, 24000, 8000), expected);
    expect(correlation).toBeGreaterThan(0.9);
  });

  it("suppresses content above the target Nyquist frequency", () => {
    // 6kHz would alias to full amplitude with plain decimation to 8kHz
    const tone = generateTone(24000, 100, 6000, 0.5);
    const out = samplesOf(resample(tone, 24000, 8000));
    const middle = out.slice(20, out.length - 20);
    expect(rms(middle)).toBeLessThan(0.05 * rms(samplesOf(tone)));
  });
});

describe("audio frames", () => {
  it("converts a frame to a new rate", () => {
    const frame = createAudioFrame(Buffer.alloc(320), 8000);
    const converted = convertFrame(frame, 16000);
    expect(converted.sampleRate).toBe(16000);
    expect(converted.data.length).toBe(640);
    expect(frame.data.length).toBe(320);
  });

  it("returns the same frame at the same rate", () => {
    const frame = createAudioFrame(Buffer.alloc(4), 16000);
    expect(convertFrame(frame, 16000)).toBe(frame);
  });
});

describe("filters", () => {
  it("normalizes coefficients to unity DC gain", () => {
    const coefficients = generateFirCoefficients(63, 0.15);
    const sum = coefficients.reduce((a, b) => a + b, 0);
    expect(sum).toBeCloseTo(1, 10);
    expect(coefficients[0]).toBeCloseTo(coefficients[62], 12);
  });

  it("rejects cutoffs at or above half the sample rate", () => {
    expect(() => generateFirCoefficients(63, 0.6)).toThrow(RangeError);
  });

  it("passes DC away from the edges", () => {
    const filtered = samplesOf(applyLowPassFilter(pcm(new Array<number>(200).fill(1000)), 24000, 8000));
    expect(filtered.length).toBe(200);
    expect(Math.abs(filtered[100] - 1000)).toBeLessThanOrEqual(1);
  });
});
