/**
 * Audio Filters
 *
 * Windowed-sinc FIR low-pass filtering applied before downsampling so that
 * content above the target Nyquist frequency does not fold back into the
 * passband (e.g. backend 24kHz speech → 8kHz telephony).
 */

/** Default filter order. */
export const DEFAULT_TAPS = 63;

/** Fraction of the target Nyquist frequency kept as passband. */
const CUTOFF_MARGIN = 0.9;

const coefficientCache = new Map<string, readonly number[]>();

/**
 * Generate FIR low-pass filter coefficients using the windowed-sinc method
 * (Blackman window), normalized to unity gain at DC.
 *
 * @param taps Number of filter taps
 * @param cutoff Cutoff frequency as a fraction of the sample rate (0 < cutoff < 0.5)
 */
export function generateFirCoefficients(taps: number, cutoff: number): number[] {
  if (taps < 1) {
    throw new RangeError(`taps must be positive, got ${taps}`);
  }
  if (!(cutoff > 0 && cutoff < 0.5)) {
    throw new RangeError(`cutoff must be within (0, 0.5), got ${cutoff}`);
  }

  const coefficients: number[] = new Array<number>(taps);
  const center = (taps - 1) / 2;
  let sum = 0;

  for (let i = 0; i < taps; i++) {
    const x = i - center;
    const sinc = x === 0 ? 2 * Math.PI * cutoff : Math.sin(2 * Math.PI * cutoff * x) / x;

    const window =
      taps === 1
        ? 1
        : 0.42 -
          0.5 * Math.cos((2 * Math.PI * i) / (taps - 1)) +
          0.08 * Math.cos((4 * Math.PI * i) / (taps - 1));

    coefficients[i] = sinc * window;
    sum += coefficients[i];
  }

  for (let i = 0; i < taps; i++) {
    coefficients[i] /= sum;
  }

  return coefficients;
}

function coefficientsFor(inputSampleRate: number, targetSampleRate: number): readonly number[] {
  const key = `${inputSampleRate}:${targetSampleRate}`;
  let coefficients = coefficientCache.get(key);
  if (!coefficients) {
    const cutoff = (CUTOFF_MARGIN * (targetSampleRate / 2)) / inputSampleRate;
    coefficients = generateFirCoefficients(DEFAULT_TAPS, cutoff);
    coefficientCache.set(key, coefficients);
  }
  return coefficients;
}

/**
 * Apply an anti-aliasing low-pass filter to 16-bit LE PCM before it is
 * downsampled to `targetSampleRate`. Returns a new buffer of the same length.
 * Samples outside the buffer are treated as zero.
 */
export function applyLowPassFilter(
  input: Buffer,
  inputSampleRate: number,
  targetSampleRate: number,
): Buffer {
  if (input.length < 2) {
    return Buffer.alloc(0);
  }

  const inputSamples = Math.floor(input.length / 2);
  const output = Buffer.alloc(inputSamples * 2);
  const coefficients = coefficientsFor(inputSampleRate, targetSampleRate);
  const taps = coefficients.length;
  const halfTaps = Math.floor(taps / 2);

  for (let i = 0; i < inputSamples; i++) {
    let sum = 0;
    for (let j = 0; j < taps; j++) {
      const sampleIdx = i - halfTaps + j;
      if (sampleIdx >= 0 && sampleIdx < inputSamples) {
        sum += input.readInt16LE(sampleIdx * 2) * coefficients[j];
      }
    }
    output.writeInt16LE(Math.max(-32768, Math.min(32767, Math.round(sum))), i * 2);
  }

  return output;
}
