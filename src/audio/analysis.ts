// ─── Harmonic Analyzer ──────────────────────────────────────────────────────
//
// Derives a soundfont (relative harmonic amplitudes) from a WAV segment:
//   1. Validate the request against the audio
//   2. Downmix to mono (mean across channels)
//   3. Hann window
//   4. FFT (length = sample count)
//   5. Quadratic-interpolated magnitude at each harmonic bin
//   6. Normalize to the strongest harmonic, apply boost, round to 5 places
// ─────────────────────────────────────────────────────────────────────────────

import { InvalidParametersError } from "../errors.js";
import { magnitude, realFft, type Spectrum } from "./fft.js";
import { AnalysisConfigSchema, type AnalysisConfig, type WavData } from "./types.js";
import { frameCount, wavDuration } from "./wav.js";

const ROUNDING_SCALE = 100_000;

/**
 * Extract normalized harmonic weights, fundamental first.
 *
 * @throws InvalidParametersError when the request does not fit the audio.
 */
export function analyzeHarmonics(wav: WavData, config: AnalysisConfig): number[] {
  validateAnalysisConfig(wav, config);

  const mono = extractMonoSamples(wav, config);
  const windowed = applyHannWindow(mono);
  const spectrum = realFft(windowed);
  return extractHarmonicWeights(spectrum, config, wav.sampleRate);
}

/**
 * Check a request against the audio before any heavy work.
 * Messages name the offending value and the limit it ran into.
 */
export function validateAnalysisConfig(wav: WavData, config: AnalysisConfig): void {
  const parsed = AnalysisConfigSchema.safeParse(config);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const parameter = issue.path.join(".") || "config";
    throw new InvalidParametersError(parameter, `Invalid ${parameter}: ${issue.message}`);
  }

  const totalSamples = frameCount(wav);
  const duration = wavDuration(wav);
  const startSample = startSampleOf(config, wav.sampleRate);

  if (config.startTimeSeconds >= duration) {
    throw new InvalidParametersError(
      "startTimeSeconds",
      `Start time (${config.startTimeSeconds.toFixed(2)}s) exceeds audio duration (${duration.toFixed(2)}s)`,
      duration,
    );
  }

  if (startSample + config.sampleCount > totalSamples) {
    const available = totalSamples - startSample;
    throw new InvalidParametersError(
      "sampleCount",
      `Not enough samples available. Requested ${config.sampleCount} samples starting at ` +
        `${config.startTimeSeconds.toFixed(2)}s, but only ${available} samples available. ` +
        "Try reducing the sample count or start time.",
      available,
    );
  }

  const nyquist = wav.sampleRate / 2;
  const maxHarmonics = Math.floor(nyquist / config.baseFrequencyHz);
  if (config.baseFrequencyHz * config.harmonicCount > nyquist) {
    throw new InvalidParametersError(
      "harmonicCount",
      `With base frequency of ${config.baseFrequencyHz.toFixed(1)}Hz, maximum number of harmonics possible ` +
        `is ${maxHarmonics} (limited by Nyquist frequency of ${nyquist.toFixed(1)}Hz)`,
      maxHarmonics,
    );
  }

  const resolution = wav.sampleRate / config.sampleCount;
  if (config.baseFrequencyHz < resolution) {
    throw new InvalidParametersError(
      "baseFrequencyHz",
      `Base frequency of ${config.baseFrequencyHz.toFixed(1)}Hz is below the frequency resolution ` +
        `of ${resolution.toFixed(1)}Hz for ${config.sampleCount} samples. Increase the sample count.`,
      resolution,
    );
  }

  // Each harmonic reads its bin and the bin above
  const binOf = (k: number): number => Math.floor((config.baseFrequencyHz * k) / resolution);
  if (binOf(config.harmonicCount) + 1 >= config.sampleCount) {
    let fitting = 0;
    while (binOf(fitting + 1) + 1 < config.sampleCount) fitting++;
    throw new InvalidParametersError(
      "sampleCount",
      `With ${config.sampleCount} samples, at most ${fitting} harmonics of ` +
        `${config.baseFrequencyHz.toFixed(1)}Hz fit in the spectrum. Increase the sample count.`,
      fitting,
    );
  }
}

/** Mean across channels for each frame of the analysed range. */
export function extractMonoSamples(wav: WavData, config: AnalysisConfig): Float32Array {
  const { channels, samples } = wav;
  const start = startSampleOf(config, wav.sampleRate);
  const mono = new Float32Array(config.sampleCount);

  for (let i = 0; i < config.sampleCount; i++) {
    const base = (start + i) * channels;
    let sum = 0;
    for (let ch = 0; ch < channels; ch++) sum += samples[base + ch];
    mono[i] = sum / channels;
  }
  return mono;
}

/** w(n) = 0.5 · (1 − cos(2πn / (N − 1))) */
export function applyHannWindow(samples: ArrayLike<number>): Float64Array {
  const n = samples.length;
  const out = new Float64Array(n);
  if (n === 1) {
    out[0] = 0;
    return out;
  }
  for (let i = 0; i < n; i++) {
    out[i] = samples[i] * 0.5 * (1 - Math.cos((2 * Math.PI * i) / (n - 1)));
  }
  return out;
}

/**
 * Parabolic peak refinement from the bin and its two neighbours.
 * p = 0.5(α − γ) / (α − 2β + γ) when β > 0, else 0; result |β − 0.25(α − γ)p|.
 */
export function interpolatePeak(alpha: number, beta: number, gamma: number): number {
  const curvature = alpha - 2 * beta + gamma;
  // A flat top has no parabola to fit; keep the bin magnitude
  const p = beta > 0 && curvature !== 0 ? (0.5 * (alpha - gamma)) / curvature : 0;
  return Math.abs(beta - 0.25 * (alpha - gamma) * p);
}

/** Divide by the maximum (when non-zero), multiply by boost, round to 5 places. */
export function normalizeHarmonics(harmonics: readonly number[], boost: number): number[] {
  const max = harmonics.reduce((m, h) => Math.max(m, h), 0);
  return harmonics.map((h) => roundWeight((max > 0 ? h / max : h) * boost));
}

/** Round half away from zero to 5 decimal places. */
export function roundWeight(value: number): number {
  const rounded = (Math.sign(value) * Math.round(Math.abs(value) * ROUNDING_SCALE)) / ROUNDING_SCALE;
  return rounded === 0 ? 0 : rounded;
}

/** Soundfont file text: comma-separated weights. */
export function formatSoundfont(weights: readonly number[]): string {
  return weights.map((w) => String(w)).join(",");
}

// ─── Internal ────────────────────────────────────────────────────────────────

function startSampleOf(config: AnalysisConfig, sampleRate: number): number {
  return Math.floor(config.startTimeSeconds * sampleRate);
}

function extractHarmonicWeights(spectrum: Spectrum, config: AnalysisConfig, sampleRate: number): number[] {
  const length = spectrum.re.length;
  const resolution = sampleRate / length;
  const harmonics: number[] = [];

  for (let k = 1; k <= config.harmonicCount; k++) {
    const targetFrequency = config.baseFrequencyHz * k;
    const bin = Math.floor(targetFrequency / resolution);

    if (bin < 1 || bin + 1 >= length) {
      throw new InvalidParametersError("harmonicCount", `Harmonic ${k} exceeds Nyquist frequency`, k - 1);
    }

    harmonics.push(
      interpolatePeak(magnitude(spectrum, bin - 1), magnitude(spectrum, bin), magnitude(spectrum, bin + 1)),
    );
  }

  return normalizeHarmonics(harmonics, config.boost);
}
