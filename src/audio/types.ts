// ─── Audio Analysis Types ───────────────────────────────────────────────────

import { z } from "zod";

/** Decoded WAV audio. */
export interface WavData {
  /** Interleaved samples normalized to [-1, 1]. */
  samples: Float32Array;
  /** Sample rate in Hz. */
  sampleRate: number;
  /** Number of interleaved channels. */
  channels: number;
}

export const AnalysisConfigSchema = z.object({
  /** Number of sample frames to analyse (also the FFT length). */
  sampleCount: z.number().int().min(2),
  /** Where analysis starts, in seconds. */
  startTimeSeconds: z.number().finite().min(0),
  /** Fundamental frequency in Hz. */
  baseFrequencyHz: z.number().finite().positive(),
  /** Number of harmonics to extract (fundamental included). */
  harmonicCount: z.number().int().min(1),
  /** Multiplier applied after normalization. */
  boost: z.number().finite(),
});

export type AnalysisConfig = z.infer<typeof AnalysisConfigSchema>;
