// ─── App Config Schema ──────────────────────────────────────────────────────
//
// Optional piecewise-midi.config.json: where soundfonts live, the default
// analysis request, and the ranges the tool server clamps requests into.
// ─────────────────────────────────────────────────────────────────────────────

import { z } from "zod";
import type { AnalysisConfig } from "../audio/types.js";

// ─── Zod Schemas ─────────────────────────────────────────────────────────────

export const AnalysisDefaultsSchema = z.object({
  sampleCount: z.number().int().min(2).default(8192),
  startTimeSeconds: z.number().min(0).default(0),
  baseFrequencyHz: z.number().positive().default(440),
  harmonicCount: z.number().int().min(1).default(16),
  boost: z.number().finite().default(1),
});

export const AnalysisLimitsSchema = z
  .object({
    minSamples: z.number().int().min(2).default(64),
    maxSamples: z.number().int().min(2).default(65536),
    minStartTime: z.number().min(0).default(0),
    maxStartTime: z.number().min(0).default(300),
    minBaseFreq: z.number().positive().default(1),
    maxBaseFreq: z.number().positive().default(20000),
    minHarmonics: z.number().int().min(1).default(1),
    maxHarmonics: z.number().int().min(1).default(256),
    minBoost: z.number().finite().default(0.5),
    maxBoost: z.number().finite().default(2),
  })
  .refine((l) => l.minSamples <= l.maxSamples, { message: "minSamples must not exceed maxSamples" })
  .refine((l) => l.minStartTime <= l.maxStartTime, { message: "minStartTime must not exceed maxStartTime" })
  .refine((l) => l.minBaseFreq <= l.maxBaseFreq, { message: "minBaseFreq must not exceed maxBaseFreq" })
  .refine((l) => l.minHarmonics <= l.maxHarmonics, { message: "minHarmonics must not exceed maxHarmonics" })
  .refine((l) => l.minBoost <= l.maxBoost, { message: "minBoost must not exceed maxBoost" });

export const AppConfigSchema = z.object({
  soundfontsDir: z.string().min(1).default("soundfonts"),
  analysis: z
    .object({
      defaults: AnalysisDefaultsSchema.default({}),
      limits: AnalysisLimitsSchema.default({}),
    })
    .default({}),
});

// ─── Derived Types ───────────────────────────────────────────────────────────

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type AnalysisDefaults = z.infer<typeof AnalysisDefaultsSchema>;
export type AnalysisLimits = z.infer<typeof AnalysisLimitsSchema>;

// ─── Clamping ────────────────────────────────────────────────────────────────

/**
 * Fill missing fields from defaults and clamp every field into its limit
 * range. This is a caller policy for untrusted requests; the analyzer
 * itself rejects out-of-range values instead.
 */
export function clampAnalysisConfig(
  request: Partial<AnalysisConfig>,
  defaults: AnalysisDefaults,
  limits: AnalysisLimits,
): AnalysisConfig {
  return {
    sampleCount: Math.round(clamp(request.sampleCount ?? defaults.sampleCount, limits.minSamples, limits.maxSamples)),
    startTimeSeconds: clamp(request.startTimeSeconds ?? defaults.startTimeSeconds, limits.minStartTime, limits.maxStartTime),
    baseFrequencyHz: clamp(request.baseFrequencyHz ?? defaults.baseFrequencyHz, limits.minBaseFreq, limits.maxBaseFreq),
    harmonicCount: Math.round(clamp(request.harmonicCount ?? defaults.harmonicCount, limits.minHarmonics, limits.maxHarmonics)),
    boost: clamp(request.boost ?? defaults.boost, limits.minBoost, limits.maxBoost),
  };
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}
