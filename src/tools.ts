// ─── Tool Handlers ──────────────────────────────────────────────────────────
//
// Transport-independent handlers behind the MCP tools. Each one takes
// validated parameters and returns MCP-style text content; conversion
// failures come back as `isError` results instead of throwing.
// ─────────────────────────────────────────────────────────────────────────────

import { analyzeHarmonics, formatSoundfont } from "./audio/analysis.js";
import type { AnalysisConfig } from "./audio/types.js";
import { readWavFile } from "./audio/wav.js";
import { clampAnalysisConfig, type AppConfig } from "./config/schema.js";
import { isPiecewiseError } from "./errors.js";
import { getInstrumentName } from "./midi/instruments.js";
import { MidiProcessor } from "./midi/processor.js";
import { listSoundfonts, parseSoundfontRef, saveSoundfont } from "./soundfonts/files.js";

// Must stay a type alias: the SDK's result type has an index signature.
export type ToolResult = {
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
};

export interface ChannelInfo {
  /** 1-based, as shown to users. */
  id: number;
  instrument: string;
  isDrum: boolean;
}

export interface ToolContext {
  config: AppConfig;
}

function text(body: string): ToolResult {
  return { content: [{ type: "text", text: body }] };
}

async function guarded(run: () => Promise<ToolResult>): Promise<ToolResult> {
  try {
    return await run();
  } catch (err) {
    if (!isPiecewiseError(err)) throw err;
    return { content: [{ type: "text", text: err.message }], isError: true };
  }
}

// ─── MIDI ────────────────────────────────────────────────────────────────────

export async function midiChannels(ctx: ToolContext, path: string): Promise<ChannelInfo[]> {
  const song = await new MidiProcessor(ctx.config.soundfontsDir).infoForFile(path);
  return song.channels.map((ch) => ({
    id: ch.id + 1,
    instrument: getInstrumentName(ch.instrument, ch.isDrum),
    isDrum: ch.isDrum,
  }));
}

export function midiInfoTool(ctx: ToolContext, params: { path: string }): Promise<ToolResult> {
  return guarded(async () => {
    const channels = await midiChannels(ctx, params.path);
    return text(JSON.stringify({ channels }, null, 2));
  });
}

export function convertMidiTool(
  ctx: ToolContext,
  params: { path: string; soundfonts?: string[] },
): Promise<ToolResult> {
  return guarded(async () => {
    const refs = (params.soundfonts ?? []).map(parseSoundfontRef);
    const formula = await new MidiProcessor(ctx.config.soundfontsDir).convertFile(params.path, refs);
    return text(formula);
  });
}

// ─── Audio ───────────────────────────────────────────────────────────────────

export interface AnalyzeWavParams {
  path: string;
  samples?: number;
  startTime?: number;
  baseFreq?: number;
  harmonics?: number;
  boost?: number;
}

/** Defaults filled and values clamped into the configured limits. */
export function resolveAnalysisRequest(ctx: ToolContext, params: AnalyzeWavParams): AnalysisConfig {
  const { defaults, limits } = ctx.config.analysis;
  return clampAnalysisConfig(
    {
      sampleCount: params.samples,
      startTimeSeconds: params.startTime,
      baseFrequencyHz: params.baseFreq,
      harmonicCount: params.harmonics,
      boost: params.boost,
    },
    defaults,
    limits,
  );
}

export function analyzeWavTool(ctx: ToolContext, params: AnalyzeWavParams): Promise<ToolResult> {
  return guarded(async () => {
    const wav = await readWavFile(params.path);
    const harmonics = analyzeHarmonics(wav, resolveAnalysisRequest(ctx, params));
    return text(formatSoundfont(harmonics));
  });
}

// ─── Soundfonts ──────────────────────────────────────────────────────────────

export function listSoundfontsTool(ctx: ToolContext): Promise<ToolResult> {
  return guarded(async () => {
    const names = await listSoundfonts(ctx.config.soundfontsDir);
    return text(names.length === 0 ? "No soundfonts found." : names.join("\n"));
  });
}

export function saveSoundfontTool(
  ctx: ToolContext,
  params: { name: string; weights: number[] },
): Promise<ToolResult> {
  return guarded(async () => {
    const fileName = await saveSoundfont(params.name, params.weights, ctx.config.soundfontsDir);
    return text(`Soundfont saved: ${fileName}`);
  });
}
