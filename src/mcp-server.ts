#!/usr/bin/env node
// ─── piecewise-midi: MCP Server ─────────────────────────────────────────────
//
// Exposes MIDI → formula conversion and WAV → soundfont analysis as MCP
// tools, so an assistant can inspect a MIDI file, pick soundfonts per
// channel, and produce the formula text.
//
// Usage:
//   node dist/mcp-server.js          # stdio transport
//
// Tools:
//   midi_info          channels and instruments in a MIDI file
//   convert_midi       MIDI file → piecewise formula text
//   analyze_wav        WAV sample → harmonic weights (soundfont)
//   list_soundfonts    soundfont files in the configured directory
//   save_soundfont     write weights as a soundfont file
// ─────────────────────────────────────────────────────────────────────────────

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { z } from "zod";
import { loadConfig } from "./config/loader.js";
import {
  analyzeWavTool,
  convertMidiTool,
  listSoundfontsTool,
  midiInfoTool,
  saveSoundfontTool,
  type ToolContext,
} from "./tools.js";

// ─── Server ─────────────────────────────────────────────────────────────────

const server = new McpServer({
  name: "piecewise-midi",
  version: "0.1.0",
});

function registerTools(ctx: ToolContext): void {
  server.tool(
    "midi_info",
    "List the channels of a MIDI file with their General MIDI instrument. Channel ids are 1-based; channel 10 is drums.",
    {
      path: z.string().min(1).describe("Path to a .mid file"),
    },
    async (params) => midiInfoTool(ctx, params),
  );

  server.tool(
    "convert_midi",
    "Convert a MIDI file to piecewise formula text. Give one soundfont per channel (\"-\" skips a channel) or a single soundfont for all channels. Without soundfonts, drums are skipped and other channels use default.txt.",
    {
      path: z.string().min(1).describe("Path to a .mid file"),
      soundfonts: z.array(z.string().min(1)).optional().describe("Soundfont names in channel order (.txt optional, \"-\" to skip)"),
    },
    async (params) => convertMidiTool(ctx, params),
  );

  server.tool(
    "analyze_wav",
    "Analyze a WAV sample's harmonic spectrum and return comma-separated soundfont weights. Out-of-range values are clamped to the configured limits.",
    {
      path: z.string().min(1).describe("Path to a .wav file"),
      samples: z.number().int().optional().describe("Number of samples to analyze (FFT length)"),
      startTime: z.number().optional().describe("Where analysis starts, in seconds"),
      baseFreq: z.number().optional().describe("Fundamental frequency in Hz"),
      harmonics: z.number().int().optional().describe("Number of harmonics to extract"),
      boost: z.number().optional().describe("Amplification factor applied after normalization"),
    },
    async (params) => analyzeWavTool(ctx, params),
  );

  server.tool(
    "list_soundfonts",
    "List the soundfont files available for conversion.",
    async () => listSoundfontsTool(ctx),
  );

  server.tool(
    "save_soundfont",
    "Save harmonic weights as a soundfont file for later conversions.",
    {
      name: z.string().min(1).describe("Soundfont name (.txt is appended when missing)"),
      weights: z.array(z.number()).min(1).describe("Harmonic weights, fundamental first"),
    },
    async (params) => saveSoundfontTool(ctx, params),
  );
}

// ─── Start ──────────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  const config = loadConfig();
  registerTools({ config });

  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error(`piecewise-midi MCP server running on stdio (soundfonts: ${config.soundfontsDir})`);
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
