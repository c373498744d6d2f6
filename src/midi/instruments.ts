// ─── General MIDI Instruments ───────────────────────────────────────────────
//
// Program number → instrument name, from data/gm-instruments.json.
// ─────────────────────────────────────────────────────────────────────────────

import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import type { Channel } from "./types.js";

const INSTRUMENTS_PATH = fileURLToPath(new URL("../../data/gm-instruments.json", import.meta.url));

const InstrumentListSchema = z.array(z.string().min(1)).length(128);

let instruments: readonly string[] | null = null;

function loadInstruments(): readonly string[] {
  if (!instruments) {
    instruments = InstrumentListSchema.parse(JSON.parse(readFileSync(INSTRUMENTS_PATH, "utf8")));
  }
  return instruments;
}

/**
 * Instrument name for a program number. Drum channels are always "Drum Kit".
 */
export function getInstrumentName(program: number, isDrum: boolean): string {
  if (isDrum) return "Drum Kit";
  return loadInstruments()[program] ?? "Unknown Instrument";
}

/** "Channel 10: [DRUMS] Drum Kit". Channel numbers are shown 1-based. */
export function describeChannel(channel: Channel): string {
  const drums = channel.isDrum ? "[DRUMS] " : "";
  return `Channel ${channel.id + 1}: ${drums}${getInstrumentName(channel.instrument, channel.isDrum)}`;
}
