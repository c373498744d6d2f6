// ─── MIDI Processor ─────────────────────────────────────────────────────────
//
// Runs the whole conversion for one file:
//   bytes → decode → tempo map → reduce → bind soundfonts → formula text
//
// The soundfont directory is injected; nothing here reads configuration.
// ─────────────────────────────────────────────────────────────────────────────

import { readFile } from "node:fs/promises";
import { wrapIoError } from "../errors.js";
import { encodeFormula } from "../formula/encoder.js";
import {
  DEFAULT_SOUNDFONT,
  loadSoundfont,
  verifySoundfonts,
  type SoundfontRef,
} from "../soundfonts/files.js";
import { createSoundFontTable, PLACEHOLDER_SOUNDFONT } from "../soundfonts/table.js";
import { bindChannelSoundfonts, expandAssignments } from "./binder.js";
import { decodeMidi, decodeMidiInfo } from "./decoder.js";
import { reduceNoteEvents } from "./reducer.js";
import { TempoMap } from "./tempo-map.js";
import type { Channel, ProcessedSong } from "./types.js";

/** Decode and reduce without binding; notes still carry raw channel ids. */
export function processMidi(bytes: Uint8Array, source?: string): ProcessedSong {
  const decoded = decodeMidi(bytes, source);
  const tempoMap = TempoMap.fromChanges(decoded.ticksPerQuarterNote, decoded.tempoChanges);
  return {
    noteEvents: reduceNoteEvents(decoded.events, tempoMap),
    channels: decoded.channels,
    soundfonts: createSoundFontTable([PLACEHOLDER_SOUNDFONT]),
  };
}

/** Drum channels get no soundfont, every other channel the default one. */
export function defaultSoundfontRefs(channels: readonly Channel[]): SoundfontRef[] {
  return channels.map((ch): SoundfontRef => (ch.isDrum ? { kind: "none" } : { kind: "file", name: DEFAULT_SOUNDFONT }));
}

/** Read a MIDI file; filesystem failures surface as IoError. */
export async function readMidiFile(path: string): Promise<Uint8Array> {
  try {
    return await readFile(path);
  } catch (err) {
    throw wrapIoError(err, path, "MIDI file");
  }
}

export class MidiProcessor {
  constructor(readonly soundfontDir: string) {}

  /** Channel and instrument info only. */
  processInfo(bytes: Uint8Array, source?: string): ProcessedSong {
    return decodeMidiInfo(bytes, source);
  }

  /**
   * Full conversion with one soundfont reference per channel (or a single
   * reference for all channels). Counts are checked and every file is
   * loaded before any binding happens.
   */
  async processWithSoundfonts(
    bytes: Uint8Array,
    refs: readonly SoundfontRef[],
    source?: string,
  ): Promise<ProcessedSong> {
    const info = decodeMidiInfo(bytes, source);
    expandAssignments(info.channels, refs);
    verifySoundfonts(refs, this.soundfontDir);

    const fonts = await Promise.all(refs.map((ref) => loadSoundfont(ref, this.soundfontDir)));
    return bindChannelSoundfonts(processMidi(bytes, source), fonts);
  }

  /** Check that every referenced soundfont file exists. */
  verifySoundfonts(refs: readonly SoundfontRef[]): void {
    verifySoundfonts(refs, this.soundfontDir);
  }

  /** Read `path` and return its channel info. */
  async infoForFile(path: string): Promise<ProcessedSong> {
    return this.processInfo(await readMidiFile(path), path);
  }

  /**
   * Read `path` and convert it to formula text.
   * Without refs, drums are left out and other channels use the default soundfont.
   */
  async convertFile(path: string, refs?: readonly SoundfontRef[]): Promise<string> {
    const bytes = await readMidiFile(path);
    const effective = refs && refs.length > 0 ? refs : defaultSoundfontRefs(this.processInfo(bytes, path).channels);
    const song = await this.processWithSoundfonts(bytes, effective, path);
    return encodeFormula(song);
  }
}
