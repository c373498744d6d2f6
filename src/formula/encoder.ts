// ─── Piecewise Formula Encoder ──────────────────────────────────────────────
//
// Serializes a ProcessedSong into graphing-calculator definitions:
//
//   A = piecewise over t (seconds) → flat [relNote, velocity, soundfont, ...]
//   B = every soundfont row, concatenated
//   C = soundfont row length
//
// Long songs are split into A_{1}, A_{2}, ... with A selecting between them.
// ─────────────────────────────────────────────────────────────────────────────

import type { NoteEvent, ProcessedSong, SoundFontTable } from "../midi/types.js";
import { flattenSoundFontTable } from "../soundfonts/table.js";

/** Maximum text length of one piecewise section. */
export const MAX_FORMULA_LENGTH = 20_000;

/** MIDI note of A4 (440 Hz), the zero point for relative notes. */
export const A4_MIDI_NOTE = 69;

/** Silence tail appended after the last timestamp, in seconds. */
const TRAILING_SILENCE_SECONDS = 0.1;

export const EMPTY_SONG_FORMULA = "A=\\left\\{t<0:\\left[\\right]\\right\\}\nB=\\left[\\right]\nC=0";

/** A note sounding during one window, ready for the array encoding. */
export interface ActiveNote {
  note: number;
  velocity: number;
  soundfontIndex: number;
}

interface Section {
  name: string;
  branches: string[];
  /** Upper time bound (seconds) of the last branch. */
  endTime: number;
}

export interface EncodeOptions {
  /** Override the section length limit. */
  maxSectionLength?: number;
}

/**
 * Encode a song as newline-separated formula definitions.
 * Pure: the same song always yields byte-identical text.
 */
export function encodeFormula(song: ProcessedSong, options: EncodeOptions = {}): string {
  if (song.noteEvents.length === 0) return EMPTY_SONG_FORMULA;

  const maxLength = options.maxSectionLength ?? MAX_FORMULA_LENGTH;
  const noteEvents = [...song.noteEvents].sort((a, b) => a.startTimeMs - b.startTimeMs);
  const timestamps = collectTimestamps(noteEvents);

  const sections: Section[] = [];
  let branches: string[] = [];
  let length = 0;
  let endTime = 0;

  const closeSection = (): void => {
    sections.push({ name: sectionName(sections.length + 1), branches, endTime });
    branches = [];
    length = 0;
  };

  for (let i = 0; i + 1 < timestamps.length; i++) {
    const current = timestamps[i];
    const next = timestamps[i + 1];
    const branch = `t<${next.toFixed(3)}:${formatNoteArray(activeNotesAt(noteEvents, current))}`;

    if (length + branch.length > maxLength && branches.length > 0) {
      closeSection();
    }
    branches.push(branch);
    length += branch.length;
    endTime = next;
  }

  const silenceUntil = timestamps[timestamps.length - 1] + TRAILING_SILENCE_SECONDS;
  branches.push(`t<${formatNumber(silenceUntil)}:${formatArray([])}`);
  endTime = silenceUntil;
  closeSection();

  const formulas = sections.map((s) => formatPiecewise(s.name, s.branches));
  if (sections.length > 1) {
    const selector = sections.map((s) => `t<${s.endTime.toFixed(3)}:${s.name}`);
    formulas.unshift(formatPiecewise("A", selector));
  } else {
    formulas[0] = formatPiecewise("A", sections[0].branches);
  }

  formulas.push(...formatSoundfontDefinitions(song.soundfonts));
  return formulas.join("\n");
}

/**
 * Every distinct second at which something starts or stops, ascending.
 */
export function collectTimestamps(noteEvents: readonly NoteEvent[]): number[] {
  const seen = new Set<number>();
  for (const event of noteEvents) {
    seen.add(event.startTimeMs);
    for (const interval of event.notes) {
      seen.add(interval.endTimeMs);
    }
  }
  return [...seen].sort((a, b) => a - b).map((ms) => ms / 1000);
}

/**
 * Notes sounding at `time` (seconds): started at or before it, ending after it.
 * Sorted by note number; ties keep start order.
 */
export function activeNotesAt(noteEvents: readonly NoteEvent[], time: number): ActiveNote[] {
  const active: ActiveNote[] = [];
  for (const event of noteEvents) {
    if (event.startTimeMs / 1000 > time) break;
    for (const interval of event.notes) {
      if (interval.endTimeMs / 1000 > time) {
        active.push({ note: interval.note, velocity: interval.velocity, soundfontIndex: interval.soundfontIndex });
      }
    }
  }
  return active.sort((a, b) => a.note - b.note);
}

/** Semitones relative to A4. */
export function midiNoteToRelative(note: number): number {
  return note - A4_MIDI_NOTE;
}

// ─── Text Grammar ────────────────────────────────────────────────────────────

export function formatArray(values: readonly (string | number)[]): string {
  return `\\left[${values.map((v) => (typeof v === "number" ? formatNumber(v) : v)).join(",")}\\right]`;
}

export function formatNoteArray(notes: readonly ActiveNote[]): string {
  return formatArray(notes.flatMap((n) => [midiNoteToRelative(n.note), n.velocity, n.soundfontIndex]));
}

export function formatPiecewise(name: string, branches: readonly string[]): string {
  return `${name}=\\left\\{${branches.join(",")}\\right\\}`;
}

export function formatSoundfontDefinitions(table: SoundFontTable): string[] {
  return [`B=${formatArray(flattenSoundFontTable(table))}`, `C=${table.maxSize}`];
}

function sectionName(index: number): string {
  return `A_{${index}}`;
}

/**
 * Shortest round-trip decimal text, never in exponent notation
 * (the target tool does not read `1e-7`).
 */
export function formatNumber(value: number): string {
  if (Object.is(value, -0)) return "0";
  const text = String(value);
  if (!/e/i.test(text)) return text;
  const fixed = value.toFixed(20);
  return fixed.includes(".") ? fixed.replace(/0+$/, "").replace(/\.$/, "") : fixed;
}
