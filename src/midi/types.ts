// ─── MIDI Conversion Types ──────────────────────────────────────────────────
//
// Shapes that flow through the conversion pipeline:
//   decoder (ticks) → reducer (milliseconds) → binder → formula encoder.
// ─────────────────────────────────────────────────────────────────────────────

/** Milliseconds from the start of the file. */
export type Timestamp = number;

/** Harmonic weights for one timbre; index 0 is the fundamental. */
export type SoundFont = number[];

/** A tempo change at an absolute tick position. */
export interface TempoChange {
  tick: number;
  /** Microseconds per quarter note (500000 = 120 BPM). */
  microsecondsPerQuarterNote: number;
}

/** A MIDI channel that carried at least one channel-voice message. */
export interface Channel {
  /** Channel number (0–15). */
  id: number;
  /** General MIDI program number (0–127). 0 until a program change is seen. */
  instrument: number;
  /** True for channel 10 (id 9). */
  isDrum: boolean;
}

/** Channel-voice message payloads the pipeline cares about. */
export type VoiceMessage =
  | { type: "noteOn"; note: number; velocity: number }
  | { type: "noteOff"; note: number; velocity: number }
  | { type: "programChange"; program: number }
  | { type: "other" };

/** A channel-voice event with its absolute tick on its own track. */
export interface VoiceEvent {
  tick: number;
  channel: number;
  /** Index of the track the event came from. */
  track: number;
  message: VoiceMessage;
}

/** Output of the decoder, before any tempo-aware reduction. */
export interface DecodedMidi {
  ticksPerQuarterNote: number;
  /** Tempo changes in discovery order (not sorted). */
  tempoChanges: TempoChange[];
  /** Channels in discovery order. */
  channels: Channel[];
  /** Every channel-voice event, per track order, not merged across tracks. */
  events: VoiceEvent[];
}

/** A closed note. Belongs to the NoteEvent at its start time. */
export interface NoteInterval {
  note: number;
  velocity: number;
  /** Raw channel id until binding, then an index into the soundfont table. */
  soundfontIndex: number;
  endTimeMs: Timestamp;
}

/** All intervals that start at the same millisecond. */
export interface NoteEvent {
  startTimeMs: Timestamp;
  notes: NoteInterval[];
}

/** Soundfonts padded to a common row length. */
export interface SoundFontTable {
  readonly fonts: readonly (readonly number[])[];
  /** Length of the longest soundfont (every row has this length). */
  readonly maxSize: number;
}

/** A reduced song ready for formula encoding. */
export interface ProcessedSong {
  /** Sorted by startTimeMs ascending. */
  noteEvents: NoteEvent[];
  channels: Channel[];
  soundfonts: SoundFontTable;
}
