// ─── piecewise-midi ─────────────────────────────────────────────────────────
//
// MIDI files → graphing-calculator piecewise formulas, and WAV samples →
// harmonic soundfonts.
//
// Usage:
//   import { MidiProcessor, analyzeHarmonics, decodeWav } from "piecewise-midi";
//   const formula = await new MidiProcessor("soundfonts").convertFile("song.mid");
// ─────────────────────────────────────────────────────────────────────────────

// MIDI pipeline
export { decodeMidi, decodeMidiInfo, DRUM_CHANNEL } from "./midi/decoder.js";
export { TempoMap, ticksToMs, DEFAULT_MICROSECONDS_PER_QUARTER } from "./midi/tempo-map.js";
export { reduceNoteEvents } from "./midi/reducer.js";
export {
  bindSoundfonts,
  bindChannelSoundfonts,
  expandAssignments,
  planBinding,
  type ChannelSoundfontMap,
} from "./midi/binder.js";
export { getInstrumentName, describeChannel } from "./midi/instruments.js";
export { MidiProcessor, processMidi, defaultSoundfontRefs, readMidiFile } from "./midi/processor.js";

export type {
  Timestamp,
  SoundFont,
  TempoChange,
  Channel,
  VoiceMessage,
  VoiceEvent,
  DecodedMidi,
  NoteInterval,
  NoteEvent,
  SoundFontTable,
  ProcessedSong,
} from "./midi/types.js";

// Formula
export {
  encodeFormula,
  formatNumber,
  midiNoteToRelative,
  EMPTY_SONG_FORMULA,
  MAX_FORMULA_LENGTH,
  type EncodeOptions,
} from "./formula/encoder.js";

// Soundfonts
export { createSoundFontTable, flattenSoundFontTable, PLACEHOLDER_SOUNDFONT } from "./soundfonts/table.js";
export {
  parseSoundfontRef,
  formatSoundfontRef,
  parseSoundfontText,
  loadSoundfont,
  verifySoundfonts,
  listSoundfonts,
  saveSoundfont,
  DEFAULT_SOUNDFONT,
  NO_SOUNDFONT,
  type SoundfontRef,
} from "./soundfonts/files.js";

// Audio analysis
export { decodeWav, readWavFile, wavDuration } from "./audio/wav.js";
export { realFft } from "./audio/fft.js";
export { analyzeHarmonics, validateAnalysisConfig, formatSoundfont } from "./audio/analysis.js";
export { AnalysisConfigSchema, type AnalysisConfig, type WavData } from "./audio/types.js";

// Config
export { loadConfig, parseConfig, configPath, CONFIG_FILE_NAME } from "./config/loader.js";
export { AppConfigSchema, clampAnalysisConfig, type AppConfig } from "./config/schema.js";

// Errors
export {
  ContainerParseError,
  UnsupportedFormatError,
  InvalidParametersError,
  SoundfontMismatchError,
  IoError,
  isPiecewiseError,
  describeError,
  type PiecewiseError,
  type PiecewiseErrorKind,
} from "./errors.js";
