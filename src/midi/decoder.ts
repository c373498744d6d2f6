// ─── MIDI Decoder ───────────────────────────────────────────────────────────
//
// Parses Standard MIDI File bytes with midi-file and flattens every track
// into absolute-tick channel-voice events, tempo changes and channel info.
// Only "ticks per quarter note" timing is accepted.
// ─────────────────────────────────────────────────────────────────────────────

import { parseMidi, type MidiData } from "midi-file";
import { ContainerParseError, UnsupportedFormatError } from "../errors.js";
import { createSoundFontTable, PLACEHOLDER_SOUNDFONT } from "../soundfonts/table.js";
import type { Channel, DecodedMidi, ProcessedSong, TempoChange, VoiceEvent, VoiceMessage } from "./types.js";

/** General MIDI percussion channel (channel 10, zero-indexed). */
export const DRUM_CHANNEL = 9;

/**
 * Decode MIDI bytes into per-track absolute-tick events.
 *
 * @param source File path or label used in error messages.
 * @throws ContainerParseError on malformed bytes.
 * @throws UnsupportedFormatError on SMPTE time division.
 */
export function decodeMidi(bytes: Uint8Array, source?: string): DecodedMidi {
  const midi = parseContainer(bytes, source);

  const ticksPerQuarterNote = midi.header.ticksPerBeat;
  if (ticksPerQuarterNote === undefined) {
    throw new UnsupportedFormatError("midi", "SMPTE time division (only ticks per quarter note is supported)");
  }
  if (ticksPerQuarterNote <= 0) {
    throw new ContainerParseError("midi", "MIDI header declares zero ticks per quarter note", source);
  }

  const tempoChanges: TempoChange[] = [];
  const channels = new Map<number, Channel>();
  const events: VoiceEvent[] = [];

  midi.tracks.forEach((track, trackIndex) => {
    let tick = 0;
    for (const event of track) {
      tick += event.deltaTime;

      if (event.type === "setTempo") {
        tempoChanges.push({ tick, microsecondsPerQuarterNote: event.microsecondsPerBeat });
        continue;
      }

      const voice = toVoiceEvent(event, tick, trackIndex);
      if (!voice) continue;

      let channel = channels.get(voice.channel);
      if (!channel) {
        channel = { id: voice.channel, instrument: 0, isDrum: voice.channel === DRUM_CHANNEL };
        channels.set(voice.channel, channel);
      }
      if (voice.message.type === "programChange") {
        channel.instrument = voice.message.program;
      }
      events.push(voice);
    }
  });

  return {
    ticksPerQuarterNote,
    tempoChanges,
    channels: [...channels.values()],
    events,
  };
}

/**
 * Info-only decode: channel and instrument metadata without note reduction.
 * The soundfont table holds a single placeholder row.
 */
export function decodeMidiInfo(bytes: Uint8Array, source?: string): ProcessedSong {
  const decoded = decodeMidi(bytes, source);
  return {
    noteEvents: [],
    channels: decoded.channels,
    soundfonts: createSoundFontTable([PLACEHOLDER_SOUNDFONT]),
  };
}

// ─── Internal ────────────────────────────────────────────────────────────────

function parseContainer(bytes: Uint8Array, source?: string): MidiData {
  try {
    return parseMidi(bytes);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    const where = source ? ` (${source})` : "";
    throw new ContainerParseError("midi", `MIDI parsing error${where}: ${reason}`, source, { cause: err });
  }
}

type TrackEvent = MidiData["tracks"][number][number];

function toVoiceEvent(event: TrackEvent, tick: number, track: number): VoiceEvent | null {
  let message: VoiceMessage;
  let channel: number;

  switch (event.type) {
    case "noteOn":
      message = { type: "noteOn", note: event.noteNumber, velocity: event.velocity };
      channel = event.channel;
      break;
    case "noteOff":
      message = { type: "noteOff", note: event.noteNumber, velocity: event.velocity };
      channel = event.channel;
      break;
    case "programChange":
      message = { type: "programChange", program: event.programNumber };
      channel = event.channel;
      break;
    case "noteAftertouch":
    case "controller":
    case "channelAftertouch":
    case "pitchBend":
      message = { type: "other" };
      channel = event.channel;
      break;
    default:
      return null;
  }

  return { tick, channel, track, message };
}
