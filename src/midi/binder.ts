// ─── Channel → Soundfont Binding ────────────────────────────────────────────
//
// Assigns each channel a soundfont (or excludes it), drops notes on
// excluded channels, and rewrites the remaining notes' channel ids into
// soundfont table indices.
// ─────────────────────────────────────────────────────────────────────────────

import { SoundfontMismatchError } from "../errors.js";
import { createSoundFontTable } from "../soundfonts/table.js";
import type { Channel, NoteEvent, NoteInterval, ProcessedSong, SoundFont } from "./types.js";

/** Channel id → soundfont table index, or null when the channel is excluded. */
export type ChannelSoundfontMap = ReadonlyMap<number, number | null>;

/**
 * Expand per-channel assignments to exactly one per channel.
 * A single assignment is broadcast to every channel; otherwise the counts
 * must match. Nothing is mutated when this throws.
 *
 * @throws SoundfontMismatchError
 */
export function expandAssignments<T>(channels: readonly Channel[], assignments: readonly T[]): T[] {
  if (assignments.length === 1) {
    return channels.map(() => assignments[0]);
  }
  if (assignments.length !== channels.length) {
    throw new SoundfontMismatchError(channels.length, assignments.length);
  }
  return [...assignments];
}

/**
 * Build the channel → table index map from one optional soundfont per
 * channel (in channel order). Excluded channels map to null; included ones
 * are numbered in order, so the returned `soundfonts` list is the table.
 * A single assignment is stored once and every channel shares index 0
 * (or null when it excludes them).
 *
 * @throws SoundfontMismatchError
 */
export function planBinding(
  channels: readonly Channel[],
  assignments: readonly (SoundFont | null)[],
): { soundfonts: SoundFont[]; channelToIndex: Map<number, number | null> } {
  const channelToIndex = new Map<number, number | null>();

  if (assignments.length === 1) {
    const shared = assignments[0];
    for (const channel of channels) {
      channelToIndex.set(channel.id, shared === null ? null : 0);
    }
    return { soundfonts: shared === null ? [] : [shared], channelToIndex };
  }

  const perChannel = expandAssignments(channels, assignments);
  const soundfonts: SoundFont[] = [];
  channels.forEach((channel, i) => {
    const font = perChannel[i];
    if (font === null) {
      channelToIndex.set(channel.id, null);
    } else {
      channelToIndex.set(channel.id, soundfonts.length);
      soundfonts.push(font);
    }
  });

  return { soundfonts, channelToIndex };
}

/**
 * Apply a binding to a song. Notes whose channel is excluded (or unmapped)
 * are dropped, NoteEvents left empty are removed, and the soundfont table is
 * rebuilt from `soundfonts`.
 */
export function bindSoundfonts(
  song: ProcessedSong,
  soundfonts: readonly SoundFont[],
  channelToIndex: ChannelSoundfontMap,
): ProcessedSong {
  const noteEvents: NoteEvent[] = [];

  for (const event of song.noteEvents) {
    const notes: NoteInterval[] = [];
    for (const interval of event.notes) {
      const index = channelToIndex.get(interval.soundfontIndex);
      if (index === undefined || index === null) continue;
      notes.push({ ...interval, soundfontIndex: index });
    }
    if (notes.length > 0) {
      noteEvents.push({ startTimeMs: event.startTimeMs, notes });
    }
  }

  return {
    noteEvents,
    channels: song.channels,
    soundfonts: createSoundFontTable(soundfonts),
  };
}

/** Validate, plan and apply in one step. */
export function bindChannelSoundfonts(
  song: ProcessedSong,
  assignments: readonly (SoundFont | null)[],
): ProcessedSong {
  const { soundfonts, channelToIndex } = planBinding(song.channels, assignments);
  return bindSoundfonts(song, soundfonts, channelToIndex);
}
