// ─── Note Event Reducer ─────────────────────────────────────────────────────
//
// Merges every track's voice events into one timeline, pairs note-ons with
// their note-offs, and groups the closed intervals by start millisecond.
// ─────────────────────────────────────────────────────────────────────────────

import type { TempoMap } from "./tempo-map.js";
import type { NoteEvent, NoteInterval, Timestamp, VoiceEvent } from "./types.js";

interface SoundingNote {
  note: number;
  channel: number;
  velocity: number;
  startTimeMs: Timestamp;
}

/**
 * Reduce voice events to NoteEvents sorted by start time.
 *
 * - Events are merged by absolute tick, then track; ties within a track keep
 *   their input order.
 * - A note-on for a (note, channel) pair that is already sounding replaces
 *   the earlier start; the earlier instance is dropped without an interval.
 * - Note-off (or note-on with velocity 0) for a silent pair is ignored.
 * - Notes still sounding at the end are closed at the time of the last event.
 */
export function reduceNoteEvents(events: readonly VoiceEvent[], tempoMap: TempoMap): NoteEvent[] {
  const ordered = [...events].sort((a, b) => a.tick - b.tick || a.track - b.track);

  const sounding = new Map<string, SoundingNote>();
  const byStart = new Map<Timestamp, NoteInterval[]>();
  let lastTimeMs: Timestamp = 0;

  const close = (entry: SoundingNote, endTimeMs: Timestamp): void => {
    const interval: NoteInterval = {
      note: entry.note,
      velocity: entry.velocity,
      soundfontIndex: entry.channel,
      endTimeMs,
    };
    const group = byStart.get(entry.startTimeMs);
    if (group) {
      group.push(interval);
    } else {
      byStart.set(entry.startTimeMs, [interval]);
    }
  };

  for (const event of ordered) {
    const timeMs = tempoMap.ticksToMs(event.tick);
    lastTimeMs = timeMs;
    const { message } = event;

    if (message.type === "noteOn" && message.velocity > 0) {
      sounding.set(noteKey(message.note, event.channel), {
        note: message.note,
        channel: event.channel,
        velocity: message.velocity,
        startTimeMs: timeMs,
      });
    } else if (message.type === "noteOn" || message.type === "noteOff") {
      const key = noteKey(message.note, event.channel);
      const entry = sounding.get(key);
      if (entry) {
        close(entry, timeMs);
        sounding.delete(key);
      }
    }
  }

  for (const entry of sounding.values()) {
    close(entry, lastTimeMs);
  }

  return [...byStart.entries()]
    .sort(([a], [b]) => a - b)
    .map(([startTimeMs, notes]) => ({ startTimeMs, notes }));
}

function noteKey(note: number, channel: number): string {
  return `${channel}:${note}`;
}
