// ─── Test Fixtures ──────────────────────────────────────────────────────────
//
// Builds small MIDI and WAV files in memory so tests never touch real
// recordings. MIDI goes through midi-file's writer; WAV is assembled by
// hand, chunk by chunk.
// ─────────────────────────────────────────────────────────────────────────────

import { writeMidi, type MidiData } from "midi-file";

type TrackEvent = MidiData["tracks"][number][number];

export interface FixtureNote {
  note: number;
  start: number;
  end: number;
  channel?: number;
  velocity?: number;
}

export interface FixtureTrack {
  tempos?: Array<{ tick: number; microsecondsPerQuarterNote: number }>;
  programs?: Array<{ tick: number; channel: number; program: number }>;
  notes?: FixtureNote[];
}

/**
 * Build a Standard MIDI File. One track gives format 0, more give format 1.
 * At equal ticks: tempo, then program, then note-off, then note-on.
 */
export function buildMidi(tracks: FixtureTrack[], ticksPerBeat = 96): Uint8Array {
  const built = tracks.map((track) => {
    const timed: Array<{ tick: number; rank: number; event: TrackEvent }> = [];

    for (const t of track.tempos ?? []) {
      timed.push({
        tick: t.tick,
        rank: 0,
        event: { deltaTime: 0, type: "setTempo", meta: true, microsecondsPerBeat: t.microsecondsPerQuarterNote },
      });
    }
    for (const p of track.programs ?? []) {
      timed.push({
        tick: p.tick,
        rank: 1,
        event: { deltaTime: 0, type: "programChange", channel: p.channel, programNumber: p.program },
      });
    }
    for (const n of track.notes ?? []) {
      const channel = n.channel ?? 0;
      timed.push({
        tick: n.end,
        rank: 2,
        event: { deltaTime: 0, type: "noteOff", channel, noteNumber: n.note, velocity: 0 },
      });
      timed.push({
        tick: n.start,
        rank: 3,
        event: { deltaTime: 0, type: "noteOn", channel, noteNumber: n.note, velocity: n.velocity ?? 100 },
      });
    }

    timed.sort((a, b) => a.tick - b.tick || a.rank - b.rank);

    const events: TrackEvent[] = [];
    let prevTick = 0;
    for (const t of timed) {
      events.push({ ...t.event, deltaTime: t.tick - prevTick });
      prevTick = t.tick;
    }
    events.push({ deltaTime: 0, type: "endOfTrack", meta: true });
    return events;
  });

  return new Uint8Array(
    writeMidi({
      header: { format: tracks.length > 1 ? 1 : 0, numTracks: tracks.length, ticksPerBeat },
      tracks: built,
    }),
  );
}

/** One quarter note of middle C lasting exactly one second (60 BPM). */
export function oneSecondMiddleC(velocity = 100): Uint8Array {
  return buildMidi([
    {
      tempos: [{ tick: 0, microsecondsPerQuarterNote: 1_000_000 }],
      notes: [{ note: 60, start: 0, end: 96, velocity }],
    },
  ]);
}

// ─── WAV ─────────────────────────────────────────────────────────────────────

export interface FixtureWav {
  formatTag: number;
  channels: number;
  sampleRate: number;
  bitsPerSample: number;
  /** Raw sample bytes for the data chunk. */
  data: Uint8Array;
  /** Write a WAVE_FORMAT_EXTENSIBLE fmt chunk with `formatTag` as the subformat. */
  extensible?: boolean;
  /** Extra chunks placed before fmt (id, body). */
  leadingChunks?: Array<{ id: string; body: Uint8Array }>;
}

export function buildWav(wav: FixtureWav): Uint8Array {
  const blockAlign = (wav.channels * wav.bitsPerSample) / 8;
  const fmtSize = wav.extensible ? 40 : 16;
  const fmt = new DataView(new ArrayBuffer(fmtSize));
  fmt.setUint16(0, wav.extensible ? 0xfffe : wav.formatTag, true);
  fmt.setUint16(2, wav.channels, true);
  fmt.setUint32(4, wav.sampleRate, true);
  fmt.setUint32(8, wav.sampleRate * blockAlign, true);
  fmt.setUint16(12, blockAlign, true);
  fmt.setUint16(14, wav.bitsPerSample, true);
  if (wav.extensible) {
    fmt.setUint16(16, 22, true);
    fmt.setUint16(18, wav.bitsPerSample, true);
    fmt.setUint32(20, 0, true);
    fmt.setUint16(24, wav.formatTag, true);
  }

  const chunks = [
    ...(wav.leadingChunks ?? []),
    { id: "fmt ", body: new Uint8Array(fmt.buffer) },
    { id: "data", body: wav.data },
  ];
  const bodySize = chunks.reduce((sum, c) => sum + 8 + c.body.length + (c.body.length % 2), 0);

  const out = new Uint8Array(12 + bodySize);
  const view = new DataView(out.buffer);
  writeFourCC(out, 0, "RIFF");
  view.setUint32(4, 4 + bodySize, true);
  writeFourCC(out, 8, "WAVE");

  let offset = 12;
  for (const chunk of chunks) {
    writeFourCC(out, offset, chunk.id);
    view.setUint32(offset + 4, chunk.body.length, true);
    out.set(chunk.body, offset + 8);
    offset += 8 + chunk.body.length + (chunk.body.length % 2);
  }
  return out;
}

export function int16Bytes(values: number[]): Uint8Array {
  const view = new DataView(new ArrayBuffer(values.length * 2));
  values.forEach((v, i) => view.setInt16(i * 2, v, true));
  return new Uint8Array(view.buffer);
}

export function int32Bytes(values: number[]): Uint8Array {
  const view = new DataView(new ArrayBuffer(values.length * 4));
  values.forEach((v, i) => view.setInt32(i * 4, v, true));
  return new Uint8Array(view.buffer);
}

export function float32Bytes(values: number[]): Uint8Array {
  const view = new DataView(new ArrayBuffer(values.length * 4));
  values.forEach((v, i) => view.setFloat32(i * 4, v, true));
  return new Uint8Array(view.buffer);
}

function writeFourCC(out: Uint8Array, offset: number, id: string): void {
  for (let i = 0; i < 4; i++) out[offset + i] = id.charCodeAt(i);
}
