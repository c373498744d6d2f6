import { describe, it, expect } from "vitest";
import { ContainerParseError, UnsupportedFormatError } from "../errors.js";
import { buildMidi, oneSecondMiddleC } from "../testing/fixtures.js";
import { decodeMidi, decodeMidiInfo } from "./decoder.js";

// Header with SMPTE division (25 fps, 40 ticks per frame) and one empty track
const SMPTE_MIDI = new Uint8Array([
  0x4d, 0x54, 0x68, 0x64, 0x00, 0x00, 0x00, 0x06,
  0x00, 0x00, 0x00, 0x01, 0xe7, 0x28,
  0x4d, 0x54, 0x72, 0x6b, 0x00, 0x00, 0x00, 0x04,
  0x00, 0xff, 0x2f, 0x00,
]);

describe("decodeMidi", () => {
  it("reads header, tempo and channel-voice events", () => {
    const decoded = decodeMidi(
      buildMidi([
        {
          tempos: [{ tick: 0, microsecondsPerQuarterNote: 1_000_000 }],
          programs: [{ tick: 0, channel: 0, program: 40 }],
          notes: [{ note: 60, start: 0, end: 96, velocity: 100 }],
        },
      ]),
    );

    expect(decoded.ticksPerQuarterNote).toBe(96);
    expect(decoded.tempoChanges).toEqual([{ tick: 0, microsecondsPerQuarterNote: 1_000_000 }]);
    expect(decoded.channels).toEqual([{ id: 0, instrument: 40, isDrum: false }]);
    expect(decoded.events).toEqual([
      { tick: 0, channel: 0, track: 0, message: { type: "programChange", program: 40 } },
      { tick: 0, channel: 0, track: 0, message: { type: "noteOn", note: 60, velocity: 100 } },
      { tick: 96, channel: 0, track: 0, message: { type: "noteOff", note: 60, velocity: 0 } },
    ]);
  });

  it("accumulates delta times into absolute ticks per track", () => {
    const decoded = decodeMidi(
      buildMidi([
        { tempos: [{ tick: 0, microsecondsPerQuarterNote: 500_000 }, { tick: 192, microsecondsPerQuarterNote: 250_000 }] },
        { notes: [{ note: 62, start: 48, end: 144, channel: 0 }] },
        { notes: [{ note: 36, start: 96, end: 120, channel: 9 }] },
      ]),
    );

    expect(decoded.tempoChanges.map((t) => t.tick)).toEqual([0, 192]);
    expect(decoded.events.map((e) => [e.track, e.tick, e.message.type])).toEqual([
      [1, 48, "noteOn"],
      [1, 144, "noteOff"],
      [2, 96, "noteOn"],
      [2, 120, "noteOff"],
    ]);
  });

  it("lists channels in discovery order and flags channel 10 as drums", () => {
    const decoded = decodeMidi(
      buildMidi([
        {
          notes: [
            { note: 36, start: 0, end: 10, channel: 9 },
            { note: 60, start: 20, end: 30, channel: 2 },
          ],
        },
      ]),
    );
    expect(decoded.channels).toEqual([
      { id: 9, instrument: 0, isDrum: true },
      { id: 2, instrument: 0, isDrum: false },
    ]);
  });

  it("keeps the last program change for a channel", () => {
    const decoded = decodeMidi(
      buildMidi([
        {
          programs: [
            { tick: 0, channel: 0, program: 10 },
            { tick: 50, channel: 0, program: 73 },
          ],
        },
      ]),
    );
    expect(decoded.channels).toEqual([{ id: 0, instrument: 73, isDrum: false }]);
  });

  it("rejects SMPTE time division", () => {
    expect(() => decodeMidi(SMPTE_MIDI)).toThrow(UnsupportedFormatError);
    expect(() => decodeMidi(SMPTE_MIDI)).toThrow(
      "Unsupported MIDI format: SMPTE time division (only ticks per quarter note is supported)",
    );
  });

  it("wraps malformed bytes in a ContainerParseError", () => {
    const garbage = new TextEncoder().encode("definitely not a midi file");
    expect(() => decodeMidi(garbage, "bad.mid")).toThrow(ContainerParseError);
    expect(() => decodeMidi(garbage, "bad.mid")).toThrow(/^MIDI parsing error \(bad\.mid\): /);
  });
});

describe("decodeMidiInfo", () => {
  it("returns channels with no notes and a placeholder table", () => {
    const info = decodeMidiInfo(oneSecondMiddleC());
    expect(info.noteEvents).toEqual([]);
    expect(info.channels).toEqual([{ id: 0, instrument: 0, isDrum: false }]);
    expect(info.soundfonts).toEqual({ fonts: [[1]], maxSize: 1 });
  });
});
