import { describe, it, expect } from "vitest";
import { describeChannel, getInstrumentName } from "./instruments.js";

describe("getInstrumentName", () => {
  it("maps General MIDI program numbers to names", () => {
    expect(getInstrumentName(0, false)).toBe("Acoustic Grand Piano");
    expect(getInstrumentName(1, false)).toBe("Bright Acoustic Piano");
  });

  it("names every drum channel Drum Kit", () => {
    expect(getInstrumentName(0, true)).toBe("Drum Kit");
    expect(getInstrumentName(40, true)).toBe("Drum Kit");
  });

  it("falls back for program numbers outside the table", () => {
    expect(getInstrumentName(128, false)).toBe("Unknown Instrument");
    expect(getInstrumentName(-1, false)).toBe("Unknown Instrument");
  });
});

describe("describeChannel", () => {
  it("shows channel numbers 1-based", () => {
    expect(describeChannel({ id: 0, instrument: 0, isDrum: false })).toBe("Channel 1: Acoustic Grand Piano");
  });

  it("marks the drum channel", () => {
    expect(describeChannel({ id: 9, instrument: 0, isDrum: true })).toBe("Channel 10: [DRUMS] Drum Kit");
  });
});
