import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { parseConfig } from "./config/loader.js";
import { buildMidi, buildWav, oneSecondMiddleC, int16Bytes } from "./testing/fixtures.js";
import {
  analyzeWavTool,
  convertMidiTool,
  listSoundfontsTool,
  midiInfoTool,
  resolveAnalysisRequest,
  saveSoundfontTool,
  type ToolContext,
} from "./tools.js";

let dir: string;
let ctx: ToolContext;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), "tools-"));
  ctx = { config: { ...parseConfig({}), soundfontsDir: join(dir, "soundfonts") } };
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

describe("midiInfoTool", () => {
  it("returns channels as JSON with 1-based ids", async () => {
    const path = join(dir, "band.mid");
    writeFileSync(
      path,
      buildMidi([
        {
          programs: [{ tick: 0, channel: 0, program: 1 }],
          notes: [
            { note: 60, start: 0, end: 96, channel: 0 },
            { note: 36, start: 0, end: 96, channel: 9 },
          ],
        },
      ]),
    );

    const result = await midiInfoTool(ctx, { path });
    expect(result.isError).toBeUndefined();
    expect(JSON.parse(result.content[0].text)).toEqual({
      channels: [
        { id: 1, instrument: "Bright Acoustic Piano", isDrum: false },
        { id: 10, instrument: "Drum Kit", isDrum: true },
      ],
    });
  });

  it("reports a missing file as an error result", async () => {
    const path = join(dir, "nope.mid");
    expect(await midiInfoTool(ctx, { path })).toEqual({
      content: [{ type: "text", text: `MIDI file not found: ${path}` }],
      isError: true,
    });
  });
});

describe("convertMidiTool", () => {
  it("converts with named soundfonts", async () => {
    await saveSoundfontTool(ctx, { name: "pure", weights: [1] });
    const path = join(dir, "one.mid");
    writeFileSync(path, oneSecondMiddleC());

    const result = await convertMidiTool(ctx, { path, soundfonts: ["pure"] });
    expect(result.content[0].text).toBe(
      "A=\\left\\{t<1.000:\\left[-9,100,0\\right],t<1.1:\\left[\\right]\\right\\}\nB=\\left[1\\right]\nC=1",
    );
  });

  it("returns mismatch errors as text", async () => {
    const path = join(dir, "one.mid");
    writeFileSync(path, oneSecondMiddleC());

    const result = await convertMidiTool(ctx, { path, soundfonts: ["a", "b"] });
    expect(result.isError).toBe(true);
    expect(result.content[0].text).toBe("Too many soundfonts provided. Need 1 for channels, got 2");
  });
});

describe("analyzeWavTool", () => {
  it("returns the weights as soundfont text", async () => {
    const path = join(dir, "silence.wav");
    writeFileSync(
      path,
      buildWav({ formatTag: 1, channels: 1, sampleRate: 44100, bitsPerSample: 16, data: int16Bytes(new Array(8192).fill(0)) }),
    );

    const result = await analyzeWavTool(ctx, { path, harmonics: 3 });
    expect(result).toEqual({ content: [{ type: "text", text: "0,0,0" }] });
  });

  it("reports unreadable audio as an error result", async () => {
    const path = join(dir, "text.wav");
    writeFileSync(path, "not audio at all");
    const result = await analyzeWavTool(ctx, { path });
    expect(result.isError).toBe(true);
    expect(result.content[0].text).toBe(`WAV parsing error (${path}): missing RIFF/WAVE header`);
  });
});

describe("resolveAnalysisRequest", () => {
  it("fills defaults and clamps into the configured limits", () => {
    expect(resolveAnalysisRequest(ctx, { path: "x.wav", samples: 1_000_000, boost: 0.1 })).toEqual({
      sampleCount: 65536,
      startTimeSeconds: 0,
      baseFrequencyHz: 440,
      harmonicCount: 16,
      boost: 0.5,
    });
  });
});

describe("soundfont tools", () => {
  it("lists nothing before any soundfont is saved", async () => {
    expect((await listSoundfontsTool(ctx)).content[0].text).toBe("No soundfonts found.");
  });

  it("saves and then lists soundfonts", async () => {
    const saved = await saveSoundfontTool(ctx, { name: "warm", weights: [1, 0.4, 0.1] });
    expect(saved.content[0].text).toBe("Soundfont saved: warm.txt");
    await saveSoundfontTool(ctx, { name: "airy.txt", weights: [1] });

    expect((await listSoundfontsTool(ctx)).content[0].text).toBe("airy.txt\nwarm.txt");
    expect(readFileSync(join(dir, "soundfonts", "warm.txt"), "utf8")).toBe("1,0.4,0.1");
  });
});
