#!/usr/bin/env node
// ─── piecewise-midi: CLI Entry Point ────────────────────────────────────────
//
// Usage:
//   piecewise-midi                                  # Show help
//   piecewise-midi midi song.mid                    # Formula with default soundfonts
//   piecewise-midi midi song.mid --info             # List channels and instruments
//   piecewise-midi midi song.mid --soundfonts piano - bass
//   piecewise-midi midi song.mid --out song.txt     # Write formula to a file
//   piecewise-midi audio note.wav --base-freq 220   # Harmonic weights from a sample
//   piecewise-midi audio note.wav --save mynote     # ...and save as soundfonts/mynote.txt
//   piecewise-midi soundfonts                       # List available soundfonts
// ─────────────────────────────────────────────────────────────────────────────

import { writeFile } from "node:fs/promises";
import { analyzeHarmonics, formatSoundfont } from "./audio/analysis.js";
import type { AnalysisConfig } from "./audio/types.js";
import { readWavFile } from "./audio/wav.js";
import { loadConfig } from "./config/loader.js";
import type { AppConfig } from "./config/schema.js";
import { describeError, InvalidParametersError, wrapIoError } from "./errors.js";
import { describeChannel } from "./midi/instruments.js";
import { MidiProcessor } from "./midi/processor.js";
import { listSoundfonts, parseSoundfontRef, saveSoundfont } from "./soundfonts/files.js";

// ─── Helpers ────────────────────────────────────────────────────────────────

/** Value following `flag`, or null when absent. */
function getFlag(args: string[], flag: string): string | null {
  const idx = args.indexOf(flag);
  if (idx === -1 || idx + 1 >= args.length) return null;
  return args[idx + 1];
}

/** Check for boolean flag (no value). */
function hasFlag(args: string[], flag: string): boolean {
  return args.includes(flag);
}

/** Every value after `flag` up to the next `--option`. */
function getListFlag(args: string[], flag: string): string[] {
  const idx = args.indexOf(flag);
  if (idx === -1) return [];
  const values: string[] = [];
  for (const arg of args.slice(idx + 1)) {
    if (arg.startsWith("--")) break;
    values.push(arg);
  }
  return values;
}

function getNumberFlag(args: string[], flag: string, fallback: number): number {
  const raw = getFlag(args, flag);
  if (raw === null) return fallback;
  const value = Number(raw);
  if (raw.trim() === "" || !Number.isFinite(value)) {
    throw new InvalidParametersError(flag.slice(2), `Invalid value for ${flag}: "${raw}"`);
  }
  return value;
}

// ─── Commands ───────────────────────────────────────────────────────────────

async function cmdMidi(args: string[], config: AppConfig): Promise<void> {
  const file = args[0];
  if (!file || file.startsWith("--")) {
    console.error("Usage: piecewise-midi midi <file.mid> [--info] [--soundfonts <name|-> ...] [--out <file>]");
    process.exit(1);
  }

  const processor = new MidiProcessor(config.soundfontsDir);

  if (hasFlag(args, "--info")) {
    const song = await processor.infoForFile(file);
    console.log("MIDI Channel Information:");
    console.log("------------------------");
    for (const channel of song.channels) {
      console.log(describeChannel(channel));
    }
    return;
  }

  const refs = getListFlag(args, "--soundfonts").map(parseSoundfontRef);
  const formula = await processor.convertFile(file, refs);

  const out = getFlag(args, "--out");
  if (out) {
    try {
      await writeFile(out, formula + "\n", "utf8");
    } catch (err) {
      throw wrapIoError(err, out, "Output file");
    }
    console.error(`Formula written to ${out}`);
    return;
  }

  process.stdout.write(formula + "\n");
}

async function cmdAudio(args: string[], config: AppConfig): Promise<void> {
  const file = args[0];
  if (!file || file.startsWith("--")) {
    console.error("Usage: piecewise-midi audio <file.wav> [--samples N] [--start-time S] [--base-freq HZ] [--harmonics N] [--boost X] [--save <name>]");
    process.exit(1);
  }

  const defaults = config.analysis.defaults;
  const request: AnalysisConfig = {
    sampleCount: getNumberFlag(args, "--samples", defaults.sampleCount),
    startTimeSeconds: getNumberFlag(args, "--start-time", defaults.startTimeSeconds),
    baseFrequencyHz: getNumberFlag(args, "--base-freq", defaults.baseFrequencyHz),
    harmonicCount: getNumberFlag(args, "--harmonics", defaults.harmonicCount),
    boost: getNumberFlag(args, "--boost", defaults.boost),
  };

  const wav = await readWavFile(file);
  const weights = analyzeHarmonics(wav, request);
  process.stdout.write(formatSoundfont(weights) + "\n");

  const saveName = getFlag(args, "--save");
  if (saveName) {
    const fileName = await saveSoundfont(saveName, weights, config.soundfontsDir);
    console.error(`Soundfont saved: ${fileName}`);
  }
}

async function cmdSoundfonts(config: AppConfig): Promise<void> {
  const names = await listSoundfonts(config.soundfontsDir);
  if (names.length === 0) {
    console.log(`No soundfonts found in ${config.soundfontsDir}`);
    return;
  }
  for (const name of names) console.log(name);
  console.log(`\n${names.length} soundfont(s) in ${config.soundfontsDir}`);
}

function cmdHelp(): void {
  console.log(`
piecewise-midi — MIDI to piecewise formula converter

Commands:
  midi <file.mid> [options]   Convert a MIDI file to formula text
  audio <file.wav> [options]  Derive soundfont weights from a WAV sample
  soundfonts                  List available soundfonts
  help                        Show this help

MIDI options:
  --info                      Print channel and instrument info instead of converting
  --soundfonts <name|-> ...   One soundfont per channel ("-" skips a channel),
                              or a single soundfont for all channels.
                              Default: drums skipped, others use default.txt
  --out <file>                Write the formula to a file instead of stdout

Audio options:
  --samples <n>               Number of samples to analyze (default 8192)
  --start-time <s>            Where analysis starts, in seconds (default 0)
  --base-freq <hz>            Fundamental frequency (default 440)
  --harmonics <n>             Number of harmonics to extract (default 16)
  --boost <x>                 Amplification after normalization (default 1)
  --save <name>               Save the weights to the soundfonts directory

Configuration:
  piecewise-midi.config.json in the working directory, or the file named by
  $PIECEWISE_MIDI_CONFIG, sets the soundfonts directory and analysis defaults.
`);
}

// ─── Main ───────────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const command = args[0] ?? "help";

  switch (command) {
    case "midi":
      await cmdMidi(args.slice(1), loadConfig());
      break;
    case "audio":
      await cmdAudio(args.slice(1), loadConfig());
      break;
    case "soundfonts":
      await cmdSoundfonts(loadConfig());
      break;
    case "help":
    case "--help":
    case "-h":
      cmdHelp();
      break;
    default:
      console.error(`Unknown command: "${command}". Run 'piecewise-midi help' for usage.`);
      process.exit(1);
  }
}

main().catch((err) => {
  const [first, ...hints] = describeError(err);
  console.error(`\nERROR: ${first}`);
  for (const hint of hints) console.error(hint);
  console.error("");
  process.exit(1);
});
