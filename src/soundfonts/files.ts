// ─── Soundfont Files ────────────────────────────────────────────────────────
//
// A soundfont file is plain text: comma-separated harmonic weights.
// References name a file in the soundfont directory, or "-" for a channel
// that should be left out of the formula.
// ─────────────────────────────────────────────────────────────────────────────

import { existsSync } from "node:fs";
import { mkdir, readdir, readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { formatSoundfont } from "../audio/analysis.js";
import { ContainerParseError, InvalidParametersError, IoError, wrapIoError } from "../errors.js";
import type { SoundFont } from "../midi/types.js";

export const SOUNDFONT_EXTENSION = ".txt";
export const NO_SOUNDFONT = "-";
export const DEFAULT_SOUNDFONT = "default.txt";

export type SoundfontRef =
  | { kind: "file"; name: string }
  | { kind: "none" };

/** "-" → none; bare names get the .txt extension. */
export function parseSoundfontRef(text: string): SoundfontRef {
  const name = text.trim();
  if (name === NO_SOUNDFONT) return { kind: "none" };
  return { kind: "file", name: withExtension(name) };
}

export function formatSoundfontRef(ref: SoundfontRef): string {
  return ref.kind === "none" ? NO_SOUNDFONT : ref.name;
}

/**
 * Parse soundfont file text.
 *
 * @throws ContainerParseError naming the first value that is not a number.
 */
export function parseSoundfontText(text: string, source?: string): SoundFont {
  return text
    .trim()
    .split(",")
    .map((token) => {
      const trimmed = token.trim();
      const value = trimmed === "" ? NaN : Number(trimmed);
      if (!Number.isFinite(value)) {
        const where = source ? ` in ${source}` : "";
        throw new ContainerParseError("soundfont", `Invalid soundfont value "${trimmed}"${where}`, source);
      }
      return value;
    });
}

/** Load the weights a reference points at; null for "-". */
export async function loadSoundfont(ref: SoundfontRef, dir: string): Promise<SoundFont | null> {
  if (ref.kind === "none") return null;

  const path = join(dir, ref.name);
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (err) {
    throw wrapIoError(err, path, "Soundfont file");
  }
  return parseSoundfontText(text, path);
}

export function soundfontExists(ref: SoundfontRef, dir: string): boolean {
  return ref.kind === "none" || existsSync(join(dir, ref.name));
}

/**
 * Fail on the first referenced file that does not exist.
 *
 * @throws IoError
 */
export function verifySoundfonts(refs: readonly SoundfontRef[], dir: string): void {
  for (const ref of refs) {
    if (!soundfontExists(ref, dir)) {
      const path = join(dir, formatSoundfontRef(ref));
      throw new IoError(path, `Soundfont file not found: ${formatSoundfontRef(ref)}`, "ENOENT");
    }
  }
}

/** Soundfont file names in `dir`, sorted. A missing directory lists nothing. */
export async function listSoundfonts(dir: string): Promise<string[]> {
  if (!existsSync(dir)) return [];
  try {
    const entries = await readdir(dir, { withFileTypes: true });
    return entries
      .filter((e) => e.isFile() && e.name.endsWith(SOUNDFONT_EXTENSION))
      .map((e) => e.name)
      .sort();
  } catch (err) {
    throw wrapIoError(err, dir, "Soundfont directory");
  }
}

/**
 * Write weights as a soundfont file, creating the directory if needed.
 * Returns the file name used.
 */
export async function saveSoundfont(name: string, weights: readonly number[], dir: string): Promise<string> {
  const fileName = withExtension(name.trim());
  if (fileName === SOUNDFONT_EXTENSION || fileName.includes("/") || fileName.includes("\\")) {
    throw new InvalidParametersError("name", `Invalid soundfont name: "${name}"`);
  }

  const path = join(dir, fileName);
  try {
    await mkdir(dir, { recursive: true });
    await writeFile(path, formatSoundfont(weights), "utf8");
  } catch (err) {
    throw wrapIoError(err, path, "Soundfont file");
  }
  return fileName;
}

function withExtension(name: string): string {
  return name.endsWith(SOUNDFONT_EXTENSION) ? name : `${name}${SOUNDFONT_EXTENSION}`;
}
