// ─── Soundfont Table ────────────────────────────────────────────────────────
//
// Pads every soundfont with trailing zeros to the longest one so the formula
// can index rows as `B[index * C + harmonic]`.
// ─────────────────────────────────────────────────────────────────────────────

import type { SoundFont, SoundFontTable } from "../midi/types.js";

/** Table used where no soundfonts are bound yet (info-only parsing). */
export const PLACEHOLDER_SOUNDFONT: SoundFont = [1];

export function createSoundFontTable(fonts: readonly SoundFont[]): SoundFontTable {
  const maxSize = fonts.reduce((max, font) => Math.max(max, font.length), 0);
  const padded = fonts.map((font) => {
    const row = font.slice();
    while (row.length < maxSize) row.push(0);
    return row;
  });
  return { fonts: padded, maxSize };
}

/** Every weight of every row, in table order. */
export function flattenSoundFontTable(table: SoundFontTable): number[] {
  return table.fonts.flatMap((row) => [...row]);
}
