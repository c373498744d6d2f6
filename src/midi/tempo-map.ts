// ─── Tempo Map ──────────────────────────────────────────────────────────────
//
// Converts absolute ticks to milliseconds across any number of tempo
// segments. Time is accumulated in whole microseconds per segment and only
// divided down to milliseconds once, at the end.
// ─────────────────────────────────────────────────────────────────────────────

import type { TempoChange, Timestamp } from "./types.js";

/** 120 BPM, the MIDI default when a file sets no tempo. */
export const DEFAULT_MICROSECONDS_PER_QUARTER = 500_000;

export class TempoMap {
  /** Sorted by tick, unique ticks, first entry always at tick 0. */
  readonly changes: readonly TempoChange[];

  private constructor(
    changes: TempoChange[],
    readonly ticksPerQuarterNote: number,
  ) {
    this.changes = changes;
  }

  /**
   * Build a map from tempo changes in any order.
   * Changes sharing a tick overwrite each other; the last one in input order
   * wins, including over the default tempo at tick 0.
   */
  static fromChanges(ticksPerQuarterNote: number, changes: readonly TempoChange[] = []): TempoMap {
    if (!Number.isInteger(ticksPerQuarterNote) || ticksPerQuarterNote <= 0) {
      throw new RangeError(`ticksPerQuarterNote must be a positive integer, got ${ticksPerQuarterNote}`);
    }

    const merged: TempoChange[] = [{ tick: 0, microsecondsPerQuarterNote: DEFAULT_MICROSECONDS_PER_QUARTER }];
    // Array#sort is stable, so equal ticks keep their input order
    const sorted = [...changes].sort((a, b) => a.tick - b.tick);

    for (const change of sorted) {
      const last = merged[merged.length - 1];
      if (last.tick === change.tick) {
        merged[merged.length - 1] = { ...change };
      } else {
        merged.push({ ...change });
      }
    }

    return new TempoMap(merged, ticksPerQuarterNote);
  }

  /** Milliseconds elapsed at `ticks`, truncated. */
  ticksToMs(ticks: number): Timestamp {
    return ticksToMs(ticks, this);
  }
}

/**
 * Convert an absolute tick count to milliseconds.
 *
 * Each segment contributes `segTicks * tempo / ticksPerQuarterNote`
 * microseconds (truncated); the sum is divided by 1000 once. Microseconds
 * are counted in bigint, since they pass 2^53 long before ticks do.
 *
 * @param ticks Whole ticks.
 */
export function ticksToMs(ticks: number, map: TempoMap): Timestamp {
  if (ticks <= 0) return 0;

  const { changes } = map;
  const ticksPerQuarterNote = BigInt(map.ticksPerQuarterNote);
  let micros = 0n;

  for (let i = 0; i < changes.length; i++) {
    const segStart = changes[i].tick;
    if (segStart >= ticks) break;

    const nextTick = i + 1 < changes.length ? changes[i + 1].tick : Infinity;
    const segEnd = Math.min(nextTick, ticks);
    micros += (BigInt(segEnd - segStart) * BigInt(changes[i].microsecondsPerQuarterNote)) / ticksPerQuarterNote;
  }

  return Number(micros / 1000n);
}
