// ─── Tempo Map ───────────────────────────────────────────────────────────────
//
// A sorted, deduplicated list of tempo changes keyed by beat. Tempo is
// constant between changes, so converting beats to seconds is an exact
// piecewise sum with no numerical integration.
// ─────────────────────────────────────────────────────────────────────────────

import { NegativeDurationError, NoTempoDefinedError } from "../errors.js";
import { DEFAULT_BPM, type TempoChange } from "../types.js";
import { approxEqual, assertValidBpm, secondsPerBeat } from "./timebase.js";

// ─── Normalization ───────────────────────────────────────────────────────────

/**
 * Sort tempo changes by beat and enforce one tempo per beat.
 *
 * - Of several changes at the same beat, the last one listed wins.
 * - A change that repeats the tempo already in effect is dropped.
 * - If nothing is set at beat 0, `defaultBpm` is inserted there.
 */
export function normalizeTempoChanges(
  changes: readonly TempoChange[],
  defaultBpm: number = DEFAULT_BPM,
): TempoChange[] {
  assertValidBpm(defaultBpm);
  for (const change of changes) {
    assertValidBpm(change.newBpm);
    if (!Number.isFinite(change.beat) || change.beat < 0) {
      throw new RangeError(`Tempo change at invalid beat: ${change.beat}`);
    }
  }

  // Array.prototype.sort is stable, so listing order survives among equal beats.
  const sorted = [...changes].sort((a, b) => a.beat - b.beat);

  const perBeat: TempoChange[] = [];
  for (const change of sorted) {
    const last = perBeat[perBeat.length - 1];
    if (last && approxEqual(last.beat, change.beat)) {
      perBeat[perBeat.length - 1] = { beat: last.beat, newBpm: change.newBpm };
    } else {
      perBeat.push({ beat: change.beat, newBpm: change.newBpm });
    }
  }

  if (perBeat.length === 0 || !approxEqual(perBeat[0].beat, 0)) {
    perBeat.unshift({ beat: 0, newBpm: defaultBpm });
  } else {
    perBeat[0] = { beat: 0, newBpm: perBeat[0].newBpm };
  }

  const normalized: TempoChange[] = [];
  for (const change of perBeat) {
    const last = normalized[normalized.length - 1];
    if (last && last.newBpm === change.newBpm) continue;
    normalized.push(change);
  }
  return normalized;
}

// ─── TempoMap ────────────────────────────────────────────────────────────────

export class TempoMap {
  private constructor(private readonly entries: readonly TempoChange[]) {}

  /** Build a map from tempo changes in any order. See {@link normalizeTempoChanges}. */
  static fromChanges(
    changes: readonly TempoChange[],
    defaultBpm: number = DEFAULT_BPM,
  ): TempoMap {
    return new TempoMap(normalizeTempoChanges(changes, defaultBpm));
  }

  /** Normalized changes, first one at beat 0. */
  get changes(): TempoChange[] {
    return this.entries.map((c) => ({ ...c }));
  }

  /** Tempo in effect at `beat`. A change exactly at `beat` applies. */
  tempoAt(beat: number): number {
    return this.entries[this.indexAt(beat)].newBpm;
  }

  /**
   * Seconds elapsed between two beats.
   * Splits [beatA, beatB] at every tempo change inside it and sums each
   * segment's length times its seconds per beat.
   */
  elapsedSeconds(beatA: number, beatB: number): number {
    if (beatB < beatA) {
      throw new NegativeDurationError(
        `Cannot measure from beat ${beatA} back to beat ${beatB}`,
      );
    }

    let index = this.indexAt(beatA);
    let cursor = beatA;
    let seconds = 0;

    while (index + 1 < this.entries.length && this.entries[index + 1].beat < beatB) {
      const boundary = this.entries[index + 1].beat;
      seconds += (boundary - cursor) * secondsPerBeat(this.entries[index].newBpm);
      cursor = boundary;
      index++;
    }

    return seconds + (beatB - cursor) * secondsPerBeat(this.entries[index].newBpm);
  }

  /**
   * The beat reached after `seconds` of wall-clock time starting at `beatA`.
   * Inverse of {@link elapsedSeconds}.
   */
  beatsForSeconds(beatA: number, seconds: number): number {
    if (seconds < 0) {
      throw new NegativeDurationError(`Cannot advance by ${seconds} seconds`);
    }

    let index = this.indexAt(beatA);
    let cursor = beatA;
    let remaining = seconds;

    while (index + 1 < this.entries.length) {
      const boundary = this.entries[index + 1].beat;
      const segmentSeconds = (boundary - cursor) * secondsPerBeat(this.entries[index].newBpm);
      if (remaining < segmentSeconds) break;
      remaining -= segmentSeconds;
      cursor = boundary;
      index++;
    }

    return cursor + remaining / secondsPerBeat(this.entries[index].newBpm);
  }

  /** Binary search for the last change at or before `beat`. */
  private indexAt(beat: number): number {
    let lo = 0;
    let hi = this.entries.length - 1;
    let found = -1;

    while (lo <= hi) {
      const mid = (lo + hi) >> 1;
      if (this.entries[mid].beat <= beat) {
        found = mid;
        lo = mid + 1;
      } else {
        hi = mid - 1;
      }
    }

    if (found === -1) throw new NoTempoDefinedError(beat);
    return found;
  }
}
