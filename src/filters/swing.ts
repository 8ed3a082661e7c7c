// ─── Swing / Unswing ─────────────────────────────────────────────────────────
//
// Moves offbeat eighths to the last triplet eighth of the beat (and back).
// `mult` changes what counts as a beat: 2 swings sixteenths, the same as
// treating the meter's denominator as 8.
// ─────────────────────────────────────────────────────────────────────────────

import type { MidiRepresentation } from "../types.js";
import { mapTracks, trimOverlaps } from "../representation/model.js";
import { EPSILON } from "../timing/timebase.js";

/**
 * Swung position of a straight beat count.
 *
 * The first half of each beat stretches to its first two thirds,
 * the second half squeezes into the last third:
 *   0.5 → 0.667, 0.75 → 0.833
 */
export function toSwing(beat: number, mult = 1): number {
  const scaled = beat * mult;
  const whole = Math.floor(scaled);
  const fraction = scaled - whole;
  const swung = fraction <= 0.5 + EPSILON
    ? fraction * (4 / 3)
    : (2 * fraction + 1) / 3;
  return (whole + swung) / mult;
}

/** Straight position of a swung beat count. Inverse of {@link toSwing}. */
export function fromSwing(beat: number, mult = 1): number {
  const scaled = beat * mult;
  const whole = Math.floor(scaled);
  const fraction = scaled - whole;
  const straight = fraction <= 2 / 3 + EPSILON
    ? fraction * (3 / 4)
    : (3 * fraction - 1) / 2;
  return (whole + straight) / mult;
}

/** Swing every note onset. Durations are kept, then trimmed where keys collide. */
export function swing(rep: MidiRepresentation, mult = 1): MidiRepresentation {
  return mapTracks(rep, (notes) =>
    trimOverlaps(notes.map((n) => ({ ...n, beat: toSwing(n.beat, mult) }))),
  );
}

/** Undo {@link swing}. */
export function unswing(rep: MidiRepresentation, mult = 1): MidiRepresentation {
  return mapTracks(rep, (notes) =>
    trimOverlaps(notes.map((n) => ({ ...n, beat: fromSwing(n.beat, mult) }))),
  );
}
