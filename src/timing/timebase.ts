// ─── Time-Base Conversion ────────────────────────────────────────────────────
//
// Pure arithmetic between ticks, beats, tempo and wall-clock time.
// ─────────────────────────────────────────────────────────────────────────────

import { InvalidTempoError } from "../errors.js";

// ─── Constants ───────────────────────────────────────────────────────────────

export const EPSILON = 1e-7;

const MICROSECONDS_PER_MINUTE = 60_000_000;

/** The set-tempo meta event stores microseconds in 24 bits. */
const MAX_MICROSECONDS_PER_BEAT = 0xffffff;

// ─── Float Comparison ────────────────────────────────────────────────────────

export function approxEqual(a: number, b: number): boolean {
  return Math.abs(a - b) <= EPSILON;
}

export function approxLte(a: number, b: number): boolean {
  return a <= b || approxEqual(a, b);
}

export function approxLt(a: number, b: number): boolean {
  return a < b && !approxEqual(a, b);
}

// ─── Ticks ↔ Beats ───────────────────────────────────────────────────────────

export function ticksToBeats(ticks: number, ticksPerBeat: number): number {
  return ticks / ticksPerBeat;
}

/**
 * Round to the nearest integer, sending exact halves to the even neighbour.
 *
 *   roundHalfToEven(2.5) → 2
 *   roundHalfToEven(3.5) → 4
 */
export function roundHalfToEven(value: number): number {
  const floor = Math.floor(value);
  const fraction = value - floor;
  if (fraction > 0.5) return floor + 1;
  if (fraction < 0.5) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
}

/**
 * Convert a beat position to the nearest tick (round-half-to-even).
 * ticksToBeats → beatsToTicks is the identity on integer ticks.
 */
export function beatsToTicks(beats: number, ticksPerBeat: number): number {
  return roundHalfToEven(beats * ticksPerBeat);
}

// ─── Tempo ───────────────────────────────────────────────────────────────────

export function assertValidBpm(bpm: number): void {
  if (!Number.isFinite(bpm) || bpm <= 0) {
    throw new InvalidTempoError(`Invalid tempo: ${bpm} BPM (must be a finite number > 0)`, bpm);
  }
}

/** Length of one beat in seconds at the given tempo. */
export function secondsPerBeat(bpm: number): number {
  assertValidBpm(bpm);
  return 60 / bpm;
}

/** Tempo from the set-tempo meta event's microseconds per quarter note. */
export function microsecondsToBpm(microsecondsPerBeat: number): number {
  if (!Number.isFinite(microsecondsPerBeat) || microsecondsPerBeat <= 0) {
    throw new InvalidTempoError(
      `Invalid set-tempo value: ${microsecondsPerBeat} µs per beat`,
      MICROSECONDS_PER_MINUTE / microsecondsPerBeat,
    );
  }
  return MICROSECONDS_PER_MINUTE / microsecondsPerBeat;
}

/** Encode a tempo for the set-tempo meta event, rounded to whole microseconds. */
export function bpmToMicroseconds(bpm: number): number {
  assertValidBpm(bpm);
  const microseconds = Math.round(MICROSECONDS_PER_MINUTE / bpm);
  if (microseconds < 1 || microseconds > MAX_MICROSECONDS_PER_BEAT) {
    throw new InvalidTempoError(`Tempo ${bpm} BPM cannot be stored in a MIDI file`, bpm);
  }
  return microseconds;
}
