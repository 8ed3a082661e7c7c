// ─── Filter Registry ─────────────────────────────────────────────────────────

import type { MidiFilter, MidiRepresentation } from "../types.js";
import { integrateTempo } from "./tempo-integration.js";
import { noChords } from "./no-chords.js";
import { swing, unswing } from "./swing.js";

export { integrateTempo, integrateNote, INTEGRATED_BPM } from "./tempo-integration.js";
export { noChords, groupSimultaneous } from "./no-chords.js";
export { swing, unswing, toSwing, fromSwing } from "./swing.js";

export const FILTER_NAMES = [
  "identity",
  "no-chords",
  "tempo-integration",
  "swing",
  "unswing",
] as const;

export type FilterName = (typeof FILTER_NAMES)[number];

export interface FilterOptions {
  /** Beat subdivision for swing/unswing. Default 1. */
  mult?: number;
}

export const FILTER_DESCRIPTIONS: Record<FilterName, string> = {
  identity: "Change nothing beyond what conversion itself does",
  "no-chords": "Keep only the highest note of each chord",
  "tempo-integration": "Remove tempo changes (60 BPM) while keeping real-time timing",
  swing: "Swing straight eighths",
  unswing: "Straighten swung eighths",
};

/** Returns the representation untouched. */
export function identity(rep: MidiRepresentation): MidiRepresentation {
  return rep;
}

export function isFilterName(name: string): name is FilterName {
  return FILTER_NAMES.some((n) => n === name);
}

/** Look up a filter by name. Throws on unknown names. */
export function getFilter(name: string, options: FilterOptions = {}): MidiFilter {
  if (!isFilterName(name)) {
    throw new Error(`Unknown filter: "${name}". Available: ${FILTER_NAMES.join(", ")}`);
  }

  const mult = options.mult ?? 1;
  if (!Number.isFinite(mult) || mult <= 0) {
    throw new RangeError(`Invalid swing multiplier: ${mult}`);
  }

  switch (name) {
    case "identity":
      return identity;
    case "no-chords":
      return noChords;
    case "tempo-integration":
      return integrateTempo;
    case "swing":
      return (rep) => swing(rep, mult);
    case "unswing":
      return (rep) => unswing(rep, mult);
  }
}
