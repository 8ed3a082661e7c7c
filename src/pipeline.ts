// ─── Conversion Pipeline ─────────────────────────────────────────────────────
//
// raw events → MidiRepresentation → filter → raw events
// ─────────────────────────────────────────────────────────────────────────────

import type { ConversionWarning, MidiFilter, MidiRepresentation, RawMidi } from "./types.js";
import { buildRepresentation } from "./representation/build.js";
import { serializeRepresentation } from "./representation/serialize.js";
import { decodeMidi, encodeMidi } from "./midi/codec.js";
import { readMidiFile, writeMidiFile } from "./midi/io.js";
import { DEFAULT_CONFIG, type ConverterConfig } from "./config/schema.js";

export interface ProcessResult {
  output: RawMidi;
  representation: MidiRepresentation;
  warnings: ConversionWarning[];
}

function isRepresentation(value: MidiRepresentation | void): value is MidiRepresentation {
  return typeof value === "object" && value !== null;
}

/**
 * Run a filter on a representation. Filters may return a new value or
 * edit their argument in place and return nothing.
 */
export function applyFilter(rep: MidiRepresentation, filter: MidiFilter): MidiRepresentation {
  const result = filter(rep);
  return isRepresentation(result) ? result : rep;
}

/** Build, filter and serialize a raw event stream. */
export function processMidi(
  raw: RawMidi,
  filter: MidiFilter,
  config: ConverterConfig = DEFAULT_CONFIG,
): ProcessResult {
  const { representation, warnings } = buildRepresentation(raw, {
    unmatchedNotes: config.unmatchedNotes,
    keepEmptyTracks: config.keepEmptyTracks,
    defaultBpm: config.defaultBpm,
  });

  const filtered = applyFilter(representation, filter);

  const output = serializeRepresentation(filtered, {
    ticksPerBeat: config.ticksPerBeat ?? raw.ticksPerBeat,
    conductorTrackName: config.conductorTrackName,
  });

  return { output, representation: filtered, warnings };
}

/** {@link processMidi} on standard MIDI file bytes. */
export function processMidiBytes(
  bytes: Uint8Array,
  filter: MidiFilter,
  config: ConverterConfig = DEFAULT_CONFIG,
): { bytes: Uint8Array; warnings: ConversionWarning[] } {
  const { output, warnings } = processMidi(decodeMidi(bytes), filter, config);
  return { bytes: encodeMidi(output), warnings };
}

/** Read `inputPath`, filter it, and write the result to `outputPath`. */
export function processMidiFile(
  inputPath: string,
  outputPath: string,
  filter: MidiFilter,
  config: ConverterConfig = DEFAULT_CONFIG,
): ConversionWarning[] {
  const { output, warnings } = processMidi(readMidiFile(inputPath), filter, config);
  writeMidiFile(outputPath, output);
  return warnings;
}
