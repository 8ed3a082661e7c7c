// ─── midi-beatmap ────────────────────────────────────────────────────────────
//
// Converts MIDI files to a beat-addressed representation and back, with
// filters in between.
//
// Usage:
//   import { readMidiFile, processMidi, integrateTempo } from "midi-beatmap";
//   const { output } = processMidi(readMidiFile("in.mid"), integrateTempo);
// ─────────────────────────────────────────────────────────────────────────────

// Export time-base conversion
export {
  EPSILON,
  approxEqual,
  approxLte,
  approxLt,
  ticksToBeats,
  beatsToTicks,
  roundHalfToEven,
  secondsPerBeat,
  microsecondsToBpm,
  bpmToMicroseconds,
} from "./timing/timebase.js";

// Export tempo map
export { TempoMap, normalizeTempoChanges } from "./timing/tempo-map.js";

// Export representation builder + serializer
export { buildRepresentation } from "./representation/build.js";
export type { BuildOptions, BuildResult } from "./representation/build.js";
export {
  serializeRepresentation,
  DEFAULT_CONDUCTOR_TRACK_NAME,
} from "./representation/serialize.js";
export type { SerializeOptions } from "./representation/serialize.js";

// Export representation helpers
export {
  createRepresentation,
  cloneRepresentation,
  trackList,
  mapTracks,
  songLength,
  startingBpm,
  startingTimeSignature,
  defaultTimeSignature,
  absoluteBarLength,
  clearEmptyTracks,
  mostUsedChannel,
  sliceTrack,
  offsetTrack,
  scaleTrack,
  trimOverlaps,
} from "./representation/model.js";

// Export filters
export {
  FILTER_NAMES,
  FILTER_DESCRIPTIONS,
  getFilter,
  isFilterName,
  identity,
  integrateTempo,
  integrateNote,
  INTEGRATED_BPM,
  noChords,
  groupSimultaneous,
  swing,
  unswing,
  toSwing,
  fromSwing,
} from "./filters/index.js";
export type { FilterName, FilterOptions } from "./filters/index.js";

// Export pipeline
export { applyFilter, processMidi, processMidiBytes, processMidiFile } from "./pipeline.js";
export type { ProcessResult } from "./pipeline.js";

// Export MIDI codec + file I/O
export { decodeMidi, encodeMidi, fromMidiData, toMidiData } from "./midi/codec.js";
export { readMidiFile, writeMidiFile } from "./midi/io.js";

// Export config
export {
  ConverterConfigSchema,
  DEFAULT_CONFIG,
  validateConverterConfig,
} from "./config/schema.js";
export type { ConverterConfig, ConverterConfigInput, ConfigError } from "./config/schema.js";
export { loadConverterConfig, parseConverterConfig } from "./config/loader.js";

// Export errors
export {
  MidiBeatmapError,
  InvalidMidiError,
  InvalidTempoError,
  NegativeDurationError,
  NoTempoDefinedError,
} from "./errors.js";

// Export types
export type {
  Note,
  Track,
  TempoChange,
  TimeSignatureChange,
  MidiRepresentation,
  RawEvent,
  RawEventKind,
  RawMidi,
  RawNoteOnEvent,
  RawNoteOffEvent,
  RawTempoEvent,
  RawTimeSignatureEvent,
  RawTrackNameEvent,
  RawProgramChangeEvent,
  ConversionWarning,
  UnmatchedNotePolicy,
  MidiFilter,
} from "./types.js";

export { DEFAULT_BPM, DEFAULT_INSTRUMENT, DEFAULT_TICKS_PER_BEAT, MAX_TICKS_PER_BEAT } from "./types.js";
