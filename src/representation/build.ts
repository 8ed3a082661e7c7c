// ─── Raw Events → MidiRepresentation ─────────────────────────────────────────
//
// Flattens tick-addressed track event lists into beat-addressed notes,
// a global tempo list, time signatures and a channel → instrument map.
//
// Tempo and time-signature events are collected from every track: files
// usually keep them on a conductor track, but its index is not assumed.
// ─────────────────────────────────────────────────────────────────────────────

import { InvalidMidiError } from "../errors.js";
import {
  DEFAULT_BPM,
  DEFAULT_INSTRUMENT,
  type ConversionWarning,
  type MidiRepresentation,
  type Note,
  type RawEvent,
  type RawMidi,
  type TempoChange,
  type TimeSignatureChange,
  type Track,
  type UnmatchedNotePolicy,
} from "../types.js";
import { microsecondsToBpm, ticksToBeats } from "../timing/timebase.js";
import { normalizeTempoChanges } from "../timing/tempo-map.js";

// ─── Types ───────────────────────────────────────────────────────────────────

export interface BuildOptions {
  /** Default "drop": unfinished notes are discarded with a warning. */
  unmatchedNotes?: UnmatchedNotePolicy;
  /** Keep tracks that end up with no notes (e.g. a conductor track). */
  keepEmptyTracks?: boolean;
  /** Tempo assumed before the first set-tempo event. */
  defaultBpm?: number;
}

export interface BuildResult {
  representation: MidiRepresentation;
  warnings: ConversionWarning[];
}

interface SoundingNote {
  channel: number;
  pitch: number;
  tick: number;
  velocity: number;
  /**
   * Set when this note-on cut short an earlier note of the same key. A
   * note-off on the same tick then belongs to that earlier note.
   */
  restruck: boolean;
}

// ─── Public API ──────────────────────────────────────────────────────────────

/**
 * Convert a raw event stream into a MidiRepresentation.
 * Throws InvalidMidiError on malformed input. `raw` is not modified.
 */
export function buildRepresentation(
  raw: RawMidi,
  options: BuildOptions = {},
): BuildResult {
  const policy = options.unmatchedNotes ?? "drop";
  const tpb = raw.ticksPerBeat;
  if (!Number.isInteger(tpb) || tpb <= 0) {
    throw new InvalidMidiError(`Unsupported time division: ${tpb} ticks per beat`);
  }

  raw.tracks.forEach(validateTimestamps);

  const warnings: ConversionWarning[] = [];

  // 1. Global tempo + meter, scanned from every track
  const bpmChanges = normalizeTempoChanges(
    collectTempoChanges(raw),
    options.defaultBpm ?? DEFAULT_BPM,
  );
  const timeSignatureChanges = collectTimeSignatures(raw);

  // 2. Notes and names, per track
  const tracks = new Map<number, Track>();
  raw.tracks.forEach((events, index) => {
    const notes = resolveNotes(events, index, tpb, policy, warnings);
    if (notes.length === 0 && !options.keepEmptyTracks) return;
    tracks.set(index, { notes, trackName: findTrackName(events) });
  });

  // 3. Instruments, with a default for every channel a note uses
  const channelInstrumentMap = collectPrograms(raw);
  for (const track of tracks.values()) {
    for (const note of track.notes) {
      if (!channelInstrumentMap.has(note.channel)) {
        channelInstrumentMap.set(note.channel, DEFAULT_INSTRUMENT);
      }
    }
  }

  return {
    representation: { tracks, channelInstrumentMap, bpmChanges, timeSignatureChanges },
    warnings,
  };
}

// ─── Internal: Validation ────────────────────────────────────────────────────

function validateTimestamps(events: RawEvent[], track: number): void {
  let previous = 0;
  for (const event of events) {
    if (!Number.isInteger(event.tick) || event.tick < 0) {
      throw new InvalidMidiError(`Track ${track}: invalid tick ${event.tick}`);
    }
    if (event.tick < previous) {
      throw new InvalidMidiError(
        `Track ${track}: events out of order (tick ${event.tick} after ${previous})`,
      );
    }
    previous = event.tick;
  }
}

// ─── Internal: Global Events ─────────────────────────────────────────────────

function collectTempoChanges(raw: RawMidi): TempoChange[] {
  const changes: Array<TempoChange & { tick: number }> = [];
  for (const events of raw.tracks) {
    for (const event of events) {
      if (event.kind === "tempo") {
        changes.push({
          tick: event.tick,
          beat: ticksToBeats(event.tick, raw.ticksPerBeat),
          newBpm: microsecondsToBpm(event.microsecondsPerBeat),
        });
      }
    }
  }
  return changes
    .sort((a, b) => a.tick - b.tick)
    .map(({ beat, newBpm }) => ({ beat, newBpm }));
}

function collectTimeSignatures(raw: RawMidi): TimeSignatureChange[] {
  const byTick = new Map<number, TimeSignatureChange>();
  for (const events of raw.tracks) {
    for (const event of events) {
      if (event.kind !== "timeSignature") continue;
      if (!Number.isInteger(event.numerator) || event.numerator <= 0) {
        throw new InvalidMidiError(`Invalid time signature numerator: ${event.numerator}`);
      }
      if (!Number.isInteger(event.denominatorLog2) || event.denominatorLog2 < 0) {
        throw new InvalidMidiError(`Invalid time signature denominator: 2^${event.denominatorLog2}`);
      }
      byTick.set(event.tick, {
        numerator: event.numerator,
        denominatorLog2: event.denominatorLog2,
        beat: ticksToBeats(event.tick, raw.ticksPerBeat),
      });
    }
  }
  return [...byTick.values()].sort((a, b) => a.beat - b.beat);
}

function collectPrograms(raw: RawMidi): Map<number, number> {
  const programs = new Map<number, number>();
  for (const events of raw.tracks) {
    for (const event of events) {
      if (event.kind === "programChange") {
        programs.set(event.channel, event.program);
      }
    }
  }
  return programs;
}

function findTrackName(events: RawEvent[]): string {
  let name = "";
  for (const event of events) {
    if (event.kind === "trackName") name = event.name;
  }
  return name;
}

// ─── Internal: Note Pairing ──────────────────────────────────────────────────

/** Pair note-ons with note-offs by (channel, pitch). */
function resolveNotes(
  events: RawEvent[],
  track: number,
  ticksPerBeat: number,
  policy: UnmatchedNotePolicy,
  warnings: ConversionWarning[],
): Note[] {
  const notes: Note[] = [];
  const sounding = new Map<string, SoundingNote>();

  const close = (start: SoundingNote, endTick: number): void => {
    if (endTick === start.tick) {
      warnings.push({
        track,
        tick: start.tick,
        message: `Dropped zero-length note ${start.pitch} on channel ${start.channel}`,
      });
      return;
    }
    notes.push({
      channel: start.channel,
      pitch: start.pitch,
      velocity: start.velocity,
      beat: ticksToBeats(start.tick, ticksPerBeat),
      duration: ticksToBeats(endTick - start.tick, ticksPerBeat),
    });
  };

  for (const event of events) {
    if (event.kind === "noteOn" && event.velocity > 0) {
      const key = `${event.channel}:${event.pitch}`;
      const previous = sounding.get(key);
      // Re-striking a sounding key ends the earlier note here.
      if (previous) close(previous, event.tick);
      sounding.set(key, {
        channel: event.channel,
        pitch: event.pitch,
        tick: event.tick,
        velocity: event.velocity,
        restruck: previous !== undefined,
      });
    } else if (event.kind === "noteOff" || event.kind === "noteOn") {
      const key = `${event.channel}:${event.pitch}`;
      const start = sounding.get(key);
      if (!start) {
        warnings.push({
          track,
          tick: event.tick,
          message: `Ignored note-off ${event.pitch} on channel ${event.channel} with no matching note-on`,
        });
        continue;
      }
      // A note-off right after a re-strike on the same tick releases the cut note.
      if (start.restruck && start.tick === event.tick) {
        start.restruck = false;
        continue;
      }
      sounding.delete(key);
      close(start, event.tick);
    }
  }

  for (const start of sounding.values()) {
    const message = `Note ${start.pitch} on channel ${start.channel} has no note-off before the end of track ${track}`;
    if (policy === "reject") throw new InvalidMidiError(message);
    warnings.push({ track, tick: start.tick, message: `Dropped unfinished note: ${message}` });
  }

  return notes;
}
