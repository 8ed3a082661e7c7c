// ─── midi-beatmap: Core Types ────────────────────────────────────────────────
//
// The beat-addressed representation and the raw tick-addressed event stream
// it is built from and serialized back into.
// ─────────────────────────────────────────────────────────────────────────────

// ─── Representation ─────────────────────────────────────────────────────────

/** A single sounding note, positioned in beats from the start of the piece. */
export interface Note {
  /** MIDI channel, 0-based. */
  readonly channel: number;
  /** MIDI note number (0–127). 60 = middle C. */
  readonly pitch: number;
  /** Note-on velocity as stored in the file (0–127); never rescaled. */
  readonly velocity: number;
  /** Absolute position in beats. Beat 0 is the start of the piece. */
  readonly beat: number;
  /** Length in beats. Always > 0. */
  readonly duration: number;
}

/** A container of notes. Tempo, meter and instruments live on the piece. */
export interface Track {
  notes: Note[];
  trackName: string;
}

/** A tempo taking effect at a beat. */
export interface TempoChange {
  beat: number;
  newBpm: number;
}

/** A meter change. The denominator is stored as its base-2 exponent. */
export interface TimeSignatureChange {
  numerator: number;
  /** 2 → quarter note, 3 → eighth note. */
  denominatorLog2: number;
  beat: number;
}

/**
 * The flattened, beat-addressed form of a MIDI file.
 *
 * Track identifiers are opaque: they may be sparse and carry no ordering
 * meaning. `bpmChanges` is sorted by beat with at most one entry per beat.
 */
export interface MidiRepresentation {
  tracks: Map<number, Track>;
  /** Channel → General MIDI program number. */
  channelInstrumentMap: Map<number, number>;
  bpmChanges: TempoChange[];
  /** Readable, but not guaranteed to survive every filter. */
  timeSignatureChanges: TimeSignatureChange[];
}

// ─── Raw Event Stream ───────────────────────────────────────────────────────

export interface RawNoteOnEvent {
  kind: "noteOn";
  tick: number;
  channel: number;
  pitch: number;
  velocity: number;
}

export interface RawNoteOffEvent {
  kind: "noteOff";
  tick: number;
  channel: number;
  pitch: number;
  velocity: number;
}

export interface RawTempoEvent {
  kind: "tempo";
  tick: number;
  /** Microseconds per quarter note, as stored in the set-tempo meta event. */
  microsecondsPerBeat: number;
}

export interface RawTimeSignatureEvent {
  kind: "timeSignature";
  tick: number;
  numerator: number;
  denominatorLog2: number;
}

export interface RawTrackNameEvent {
  kind: "trackName";
  tick: number;
  name: string;
}

export interface RawProgramChangeEvent {
  kind: "programChange";
  tick: number;
  channel: number;
  program: number;
}

/** An event with an absolute tick offset from the start of its track. */
export type RawEvent =
  | RawNoteOnEvent
  | RawNoteOffEvent
  | RawTempoEvent
  | RawTimeSignatureEvent
  | RawTrackNameEvent
  | RawProgramChangeEvent;

export type RawEventKind = RawEvent["kind"];

/** A MIDI file as per-track event lists with cumulative tick timestamps. */
export interface RawMidi {
  /** 0 = single track, 1 = multi-track, 2 = multi-song. */
  format: 0 | 1 | 2;
  ticksPerBeat: number;
  /** Each track's events, ordered by tick. */
  tracks: RawEvent[][];
}

// ─── Conversion ─────────────────────────────────────────────────────────────

/** A non-fatal problem found while building a representation. */
export interface ConversionWarning {
  /** Index of the source track. */
  track: number;
  /** Tick of the offending event. */
  tick: number;
  message: string;
}

/** What to do with a note-on that is still sounding when its track ends. */
export type UnmatchedNotePolicy = "drop" | "reject";

/**
 * A transformation applied between building and serializing.
 * Returning nothing means the representation was changed in place.
 */
export type MidiFilter = (representation: MidiRepresentation) => MidiRepresentation | void;

// ─── Constants ──────────────────────────────────────────────────────────────

/** MIDI's tempo when a file sets none. */
export const DEFAULT_BPM = 120;

/** Acoustic Grand Piano. */
export const DEFAULT_INSTRUMENT = 0;

/** Used when nothing else picks an output resolution. */
export const DEFAULT_TICKS_PER_BEAT = 96;

/** Largest resolution the header's division word holds before its SMPTE bit. */
export const MAX_TICKS_PER_BEAT = 0x7fff;
