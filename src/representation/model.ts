// ─── Representation Helpers ──────────────────────────────────────────────────
//
// Small queries and edits over MidiRepresentation and Track values.
// Edits return new values; the inputs are left as they were.
// ─────────────────────────────────────────────────────────────────────────────

import {
  DEFAULT_BPM,
  type MidiRepresentation,
  type Note,
  type Track,
  type TimeSignatureChange,
} from "../types.js";
import { approxEqual, approxLt, approxLte } from "../timing/timebase.js";

// ─── Construction ────────────────────────────────────────────────────────────

export function createRepresentation(
  init: Partial<MidiRepresentation> = {},
): MidiRepresentation {
  return {
    tracks: init.tracks ?? new Map(),
    channelInstrumentMap: init.channelInstrumentMap ?? new Map(),
    bpmChanges: init.bpmChanges ?? [],
    timeSignatureChanges: init.timeSignatureChanges ?? [],
  };
}

/** A copy whose tracks and note arrays can be edited without touching the original. */
export function cloneRepresentation(rep: MidiRepresentation): MidiRepresentation {
  const tracks = new Map<number, Track>();
  for (const [id, track] of rep.tracks) {
    tracks.set(id, { notes: [...track.notes], trackName: track.trackName });
  }
  return {
    tracks,
    channelInstrumentMap: new Map(rep.channelInstrumentMap),
    bpmChanges: rep.bpmChanges.map((c) => ({ ...c })),
    timeSignatureChanges: rep.timeSignatureChanges.map((t) => ({ ...t })),
  };
}

/** Tracks with their identifiers, ascending by identifier. */
export function trackList(rep: MidiRepresentation): Array<[number, Track]> {
  return [...rep.tracks.entries()].sort((a, b) => a[0] - b[0]);
}

/** Replace every track's notes with `fn(notes)`. */
export function mapTracks(
  rep: MidiRepresentation,
  fn: (notes: Note[], track: Track) => Note[],
): MidiRepresentation {
  const tracks = new Map<number, Track>();
  for (const [id, track] of rep.tracks) {
    tracks.set(id, { notes: fn(track.notes, track), trackName: track.trackName });
  }
  return { ...cloneRepresentation(rep), tracks };
}

// ─── Piece Queries ───────────────────────────────────────────────────────────

/** Length of the piece in beats, rounded up to a whole beat. */
export function songLength(rep: MidiRepresentation): number {
  let highest = 0;
  for (const track of rep.tracks.values()) {
    for (const note of track.notes) {
      highest = Math.max(highest, Math.ceil(note.beat + note.duration));
    }
  }
  return highest;
}

export function startingBpm(rep: MidiRepresentation): number {
  if (rep.bpmChanges.length === 0) return DEFAULT_BPM;
  return rep.bpmChanges[0].newBpm;
}

export function defaultTimeSignature(): TimeSignatureChange {
  return { numerator: 4, denominatorLog2: 2, beat: 0 };
}

/** The meter at beat 0, or 4/4 if none is recorded there. */
export function startingTimeSignature(rep: MidiRepresentation): TimeSignatureChange {
  const first = rep.timeSignatureChanges.find((t) => t.beat === 0);
  return first ? { ...first } : defaultTimeSignature();
}

/** How many quarter-note beats fit in one bar of this meter. */
export function absoluteBarLength(sig: TimeSignatureChange): number {
  return sig.numerator * (4 / 2 ** sig.denominatorLog2);
}

/** Drop every track that has no notes. Mutates `rep`. */
export function clearEmptyTracks(rep: MidiRepresentation): void {
  for (const [id, track] of [...rep.tracks]) {
    if (track.notes.length === 0) rep.tracks.delete(id);
  }
}

// ─── Track Queries & Edits ───────────────────────────────────────────────────

/** The channel most notes in the track use, or -1 for an empty track. */
export function mostUsedChannel(track: Track): number {
  const counts = new Map<number, number>();
  let best = -1;
  let bestCount = 0;
  for (const note of track.notes) {
    const count = (counts.get(note.channel) ?? 0) + 1;
    counts.set(note.channel, count);
    if (count > bestCount) {
      best = note.channel;
      bestCount = count;
    }
  }
  return best;
}

/**
 * Notes starting in [start, end), shifted so that `start` becomes beat 0.
 */
export function sliceTrack(track: Track, start: number, end: number): Track {
  return {
    trackName: track.trackName,
    notes: track.notes
      .filter((n) => approxLte(start, n.beat) && approxLt(n.beat, end))
      .map((n) => ({ ...n, beat: Math.max(0, n.beat - start) })),
  };
}

export function offsetTrack(track: Track, beats: number): Track {
  return {
    trackName: track.trackName,
    notes: track.notes.map((n) => ({ ...n, beat: n.beat + beats })),
  };
}

/** Scale note positions (not durations) by `factor`. */
export function scaleTrack(track: Track, factor: number): Track {
  return {
    trackName: track.trackName,
    notes: track.notes.map((n) => ({ ...n, beat: n.beat * factor })),
  };
}

/**
 * Shorten notes that still sound when the same key (channel + pitch) is
 * struck again, so each ends at the next onset. A note left with no length
 * is dropped. The result is sorted by beat.
 */
export function trimOverlaps(notes: readonly Note[]): Note[] {
  const sorted = [...notes].sort((a, b) => a.beat - b.beat);
  const trimmed: Array<Note | null> = [];
  const lastByKey = new Map<string, number>();

  for (const note of sorted) {
    const key = `${note.channel}:${note.pitch}`;
    const previousIndex = lastByKey.get(key);
    if (previousIndex !== undefined) {
      const previous = trimmed[previousIndex];
      if (previous && previous.beat + previous.duration > note.beat) {
        const duration = note.beat - previous.beat;
        trimmed[previousIndex] = approxEqual(duration, 0) || duration < 0
          ? null
          : { ...previous, duration };
      }
    }
    lastByKey.set(key, trimmed.length);
    trimmed.push(note);
  }

  return trimmed.filter((n): n is Note => n !== null);
}
