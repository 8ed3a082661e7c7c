// ─── MidiRepresentation → Raw Events ─────────────────────────────────────────
//
// The inverse of buildRepresentation. Emits a format-1 event stream: a
// conductor track carrying tempo and meter, then one track per
// representation track in ascending identifier order.
// ─────────────────────────────────────────────────────────────────────────────

import {
  DEFAULT_TICKS_PER_BEAT,
  MAX_TICKS_PER_BEAT,
  type MidiRepresentation,
  type Note,
  type RawEvent,
  type RawMidi,
} from "../types.js";
import { beatsToTicks, bpmToMicroseconds } from "../timing/timebase.js";
import { trackList } from "./model.js";

// ─── Types ───────────────────────────────────────────────────────────────────

export interface SerializeOptions {
  /** Output resolution. Default 96. */
  ticksPerBeat?: number;
  /** Name of the conductor track. Empty string emits no name. */
  conductorTrackName?: string;
}

// ─── Constants ───────────────────────────────────────────────────────────────

export const DEFAULT_CONDUCTOR_TRACK_NAME = "Tempo changes";

/**
 * Order of events sharing a tick. Note-offs precede note-ons so a key
 * released and re-struck on the same tick never sounds twice.
 */
const KIND_ORDER: Record<RawEvent["kind"], number> = {
  trackName: 0,
  timeSignature: 1,
  tempo: 2,
  programChange: 3,
  noteOff: 4,
  noteOn: 5,
};

// ─── Public API ──────────────────────────────────────────────────────────────

/**
 * Convert a representation to raw events at the given resolution.
 *
 * Every tempo is checked before anything is emitted, so this either returns
 * a complete stream or throws InvalidTempoError.
 */
export function serializeRepresentation(
  rep: MidiRepresentation,
  options: SerializeOptions = {},
): RawMidi {
  const tpb = options.ticksPerBeat ?? DEFAULT_TICKS_PER_BEAT;
  if (!Number.isInteger(tpb) || tpb <= 0 || tpb > MAX_TICKS_PER_BEAT) {
    throw new RangeError(`ticksPerBeat must be an integer in 1..${MAX_TICKS_PER_BEAT}, got ${tpb}`);
  }

  const tempos = [...rep.bpmChanges]
    .sort((a, b) => a.beat - b.beat)
    .map((change) => ({
      tick: beatsToTicks(change.beat, tpb),
      microsecondsPerBeat: bpmToMicroseconds(change.newBpm),
    }));

  const tracks = trackList(rep);
  const programOwner = assignProgramChanges(rep, tracks.map(([id]) => id));

  // ── Conductor track ──
  const conductorName = options.conductorTrackName ?? DEFAULT_CONDUCTOR_TRACK_NAME;
  const conductor: RawEvent[] = [];
  if (conductorName !== "") {
    conductor.push({ kind: "trackName", tick: 0, name: conductorName });
  }
  for (const sig of rep.timeSignatureChanges) {
    conductor.push({
      kind: "timeSignature",
      tick: beatsToTicks(sig.beat, tpb),
      numerator: sig.numerator,
      denominatorLog2: sig.denominatorLog2,
    });
  }
  for (const tempo of tempos) {
    conductor.push({ kind: "tempo", ...tempo });
  }
  conductor.push(...programChangesFor(rep, programOwner, null));

  // ── Note tracks ──
  const out: RawEvent[][] = [sortEvents(conductor)];
  for (const [id, track] of tracks) {
    const events: RawEvent[] = [];
    if (track.trackName !== "") {
      events.push({ kind: "trackName", tick: 0, name: track.trackName });
    }
    events.push(...programChangesFor(rep, programOwner, id));
    for (const note of track.notes) {
      events.push(...noteEvents(note, tpb));
    }
    out.push(sortEvents(events));
  }

  return { format: 1, ticksPerBeat: tpb, tracks: out };
}

// ─── Internal ────────────────────────────────────────────────────────────────

/** Note-on/off pair. A note never rounds down to zero ticks. */
function noteEvents(note: Note, ticksPerBeat: number): RawEvent[] {
  const onTick = beatsToTicks(note.beat, ticksPerBeat);
  const offTick = Math.max(beatsToTicks(note.beat + note.duration, ticksPerBeat), onTick + 1);
  const fields = { channel: note.channel, pitch: note.pitch, velocity: note.velocity };
  return [
    { kind: "noteOn", tick: onTick, ...fields },
    { kind: "noteOff", tick: offTick, ...fields },
  ];
}

/**
 * Each channel's program change goes to the first track (by identifier)
 * whose notes use it; channels no note uses map to null (the conductor).
 */
function assignProgramChanges(
  rep: MidiRepresentation,
  orderedIds: number[],
): Map<number, number | null> {
  const owner = new Map<number, number | null>();
  for (const id of orderedIds) {
    const track = rep.tracks.get(id);
    if (!track) continue;
    for (const note of track.notes) {
      if (!owner.has(note.channel)) owner.set(note.channel, id);
    }
  }
  for (const channel of rep.channelInstrumentMap.keys()) {
    if (!owner.has(channel)) owner.set(channel, null);
  }
  return owner;
}

function programChangesFor(
  rep: MidiRepresentation,
  owner: Map<number, number | null>,
  trackId: number | null,
): RawEvent[] {
  const events: RawEvent[] = [];
  const channels = [...rep.channelInstrumentMap.keys()].sort((a, b) => a - b);
  for (const channel of channels) {
    if (owner.get(channel) !== trackId) continue;
    const program = rep.channelInstrumentMap.get(channel);
    if (program === undefined) continue;
    events.push({ kind: "programChange", tick: 0, channel, program });
  }
  return events;
}

function sortKey(event: RawEvent): [number, number] {
  switch (event.kind) {
    case "noteOn":
    case "noteOff":
      return [event.pitch, event.channel];
    case "programChange":
      return [event.channel, 0];
    default:
      return [0, 0];
  }
}

function sortEvents(events: RawEvent[]): RawEvent[] {
  return events.sort((a, b) => {
    if (a.tick !== b.tick) return a.tick - b.tick;
    const kind = KIND_ORDER[a.kind] - KIND_ORDER[b.kind];
    if (kind !== 0) return kind;
    const [a1, a2] = sortKey(a);
    const [b1, b2] = sortKey(b);
    return a1 - b1 || a2 - b2;
  });
}
