// ─── No Chords ───────────────────────────────────────────────────────────────
//
// Reduces chords to their top voice: among notes in one track that share a
// channel and start together, only the highest pitch is kept.
// ─────────────────────────────────────────────────────────────────────────────

import type { MidiRepresentation, Note } from "../types.js";
import { mapTracks } from "../representation/model.js";
import { approxEqual } from "../timing/timebase.js";

/**
 * Group notes that start on the same beat on the same channel.
 * Groups come back in the order their first note appears in `notes`.
 */
export function groupSimultaneous(notes: readonly Note[]): Note[][] {
  const indexed = notes
    .map((note, index) => ({ note, index }))
    .sort((a, b) =>
      a.note.channel - b.note.channel || a.note.beat - b.note.beat || a.index - b.index,
    );

  const groups: Array<{ first: number; notes: Note[] }> = [];
  let current: { first: number; notes: Note[] } | undefined;
  for (const { note, index } of indexed) {
    const head = current?.notes[0];
    if (current && head && head.channel === note.channel && approxEqual(head.beat, note.beat)) {
      current.notes.push(note);
      current.first = Math.min(current.first, index);
    } else {
      current = { first: index, notes: [note] };
      groups.push(current);
    }
  }

  return groups.sort((a, b) => a.first - b.first).map((g) => g.notes);
}

export function noChords(rep: MidiRepresentation): MidiRepresentation {
  return mapTracks(rep, (notes) =>
    groupSimultaneous(notes).map((group) =>
      group.reduce((top, n) => (n.pitch > top.pitch ? n : top)),
    ),
  );
}
