// ─── Tempo Integration ───────────────────────────────────────────────────────
//
// Removes every tempo change and fixes the tempo at 60 BPM, where one beat
// lasts one second. Each note's new beat is the wall-clock second it used to
// start at, and its new duration the seconds it used to last, so the piece
// plays back exactly as before.
//
// Time signatures keep their old beat positions: meter is not rescaled.
// ─────────────────────────────────────────────────────────────────────────────

import type { MidiRepresentation, Note } from "../types.js";
import { TempoMap } from "../timing/tempo-map.js";
import { mapTracks } from "../representation/model.js";

export const INTEGRATED_BPM = 60;

/** Re-express a note's position and length in seconds under `tempoMap`. */
export function integrateNote(note: Note, tempoMap: TempoMap): Note {
  const start = tempoMap.elapsedSeconds(0, note.beat);
  const end = tempoMap.elapsedSeconds(0, note.beat + note.duration);
  return { ...note, beat: start, duration: end - start };
}

/**
 * Flatten the tempo to a constant 60 BPM while keeping every note's real
 * start time and real length.
 */
export function integrateTempo(rep: MidiRepresentation): MidiRepresentation {
  const tempoMap = TempoMap.fromChanges(rep.bpmChanges);
  const integrated = mapTracks(rep, (notes) => notes.map((n) => integrateNote(n, tempoMap)));
  integrated.bpmChanges = [{ beat: 0, newBpm: INTEGRATED_BPM }];
  return integrated;
}
