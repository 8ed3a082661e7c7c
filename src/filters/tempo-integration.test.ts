import { describe, it, expect } from "vitest";
import { integrateNote, integrateTempo } from "./tempo-integration.js";
import { createRepresentation } from "../representation/model.js";
import { TempoMap } from "../timing/tempo-map.js";
import type { Note } from "../types.js";

function n(pitch: number, beat: number, duration: number): Note {
  return { channel: 0, pitch, velocity: 100, beat, duration };
}

describe("integrateTempo", () => {
  const slowdown = createRepresentation({
    tracks: new Map([[0, { trackName: "Lead", notes: [n(60, 0, 2), n(62, 2, 4), n(64, 4, 4)] }]]),
    channelInstrumentMap: new Map([[0, 0]]),
    bpmChanges: [
      { beat: 0, newBpm: 120 },
      { beat: 4, newBpm: 60 },
    ],
    timeSignatureChanges: [{ numerator: 3, denominatorLog2: 2, beat: 6 }],
  });

  const result = integrateTempo(slowdown);
  const notes = result.tracks.get(0)?.notes ?? [];

  it("fixes the tempo at 60 BPM", () => {
    expect(result.bpmChanges).toEqual([{ beat: 0, newBpm: 60 }]);
  });

  it("moves each note to the second it started at", () => {
    expect(notes.map((x) => x.beat)).toEqual([0, 1, 2]);
  });

  it("keeps each note's real length", () => {
    expect(notes.map((x) => x.duration)).toEqual([1, 3, 4]);
  });

  it("leaves pitch, channel, velocity and names alone", () => {
    expect(notes.map((x) => x.pitch)).toEqual([60, 62, 64]);
    expect(result.tracks.get(0)?.trackName).toBe("Lead");
    expect(result.channelInstrumentMap).toEqual(new Map([[0, 0]]));
  });

  it("does not rescale time signatures", () => {
    expect(result.timeSignatureChanges).toEqual([{ numerator: 3, denominatorLog2: 2, beat: 6 }]);
  });

  it("does not modify its input", () => {
    expect(slowdown.bpmChanges).toHaveLength(2);
    expect(slowdown.tracks.get(0)?.notes[1]).toEqual(n(62, 2, 4));
  });

  it("uses 120 BPM when no tempo is set", () => {
    const halved = integrateTempo(createRepresentation({
      tracks: new Map([[0, { trackName: "", notes: [n(60, 2, 1)] }]]),
    }));
    expect(halved.tracks.get(0)?.notes).toEqual([n(60, 1, 0.5)]);
  });
});

describe("integrateNote", () => {
  it("spans a tempo change", () => {
    const map = TempoMap.fromChanges([
      { beat: 0, newBpm: 90 },
      { beat: 3, newBpm: 180 },
    ]);
    const integrated = integrateNote(n(60, 2, 2), map);
    // 2 beats at 90 = 4/3 s; then 1 beat at 90 + 1 beat at 180 = 1 s
    expect(integrated.beat).toBeCloseTo(4 / 3, 9);
    expect(integrated.beat + integrated.duration).toBeCloseTo(7 / 3, 9);
  });
});
