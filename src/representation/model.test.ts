import { describe, it, expect } from "vitest";
import {
  absoluteBarLength,
  clearEmptyTracks,
  cloneRepresentation,
  createRepresentation,
  mapTracks,
  mostUsedChannel,
  offsetTrack,
  scaleTrack,
  sliceTrack,
  songLength,
  startingBpm,
  startingTimeSignature,
  trackList,
  trimOverlaps,
} from "./model.js";
import type { Note, Track } from "../types.js";

function n(pitch: number, beat: number, duration = 1, channel = 0): Note {
  return { channel, pitch, velocity: 100, beat, duration };
}

function track(notes: Note[], trackName = ""): Track {
  return { notes, trackName };
}

describe("piece queries", () => {
  it("songLength rounds the last note end up", () => {
    const rep = createRepresentation({
      tracks: new Map([
        [0, track([n(60, 0, 1)])],
        [5, track([n(62, 2.5, 1)])],
      ]),
    });
    expect(songLength(rep)).toBe(4);
  });

  it("songLength of an empty piece is 0", () => {
    expect(songLength(createRepresentation())).toBe(0);
  });

  it("startingBpm defaults to 120", () => {
    expect(startingBpm(createRepresentation())).toBe(120);
    expect(startingBpm(createRepresentation({ bpmChanges: [{ beat: 0, newBpm: 72 }] }))).toBe(72);
  });

  it("startingTimeSignature defaults to 4/4", () => {
    expect(startingTimeSignature(createRepresentation())).toEqual({
      numerator: 4,
      denominatorLog2: 2,
      beat: 0,
    });
  });

  it("startingTimeSignature ignores later changes", () => {
    const rep = createRepresentation({
      timeSignatureChanges: [
        { numerator: 7, denominatorLog2: 3, beat: 8 },
        { numerator: 3, denominatorLog2: 2, beat: 0 },
      ],
    });
    expect(startingTimeSignature(rep).numerator).toBe(3);
  });

  it("absoluteBarLength counts quarter-note beats", () => {
    expect(absoluteBarLength({ numerator: 4, denominatorLog2: 2, beat: 0 })).toBe(4);
    expect(absoluteBarLength({ numerator: 3, denominatorLog2: 2, beat: 0 })).toBe(3);
    expect(absoluteBarLength({ numerator: 6, denominatorLog2: 3, beat: 0 })).toBe(3);
    expect(absoluteBarLength({ numerator: 2, denominatorLog2: 1, beat: 0 })).toBe(4);
  });

  it("trackList orders by identifier", () => {
    const rep = createRepresentation({
      tracks: new Map([
        [9, track([], "c")],
        [-1, track([], "a")],
        [3, track([], "b")],
      ]),
    });
    expect(trackList(rep).map(([id, t]) => `${id}:${t.trackName}`)).toEqual(["-1:a", "3:b", "9:c"]);
  });

  it("clearEmptyTracks removes tracks without notes", () => {
    const rep = createRepresentation({
      tracks: new Map([
        [0, track([])],
        [1, track([n(60, 0)])],
      ]),
    });
    clearEmptyTracks(rep);
    expect([...rep.tracks.keys()]).toEqual([1]);
  });
});

describe("copies", () => {
  it("cloneRepresentation shares no containers", () => {
    const rep = createRepresentation({
      tracks: new Map([[0, track([n(60, 0)])]]),
      bpmChanges: [{ beat: 0, newBpm: 100 }],
    });
    const copy = cloneRepresentation(rep);
    copy.tracks.get(0)?.notes.push(n(62, 1));
    copy.bpmChanges[0].newBpm = 50;
    expect(rep.tracks.get(0)?.notes).toHaveLength(1);
    expect(rep.bpmChanges[0].newBpm).toBe(100);
  });

  it("mapTracks keeps names and leaves the input alone", () => {
    const rep = createRepresentation({ tracks: new Map([[4, track([n(60, 1)], "Lead")]]) });
    const shifted = mapTracks(rep, (notes) => notes.map((x) => ({ ...x, beat: x.beat + 1 })));
    expect(shifted.tracks.get(4)).toEqual(track([n(60, 2)], "Lead"));
    expect(rep.tracks.get(4)?.notes[0].beat).toBe(1);
  });
});

describe("track edits", () => {
  it("mostUsedChannel picks the most common channel", () => {
    expect(mostUsedChannel(track([n(60, 0, 1, 1), n(61, 0, 1, 2), n(62, 0, 1, 2)]))).toBe(2);
  });

  it("mostUsedChannel of an empty track is -1", () => {
    expect(mostUsedChannel(track([]))).toBe(-1);
  });

  it("sliceTrack keeps notes starting in [start, end) and rebases them", () => {
    const sliced = sliceTrack(track([n(60, 0), n(61, 1), n(62, 2), n(63, 3)], "Lead"), 1, 3);
    expect(sliced).toEqual(track([n(61, 0), n(62, 1)], "Lead"));
  });

  it("offsetTrack shifts every note", () => {
    expect(offsetTrack(track([n(60, 1)]), 2.5).notes[0].beat).toBe(3.5);
  });

  it("scaleTrack scales positions but not durations", () => {
    const scaled = scaleTrack(track([n(60, 3, 1)]), 2);
    expect(scaled.notes[0]).toEqual(n(60, 6, 1));
  });
});

describe("trimOverlaps", () => {
  it("ends a note where the same key starts again", () => {
    expect(trimOverlaps([n(60, 0, 2), n(60, 1, 1)])).toEqual([n(60, 0, 1), n(60, 1, 1)]);
  });

  it("leaves other pitches and channels alone", () => {
    const notes = [n(60, 0, 2), n(62, 1, 1), n(60, 1, 1, 3)];
    expect(trimOverlaps(notes)).toEqual(notes);
  });

  it("drops a note left with no length", () => {
    expect(trimOverlaps([n(60, 0, 1), n(60, 0, 2)])).toEqual([n(60, 0, 2)]);
  });

  it("sorts the result by beat", () => {
    expect(trimOverlaps([n(64, 2), n(60, 0)]).map((x) => x.pitch)).toEqual([60, 64]);
  });
});
