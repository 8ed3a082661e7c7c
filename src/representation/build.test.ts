import { describe, it, expect } from "vitest";
import { buildRepresentation } from "./build.js";
import { InvalidMidiError, InvalidTempoError } from "../errors.js";
import type { RawEvent, RawMidi } from "../types.js";

// ─── Test Helpers ───────────────────────────────────────────────────────────

function raw(tracks: RawEvent[][], ticksPerBeat = 480): RawMidi {
  return { format: 1, ticksPerBeat, tracks };
}

function note(
  pitch: number,
  onTick: number,
  offTick: number,
  channel = 0,
  velocity = 100,
): RawEvent[] {
  return [
    { kind: "noteOn", tick: onTick, channel, pitch, velocity },
    { kind: "noteOff", tick: offTick, channel, pitch, velocity },
  ];
}

function tempo(tick: number, bpm: number): RawEvent {
  return { kind: "tempo", tick, microsecondsPerBeat: 60_000_000 / bpm };
}

// ─── Tests ──────────────────────────────────────────────────────────────────

describe("buildRepresentation", () => {
  it("builds a single note at 120 BPM", () => {
    const { representation, warnings } = buildRepresentation(raw([
      [tempo(0, 120), ...note(60, 0, 480)],
    ]));

    expect(warnings).toEqual([]);
    expect(representation.tracks.get(0)).toEqual({
      notes: [{ channel: 0, pitch: 60, velocity: 100, beat: 0, duration: 1 }],
      trackName: "",
    });
    expect(representation.bpmChanges).toEqual([{ beat: 0, newBpm: 120 }]);
  });

  it("gives channels without a program change instrument 0", () => {
    const { representation } = buildRepresentation(raw([note(60, 0, 480, 5)]));
    expect(representation.channelInstrumentMap.get(5)).toBe(0);
  });

  it("records program changes, last one winning", () => {
    const { representation } = buildRepresentation(raw([[
      { kind: "programChange", tick: 0, channel: 2, program: 40 },
      { kind: "programChange", tick: 0, channel: 2, program: 41 },
      { kind: "programChange", tick: 0, channel: 9, program: 0 },
      ...note(60, 0, 480, 2),
    ]]));
    expect(representation.channelInstrumentMap).toEqual(new Map([[2, 41], [9, 0]]));
  });

  it("collects tempo changes from every track", () => {
    const { representation } = buildRepresentation(raw([
      [tempo(960, 60), ...note(60, 0, 480)],
      [tempo(0, 120)],
    ]));
    expect(representation.bpmChanges).toEqual([
      { beat: 0, newBpm: 120 },
      { beat: 2, newBpm: 60 },
    ]);
  });

  it("synthesizes 120 BPM when the file sets no tempo", () => {
    const { representation } = buildRepresentation(raw([note(60, 0, 480)]));
    expect(representation.bpmChanges).toEqual([{ beat: 0, newBpm: 120 }]);
  });

  it("uses defaultBpm when the file sets no tempo", () => {
    const { representation } = buildRepresentation(raw([note(60, 0, 480)]), { defaultBpm: 100 });
    expect(representation.bpmChanges).toEqual([{ beat: 0, newBpm: 100 }]);
  });

  it("reads time signatures in beats", () => {
    const { representation } = buildRepresentation(raw([
      [
        { kind: "timeSignature", tick: 0, numerator: 3, denominatorLog2: 2 },
        { kind: "timeSignature", tick: 1920, numerator: 6, denominatorLog2: 3 },
      ],
      note(60, 0, 480),
    ]));
    expect(representation.timeSignatureChanges).toEqual([
      { numerator: 3, denominatorLog2: 2, beat: 0 },
      { numerator: 6, denominatorLog2: 3, beat: 4 },
    ]);
  });

  it("keys tracks by source index and drops tracks without notes", () => {
    const { representation } = buildRepresentation(raw([
      [{ kind: "trackName", tick: 0, name: "Conductor" }, tempo(0, 90)],
      [{ kind: "trackName", tick: 0, name: "Lead" }, ...note(72, 0, 240)],
    ]));
    expect([...representation.tracks.keys()]).toEqual([1]);
    expect(representation.tracks.get(1)?.trackName).toBe("Lead");
    expect(representation.tracks.get(1)?.notes[0].duration).toBe(0.5);
  });

  it("keeps empty tracks on request", () => {
    const { representation } = buildRepresentation(
      raw([
        [{ kind: "trackName", tick: 0, name: "Conductor" }, tempo(0, 90)],
        note(72, 0, 240),
      ]),
      { keepEmptyTracks: true },
    );
    expect(representation.tracks.get(0)).toEqual({ notes: [], trackName: "Conductor" });
    expect(representation.tracks.size).toBe(2);
  });

  it("treats note-on with velocity 0 as note-off", () => {
    const { representation } = buildRepresentation(raw([[
      { kind: "noteOn", tick: 0, channel: 0, pitch: 64, velocity: 80 },
      { kind: "noteOn", tick: 720, channel: 0, pitch: 64, velocity: 0 },
    ]]));
    expect(representation.tracks.get(0)?.notes).toEqual([
      { channel: 0, pitch: 64, velocity: 80, beat: 0, duration: 1.5 },
    ]);
  });

  it("pairs by channel as well as pitch", () => {
    const { representation } = buildRepresentation(raw([[
      { kind: "noteOn", tick: 0, channel: 0, pitch: 60, velocity: 90 },
      { kind: "noteOn", tick: 0, channel: 1, pitch: 60, velocity: 70 },
      { kind: "noteOff", tick: 480, channel: 1, pitch: 60, velocity: 0 },
      { kind: "noteOff", tick: 960, channel: 0, pitch: 60, velocity: 0 },
    ]]));
    expect(representation.tracks.get(0)?.notes).toEqual([
      { channel: 1, pitch: 60, velocity: 70, beat: 0, duration: 1 },
      { channel: 0, pitch: 60, velocity: 90, beat: 0, duration: 2 },
    ]);
  });

  it("ends a sounding note when its key is struck again", () => {
    const { representation, warnings } = buildRepresentation(raw([[
      { kind: "noteOn", tick: 0, channel: 0, pitch: 60, velocity: 100 },
      { kind: "noteOn", tick: 240, channel: 0, pitch: 60, velocity: 50 },
      { kind: "noteOff", tick: 480, channel: 0, pitch: 60, velocity: 0 },
    ]]));
    expect(warnings).toEqual([]);
    expect(representation.tracks.get(0)?.notes).toEqual([
      { channel: 0, pitch: 60, velocity: 100, beat: 0, duration: 0.5 },
      { channel: 0, pitch: 60, velocity: 50, beat: 0.5, duration: 0.5 },
    ]);
  });

  it("gives a note-off after a same-tick re-strike to the earlier note", () => {
    const { representation, warnings } = buildRepresentation(raw([[
      { kind: "noteOn", tick: 0, channel: 0, pitch: 60, velocity: 100 },
      { kind: "noteOn", tick: 480, channel: 0, pitch: 60, velocity: 90 },
      { kind: "noteOff", tick: 480, channel: 0, pitch: 60, velocity: 0 },
      { kind: "noteOff", tick: 960, channel: 0, pitch: 60, velocity: 0 },
    ]]));
    expect(warnings).toEqual([]);
    expect(representation.tracks.get(0)?.notes).toEqual([
      { channel: 0, pitch: 60, velocity: 100, beat: 0, duration: 1 },
      { channel: 0, pitch: 60, velocity: 90, beat: 1, duration: 1 },
    ]);
  });

  it("drops zero-length notes with a warning", () => {
    const { representation, warnings } = buildRepresentation(raw([
      [...note(60, 0, 0), ...note(62, 0, 480)],
    ]));
    expect(representation.tracks.get(0)?.notes.map((n) => n.pitch)).toEqual([62]);
    expect(warnings).toEqual([
      { track: 0, tick: 0, message: "Dropped zero-length note 60 on channel 0" },
    ]);
  });

  it("ignores a note-off with no note-on, with a warning", () => {
    const { representation, warnings } = buildRepresentation(raw([[
      { kind: "noteOff", tick: 0, channel: 3, pitch: 50, velocity: 0 },
      ...note(60, 0, 480),
    ]]));
    expect(representation.tracks.get(0)?.notes).toHaveLength(1);
    expect(warnings).toEqual([
      { track: 0, tick: 0, message: "Ignored note-off 50 on channel 3 with no matching note-on" },
    ]);
  });

  describe("unfinished notes", () => {
    const input = raw([[
      ...note(60, 0, 480),
      { kind: "noteOn", tick: 480, channel: 0, pitch: 67, velocity: 90 },
    ]]);

    it("are dropped with a warning by default", () => {
      const { representation, warnings } = buildRepresentation(input);
      expect(representation.tracks.get(0)?.notes.map((n) => n.pitch)).toEqual([60]);
      expect(warnings).toEqual([{
        track: 0,
        tick: 480,
        message: "Dropped unfinished note: Note 67 on channel 0 has no note-off before the end of track 0",
      }]);
    });

    it("are rejected under the reject policy", () => {
      expect(() => buildRepresentation(input, { unmatchedNotes: "reject" })).toThrow(InvalidMidiError);
    });
  });

  describe("validation", () => {
    it("rejects a non-positive resolution", () => {
      expect(() => buildRepresentation(raw([note(60, 0, 480)], 0))).toThrow(InvalidMidiError);
    });

    it("rejects events out of tick order", () => {
      expect(() => buildRepresentation(raw([[
        { kind: "noteOn", tick: 480, channel: 0, pitch: 60, velocity: 100 },
        { kind: "noteOff", tick: 0, channel: 0, pitch: 60, velocity: 0 },
      ]]))).toThrow("out of order");
    });

    it("rejects fractional ticks", () => {
      expect(() => buildRepresentation(raw([note(60, 0.5, 480)]))).toThrow(InvalidMidiError);
    });

    it("rejects a zero set-tempo value", () => {
      expect(() => buildRepresentation(raw([[
        { kind: "tempo", tick: 0, microsecondsPerBeat: 0 },
      ]]))).toThrow(InvalidTempoError);
    });

    it("rejects a zero time signature numerator", () => {
      expect(() => buildRepresentation(raw([[
        { kind: "timeSignature", tick: 0, numerator: 0, denominatorLog2: 2 },
      ]]))).toThrow(InvalidMidiError);
    });
  });

  it("does not modify its input", () => {
    const input = raw([
      [tempo(0, 120), { kind: "trackName", tick: 0, name: "Piano" }, ...note(60, 0, 480)],
    ]);
    const before = JSON.stringify(input);
    buildRepresentation(input);
    expect(JSON.stringify(input)).toBe(before);
  });
});
