// ─── MIDI Codec ──────────────────────────────────────────────────────────────
//
// Bridges midi-file's delta-time MidiData and the absolute-tick RawMidi
// stream the converter works on. Events the converter has no use for
// (controllers, pitch bend, text, SysEx…) are dropped on decode.
// ─────────────────────────────────────────────────────────────────────────────

import { parseMidi, writeMidi, type MidiData, type MidiEvent } from "midi-file";
import { InvalidMidiError } from "../errors.js";
import { MAX_TICKS_PER_BEAT, type RawEvent, type RawMidi } from "../types.js";

// Written with every time signature; only the meter itself is kept on decode.
const METRONOME_CLOCKS = 24;
const THIRTY_SECONDS_PER_BEAT = 8;

// ─── Decode ──────────────────────────────────────────────────────────────────

/** Parse a standard MIDI file into absolute-tick track event lists. */
export function decodeMidi(bytes: Uint8Array): RawMidi {
  let midi: MidiData;
  try {
    midi = parseMidi(bytes);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new InvalidMidiError(`Unreadable MIDI data: ${reason}`);
  }
  return fromMidiData(midi);
}

export function fromMidiData(midi: MidiData): RawMidi {
  const { format, ticksPerBeat } = midi.header;
  if (ticksPerBeat === undefined) {
    throw new InvalidMidiError("SMPTE time division is not supported");
  }
  if (format !== 0 && format !== 1 && format !== 2) {
    throw new InvalidMidiError(`Unknown MIDI format: ${format}`);
  }

  const tracks = midi.tracks.map((track) => {
    const events: RawEvent[] = [];
    let tick = 0;
    for (const event of track) {
      tick += event.deltaTime;
      const decoded = decodeEvent(event, tick);
      if (decoded) events.push(decoded);
    }
    return events;
  });

  return { format, ticksPerBeat, tracks };
}

function decodeEvent(event: MidiEvent, tick: number): RawEvent | null {
  switch (event.type) {
    case "noteOn":
      // Running-status files send note-on with velocity 0 as a note-off.
      if (event.velocity > 0) {
        return {
          kind: "noteOn",
          tick,
          channel: event.channel,
          pitch: event.noteNumber,
          velocity: event.velocity,
        };
      }
      return { kind: "noteOff", tick, channel: event.channel, pitch: event.noteNumber, velocity: 0 };
    case "noteOff":
      return {
        kind: "noteOff",
        tick,
        channel: event.channel,
        pitch: event.noteNumber,
        velocity: event.velocity,
      };
    case "setTempo":
      return { kind: "tempo", tick, microsecondsPerBeat: event.microsecondsPerBeat };
    case "timeSignature": {
      const denominatorLog2 = Math.log2(event.denominator);
      if (!Number.isInteger(denominatorLog2)) {
        throw new InvalidMidiError(`Time signature denominator ${event.denominator} is not a power of two`);
      }
      return { kind: "timeSignature", tick, numerator: event.numerator, denominatorLog2 };
    }
    case "trackName":
      return { kind: "trackName", tick, name: event.text };
    case "programChange":
      return { kind: "programChange", tick, channel: event.channel, program: event.programNumber };
    default:
      return null;
  }
}

// ─── Encode ──────────────────────────────────────────────────────────────────

/** Serialize absolute-tick track event lists as a standard MIDI file. */
export function encodeMidi(raw: RawMidi): Uint8Array {
  return new Uint8Array(writeMidi(toMidiData(raw)));
}

export function toMidiData(raw: RawMidi): MidiData {
  const { ticksPerBeat } = raw;
  if (!Number.isInteger(ticksPerBeat) || ticksPerBeat <= 0 || ticksPerBeat > MAX_TICKS_PER_BEAT) {
    throw new RangeError(`Cannot write ${ticksPerBeat} ticks per beat into a MIDI header`);
  }

  const tracks = raw.tracks.map((events, index) => {
    const out: MidiEvent[] = [];
    let previous = 0;
    for (const event of events) {
      if (event.tick < previous) {
        throw new InvalidMidiError(
          `Track ${index}: events out of order (tick ${event.tick} after ${previous})`,
        );
      }
      out.push(encodeEvent(event, event.tick - previous));
      previous = event.tick;
    }
    out.push({ deltaTime: 0, meta: true, type: "endOfTrack" });
    return out;
  });

  return {
    header: { format: raw.format, numTracks: tracks.length, ticksPerBeat },
    tracks,
  };
}

function encodeEvent(event: RawEvent, deltaTime: number): MidiEvent {
  switch (event.kind) {
    case "noteOn":
      return {
        deltaTime,
        type: "noteOn",
        channel: event.channel,
        noteNumber: event.pitch,
        velocity: event.velocity,
      };
    case "noteOff":
      return {
        deltaTime,
        type: "noteOff",
        channel: event.channel,
        noteNumber: event.pitch,
        velocity: event.velocity,
      };
    case "tempo":
      return {
        deltaTime,
        meta: true,
        type: "setTempo",
        microsecondsPerBeat: event.microsecondsPerBeat,
      };
    case "timeSignature":
      return {
        deltaTime,
        meta: true,
        type: "timeSignature",
        numerator: event.numerator,
        denominator: 2 ** event.denominatorLog2,
        metronome: METRONOME_CLOCKS,
        thirtyseconds: THIRTY_SECONDS_PER_BEAT,
      };
    case "trackName":
      return { deltaTime, meta: true, type: "trackName", text: event.name };
    case "programChange":
      return {
        deltaTime,
        type: "programChange",
        channel: event.channel,
        programNumber: event.program,
      };
  }
}
