// ─── MIDI File I/O ───────────────────────────────────────────────────────────

import { readFileSync, writeFileSync, existsSync } from "node:fs";
import type { RawMidi } from "../types.js";
import { decodeMidi, encodeMidi } from "./codec.js";

export function readMidiFile(path: string): RawMidi {
  if (!existsSync(path)) {
    throw new Error(`MIDI file not found: ${path}`);
  }
  return decodeMidi(new Uint8Array(readFileSync(path)));
}

export function writeMidiFile(path: string, raw: RawMidi): void {
  writeFileSync(path, encodeMidi(raw));
}
