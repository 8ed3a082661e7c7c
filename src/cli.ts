#!/usr/bin/env node
// ─── midi-beatmap: CLI Entry Point ───────────────────────────────────────────
//
// Usage:
//   midi-beatmap convert <in.mid> <out.mid> [filter]   # Filter a MIDI file
//   midi-beatmap <in.mid> <out.mid> [filter]           # Same as convert
//   midi-beatmap info <file.mid>                       # Summarize a file
//   midi-beatmap filters                               # List filters
//
// Flags (convert):
//   --ticks-per-beat N     Output resolution (default: input's)
//   --mult N               Beat subdivision for swing/unswing
//   --config FILE          JSON converter config
//   --strict               Reject unfinished notes instead of dropping them
//   --keep-empty-tracks    Keep tracks without notes
// ─────────────────────────────────────────────────────────────────────────────

import { existsSync } from "node:fs";
import { extname } from "node:path";
import { FILTER_NAMES, FILTER_DESCRIPTIONS, getFilter, isFilterName } from "./filters/index.js";
import { processMidiFile } from "./pipeline.js";
import { readMidiFile } from "./midi/io.js";
import { buildRepresentation } from "./representation/build.js";
import {
  absoluteBarLength,
  mostUsedChannel,
  songLength,
  startingBpm,
  startingTimeSignature,
  trackList,
} from "./representation/model.js";
import { loadConverterConfig, parseConverterConfig } from "./config/loader.js";
import { DEFAULT_CONFIG, type ConverterConfig } from "./config/schema.js";
import type { ConversionWarning } from "./types.js";

// ─── Helpers ────────────────────────────────────────────────────────────────

function getFlag(args: string[], flag: string): string | null {
  const idx = args.indexOf(flag);
  if (idx === -1 || idx + 1 >= args.length) return null;
  return args[idx + 1];
}

/** Check for boolean flag (no value). */
function hasFlag(args: string[], flag: string): boolean {
  return args.includes(flag);
}

const VALUE_FLAGS = ["--ticks-per-beat", "--mult", "--config"];

/** Arguments that are neither flags nor flag values. */
function positionals(args: string[]): string[] {
  const out: string[] = [];
  for (let i = 0; i < args.length; i++) {
    if (VALUE_FLAGS.includes(args[i])) {
      i++;
    } else if (!args[i].startsWith("--")) {
      out.push(args[i]);
    }
  }
  return out;
}

function fail(message: string): never {
  console.error(message);
  process.exit(1);
}

function printWarnings(warnings: ConversionWarning[]): void {
  if (warnings.length === 0) return;
  console.error(`\n⚠ ${warnings.length} conversion warning(s):`);
  for (const w of warnings.slice(0, 10)) {
    console.error(`  • track ${w.track}, tick ${w.tick}: ${w.message}`);
  }
  if (warnings.length > 10) {
    console.error(`  … and ${warnings.length - 10} more`);
  }
}

function resolveConfig(args: string[]): ConverterConfig {
  const configPath = getFlag(args, "--config");
  const base = configPath ? loadConverterConfig(configPath) : DEFAULT_CONFIG;

  const tpbStr = getFlag(args, "--ticks-per-beat");
  return parseConverterConfig(
    {
      ...base,
      ...(tpbStr !== null ? { ticksPerBeat: Number(tpbStr) } : {}),
      ...(hasFlag(args, "--strict") ? { unmatchedNotes: "reject" } : {}),
      ...(hasFlag(args, "--keep-empty-tracks") ? { keepEmptyTracks: true } : {}),
    },
    "from command line",
  );
}

// ─── Commands ───────────────────────────────────────────────────────────────

function cmdConvert(args: string[]): void {
  const [input, output, filterName = "identity"] = positionals(args);
  if (!input || !output) {
    fail("Usage: midi-beatmap convert <in.mid> <out.mid> [filter] [--ticks-per-beat N] [--mult N] [--config FILE] [--strict] [--keep-empty-tracks]");
  }
  if (!existsSync(input)) fail(`Input file not found: "${input}"`);
  if (extname(input) !== ".mid") fail(`Input file does not end with .mid: "${input}"`);
  if (extname(output) !== ".mid") fail(`Output file does not end with .mid: "${output}"`);
  if (!isFilterName(filterName)) {
    fail(`Unknown filter: "${filterName}". Available: ${FILTER_NAMES.join(", ")}`);
  }

  const multStr = getFlag(args, "--mult");
  const mult = multStr !== null ? parseFloat(multStr) : 1;
  if (!Number.isFinite(mult) || mult <= 0) {
    fail(`Invalid mult: "${multStr}". Must be a positive number.`);
  }

  const config = resolveConfig(args);
  console.log(`Processing ${input} → ${output} [${filterName}]`);
  const warnings = processMidiFile(input, output, getFilter(filterName, { mult }), config);
  printWarnings(warnings);
  console.log("Processing complete.");
}

function cmdInfo(args: string[]): void {
  const file = args[0];
  if (!file) fail("Usage: midi-beatmap info <file.mid>");

  const raw = readMidiFile(file);
  const { representation: rep, warnings } = buildRepresentation(raw);
  const sig = startingTimeSignature(rep);

  console.log(`\n${"═".repeat(60)}`);
  console.log(`  ${file}`);
  console.log(`  Format ${raw.format} | ${raw.ticksPerBeat} ticks/beat | ${raw.tracks.length} raw track(s)`);
  console.log(`  Tempo: ${startingBpm(rep)} BPM (${rep.bpmChanges.length} change(s))`);
  console.log(`  Time: ${sig.numerator}/${2 ** sig.denominatorLog2} (${absoluteBarLength(sig)} beats per bar)`);
  console.log(`  Length: ${songLength(rep)} beats`);
  console.log(`${"═".repeat(60)}\n`);

  for (const [id, track] of trackList(rep)) {
    const name = track.trackName || "(unnamed)";
    const channel = mostUsedChannel(track);
    const program = rep.channelInstrumentMap.get(channel) ?? 0;
    console.log(`  [${id}] ${name}: ${track.notes.length} note(s), channel ${channel}, program ${program}`);
  }
  printWarnings(warnings);
  console.log();
}

function cmdFilters(): void {
  console.log("\nAvailable filters:\n");
  for (const name of FILTER_NAMES) {
    console.log(`  ${name.padEnd(20)}${FILTER_DESCRIPTIONS[name]}`);
  }
  console.log();
}

function cmdHelp(): void {
  console.log(`
midi-beatmap: rewrite MIDI files through a beat-addressed representation

Commands:
  convert <in.mid> <out.mid> [filter]   Filter a MIDI file (default filter: identity)
  info <file.mid>                       Summarize tracks, tempo and meter
  filters                               List available filters
  help                                  Show this message

Flags (convert):
  --ticks-per-beat N     Output resolution (default: the input's)
  --mult N               Beat subdivision for swing/unswing (default 1)
  --config FILE          JSON converter config
  --strict               Reject notes with no note-off instead of dropping them
  --keep-empty-tracks    Keep tracks without notes
`);
}

// ─── Main ───────────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const command = args[0] ?? "help";

  switch (command) {
    case "convert":
      cmdConvert(args.slice(1));
      break;
    case "info":
      cmdInfo(args.slice(1));
      break;
    case "filters":
      cmdFilters();
      break;
    case "help":
    case "--help":
    case "-h":
      cmdHelp();
      break;
    default:
      if (extname(command) === ".mid") {
        cmdConvert(args);
      } else {
        fail(`Unknown command: "${command}". Run 'midi-beatmap help' for usage.`);
      }
  }
}

main().catch((err) => {
  console.error(`\nError: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
