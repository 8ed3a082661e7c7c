// ─── Converter Config Schema ─────────────────────────────────────────────────
//
// Optional JSON file that tunes how files are read and written back.
// Every field has a default, so `{}` is a complete config.
// ─────────────────────────────────────────────────────────────────────────────

import { z } from "zod";
import { DEFAULT_BPM, MAX_TICKS_PER_BEAT } from "../types.js";
import { DEFAULT_CONDUCTOR_TRACK_NAME } from "../representation/serialize.js";

// ─── Zod Schemas ─────────────────────────────────────────────────────────────

export const ConverterConfigSchema = z.object({
  /** Output resolution; the input file's resolution when omitted. */
  ticksPerBeat: z.number().int().positive().max(MAX_TICKS_PER_BEAT).optional(),
  unmatchedNotes: z.enum(["drop", "reject"]).default("drop"),
  keepEmptyTracks: z.boolean().default(false),
  conductorTrackName: z.string().default(DEFAULT_CONDUCTOR_TRACK_NAME),
  defaultBpm: z.number().positive().max(1000).default(DEFAULT_BPM),
}).strict();

// ─── Derived Types ───────────────────────────────────────────────────────────

export type ConverterConfig = z.infer<typeof ConverterConfigSchema>;
export type ConverterConfigInput = z.input<typeof ConverterConfigSchema>;

export const DEFAULT_CONFIG: ConverterConfig = ConverterConfigSchema.parse({});

// ─── Validation ──────────────────────────────────────────────────────────────

export interface ConfigError {
  field: string;
  message: string;
}

/**
 * Validate a converter config with the zod schema.
 * Returns an empty array if valid.
 */
export function validateConverterConfig(config: unknown): ConfigError[] {
  const result = ConverterConfigSchema.safeParse(config);
  if (result.success) return [];

  return result.error.issues.map((issue) => ({
    field: issue.path.join(".") || "root",
    message: issue.message,
  }));
}
