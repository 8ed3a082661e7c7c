// ─── Converter Config Loader ─────────────────────────────────────────────────

import { readFileSync, existsSync } from "node:fs";
import { basename } from "node:path";
import { ConverterConfigSchema, type ConverterConfig } from "./schema.js";

/**
 * Load and validate a converter config from a JSON file.
 */
export function loadConverterConfig(filePath: string): ConverterConfig {
  if (!existsSync(filePath)) {
    throw new Error(`Config not found: ${filePath}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, "utf8"));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new Error(`Invalid JSON in config ${basename(filePath)}: ${reason}`);
  }

  return parseConverterConfig(raw, basename(filePath));
}

/** Validate an already-parsed config object. */
export function parseConverterConfig(raw: unknown, source = "config"): ConverterConfig {
  const result = ConverterConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map(i => `  ${i.path.join(".") || "root"}: ${i.message}`)
      .join("\n");
    throw new Error(`Invalid config ${source}:\n${issues}`);
  }
  return result.data;
}
