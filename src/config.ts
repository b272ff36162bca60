// ── Configuration ────────────────────────────────────────────────────────────
//
// Read from environment variables once at start-up:
//
//   BIOWEB_DATA_DIR            directory holding the CSV files (default: cwd)
//   BIOWEB_BAT_FILE            bat monitoring events
//   BIOWEB_HERP_FILE           herpetofauna sightings
//   BIOWEB_THREAT_FILE         threat status register
//   BIOWEB_DEFAULT_RADIUS_KM   radius used when a tool call omits one (1-50)

import * as path from "node:path";
import { z } from "zod";
import { MAX_RADIUS_KM, MIN_RADIUS_KM } from "./query.js";

export interface BiowebConfig {
  dataDir: string;
  batFile: string;
  herpFile: string;
  threatFile: string;
  defaultRadiusKm: number;
}

const nonBlank = (fallback: string) =>
  z
    .string()
    .trim()
    .optional()
    .transform((v) => (v ? v : fallback));

const envSchema = z.object({
  BIOWEB_DATA_DIR: nonBlank("."),
  BIOWEB_BAT_FILE: nonBlank("DOC_Bat_bioweb_data_2023.csv"),
  BIOWEB_HERP_FILE: nonBlank("DOC_Bioweb_Herpetofauna_data_2023.csv"),
  BIOWEB_THREAT_FILE: nonBlank("threat_status.csv"),
  BIOWEB_DEFAULT_RADIUS_KM: z.preprocess(
    (v) => (typeof v === "string" && v.trim() === "" ? undefined : v),
    z.coerce.number().int().min(MIN_RADIUS_KM).max(MAX_RADIUS_KM).default(25),
  ),
});

/** @throws {Error} naming each invalid variable */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): BiowebConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new Error(`Invalid configuration. ${problems.join("; ")}`);
  }
  const e = parsed.data;
  return {
    dataDir: path.resolve(e.BIOWEB_DATA_DIR),
    batFile: e.BIOWEB_BAT_FILE,
    herpFile: e.BIOWEB_HERP_FILE,
    threatFile: e.BIOWEB_THREAT_FILE,
    defaultRadiusKm: e.BIOWEB_DEFAULT_RADIUS_KM,
  };
}

/** Start-up variant of loadConfig: logs the problem to stderr and exits with status 1. */
export function loadConfigOrExit(env: NodeJS.ProcessEnv = process.env): BiowebConfig {
  try {
    return loadConfig(env);
  } catch (err) {
    console.error(`Configuration error: ${err instanceof Error ? err.message : String(err)}`);
    return process.exit(1);
  }
}
