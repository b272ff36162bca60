// ── Survey data loading ──────────────────────────────────────────────────────
//
// Reads the three source CSVs and normalizes them into a RecordStore:
//
//   Bat:     x/y -> longitude/latitude, day-first dates, roost flag 0/1.
//            Rows without coordinates, date or species are dropped, as are
//            rows whose species label is not one of the five known labels.
//   Herp:    x/y coordinates are required. Names and sighting types lose
//            stray quotes and whitespace; a blank sighting type becomes
//            "Undefined". Rows without coordinates, date or names are dropped.
//   Threat:  keyed on "Current Species Name".
//
// A file missing one of the columns its dataset is read from fails the load.

import * as fs from "node:fs/promises";
import * as path from "node:path";
import Papa from "papaparse";
import type { BiowebConfig } from "./config.js";
import { DataUnavailableError } from "./errors.js";
import {
  UNDEFINED_OBSERVATION_TYPE,
  UNKNOWN_THREAT,
  createRecordStore,
  isBatSpecies,
} from "./records.js";
import type { BatRecord, HerpRecord, RecordStore, ThreatStatusEntry } from "./records.js";

type CsvRow = Record<string, string | undefined>;

export interface ParsedBats {
  records: BatRecord[];
  /** Rows dropped for a missing coordinate, date or species. */
  incomplete: number;
  /** Labels of rows dropped for an unrecognized species, with their counts. */
  unrecognizedSpecies: Map<string, number>;
}

export interface ParsedHerps {
  records: HerpRecord[];
  /** Rows dropped for a missing coordinate, date or name. */
  incomplete: number;
}

const BAT_COLUMNS = ["x", "y", "date", "batspecies"];
const HERP_COLUMNS = ["observat_2", "scientific", "commonname"];
const THREAT_COLUMNS = ["Current Species Name", "Taxa", "Category", "Status"];

// ── Helpers ──────────────────────────────────────────────────────────────────

function parseCsv(content: string): { rows: CsvRow[]; fields: string[] } {
  const result = Papa.parse<CsvRow>(content, {
    header: true,
    skipEmptyLines: true,
    transformHeader: (h) => h.trim(),
  });
  const fatal = result.errors.find((e) => e.type === "Quotes");
  if (fatal) {
    throw new Error(`Malformed CSV at row ${fatal.row ?? "?"}: ${fatal.message}`);
  }
  return { rows: result.data, fields: result.meta.fields ?? [] };
}

function requireColumns(fields: readonly string[], required: readonly string[], dataset: string): void {
  const missing = required.filter((c) => !fields.includes(c));
  if (missing.length > 0) {
    throw new Error(`Required column(s) missing from ${dataset} data: ${missing.join(", ")}.`);
  }
}

/** Trimmed text with double quotes removed; "" for missing values. */
function cleanText(value: string | undefined): string {
  return (value ?? "").replace(/"/g, "").trim();
}

/** Parse a numeric value. Returns undefined for blank or non-finite input. */
function parseNum(value: string | undefined): number | undefined {
  if (value == null || value.trim() === "") return undefined;
  const n = Number(value.trim());
  return Number.isFinite(n) ? n : undefined;
}

function utcDate(year: number, month: number, day: number): number | undefined {
  const d = new Date(Date.UTC(year, month - 1, day));
  // Reject roll-overs such as 31/02
  if (d.getUTCFullYear() !== year || d.getUTCMonth() !== month - 1 || d.getUTCDate() !== day) {
    return undefined;
  }
  return d.getTime();
}

/** Two-digit years pivot like strptime's %y: 69-99 -> 1900s, 00-68 -> 2000s. */
function expandYear(text: string): number {
  const year = Number(text);
  if (text.length === 4) return year;
  return year < 69 ? 2000 + year : 1900 + year;
}

/**
 * Parse a survey date as epoch milliseconds at UTC midnight. Accepts year
 * first ("2021-03-14", "2021/03/14T10:00") or day first with a two- or
 * four-digit year ("14/03/2021", "14-03-21 10:30"). The time of day is dropped.
 */
export function parseSurveyDate(value: string | undefined): number | undefined {
  const s = cleanText(value);
  if (!s) return undefined;

  const yearFirst = s.match(/^(\d{4})([-/.])(\d{1,2})\2(\d{1,2})(?:[T\s].*)?$/);
  if (yearFirst) return utcDate(Number(yearFirst[1]), Number(yearFirst[3]), Number(yearFirst[4]));

  const dayFirst = s.match(/^(\d{1,2})([-/.])(\d{1,2})\2(\d{4}|\d{2})(?:\s.*)?$/);
  if (dayFirst) return utcDate(expandYear(dayFirst[4] ?? ""), Number(dayFirst[3]), Number(dayFirst[1]));

  return undefined;
}

function parseFlag(value: string | undefined): boolean {
  const s = cleanText(value).toLowerCase();
  return s === "true" || parseNum(s) === 1;
}

// ── Parsers ──────────────────────────────────────────────────────────────────

export function parseBatCsv(content: string): ParsedBats {
  const { rows, fields } = parseCsv(content);
  requireColumns(fields, BAT_COLUMNS, "bat");

  const records: BatRecord[] = [];
  const unrecognizedSpecies = new Map<string, number>();
  let incomplete = 0;

  for (const row of rows) {
    const lng = parseNum(row["x"]);
    const lat = parseNum(row["y"]);
    const observedOn = parseSurveyDate(row["date"]);
    const species = cleanText(row["batspecies"]);
    if (lat === undefined || lng === undefined || observedOn === undefined || !species) {
      incomplete++;
      continue;
    }

    if (!isBatSpecies(species)) {
      unrecognizedSpecies.set(species, (unrecognizedSpecies.get(species) ?? 0) + 1);
      continue;
    }

    records.push({
      species,
      location: { lat, lng },
      observedOn,
      isRoost: parseNum(row["roost"]) === 1,
      locationName: cleanText(row["locationna"]),
      numberOfPasses: cleanText(row["numberofpa"]),
      detectorType: cleanText(row["detectorty"]),
      nightsOut: cleanText(row["nightsout"]),
      surveyMethod: cleanText(row["surveymeth"]),
    });
  }
  return { records, incomplete, unrecognizedSpecies };
}

export function parseHerpCsv(content: string): ParsedHerps {
  const { rows, fields } = parseCsv(content);
  if (!fields.includes("x") || !fields.includes("y")) {
    throw new Error("Required 'x' and 'y' coordinate columns not found in Herpetofauna data.");
  }
  requireColumns(fields, HERP_COLUMNS, "Herpetofauna");

  const records: HerpRecord[] = [];
  let incomplete = 0;
  for (const row of rows) {
    const lng = parseNum(row["x"]);
    const lat = parseNum(row["y"]);
    const observedOn = parseSurveyDate(row["observat_2"]);
    const scientificName = cleanText(row["scientific"]);
    const commonName = cleanText(row["commonname"]);
    if (lat === undefined || lng === undefined || observedOn === undefined || !scientificName || !commonName) {
      incomplete++;
      continue;
    }

    records.push({
      scientificName,
      commonName,
      location: { lat, lng },
      observedOn,
      observationType: cleanText(row["sightingty"]) || UNDEFINED_OBSERVATION_TYPE,
      isVerified: parseFlag(row["recordveri"]),
      placeName: cleanText(row["placename"]),
      individualCount: cleanText(row["numberofin"]),
      identificationMethod: cleanText(row["identifica"]),
      ageInYears: cleanText(row["ageinyears"]),
    });
  }
  return { records, incomplete };
}

export function parseThreatStatusCsv(content: string): ThreatStatusEntry[] {
  const { rows, fields } = parseCsv(content);
  requireColumns(fields, THREAT_COLUMNS, "threat status");

  const entries: ThreatStatusEntry[] = [];
  for (const row of rows) {
    const scientificName = cleanText(row["Current Species Name"]);
    if (!scientificName) continue;
    entries.push({
      scientificName,
      taxaGroup: cleanText(row["Taxa"]) || UNKNOWN_THREAT,
      category: cleanText(row["Category"]) || UNKNOWN_THREAT,
      status: cleanText(row["Status"]) || UNKNOWN_THREAT,
    });
  }
  return entries;
}

// ── Public API ───────────────────────────────────────────────────────────────

async function exists(file: string): Promise<boolean> {
  try {
    await fs.access(file);
    return true;
  } catch {
    return false;
  }
}

/**
 * Load and normalize the three datasets from `config.dataDir`.
 *
 * @throws {DataUnavailableError} when a file is missing or cannot be parsed
 */
export async function loadRecordStore(config: BiowebConfig): Promise<RecordStore> {
  const names = [config.batFile, config.herpFile, config.threatFile];
  const missing: string[] = [];
  for (const name of names) {
    if (!(await exists(path.join(config.dataDir, name)))) missing.push(name);
  }
  if (missing.length > 0) {
    throw new DataUnavailableError(`Missing file(s): ${missing.join(", ")}.`);
  }

  try {
    const [batText, herpText, threatText] = await Promise.all([
      fs.readFile(path.join(config.dataDir, config.batFile), "utf8"),
      // The herpetofauna export is not UTF-8
      fs.readFile(path.join(config.dataDir, config.herpFile), "latin1"),
      fs.readFile(path.join(config.dataDir, config.threatFile), "utf8"),
    ]);

    const bats = parseBatCsv(batText);
    if (bats.incomplete > 0) {
      console.error(`Skipped ${bats.incomplete} bat record(s) missing coordinates, date or species`);
    }
    for (const [label, count] of bats.unrecognizedSpecies) {
      console.error(`Skipped ${count} bat record(s) with unrecognized species "${label}"`);
    }

    const herps = parseHerpCsv(herpText);
    if (herps.incomplete > 0) {
      console.error(`Skipped ${herps.incomplete} herpetofauna record(s) missing coordinates, date or names`);
    }

    return createRecordStore({
      bats: bats.records,
      herps: herps.records,
      threatStatus: parseThreatStatusCsv(threatText),
    });
  } catch (err) {
    throw new DataUnavailableError(
      `An error occurred during data loading or preprocessing: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err },
    );
  }
}
