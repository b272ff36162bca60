// ── Flat export rows and CSV output ──────────────────────────────────────────
//
// Column names follow the survey datasets' own field names, so exported
// sheets line up with the source layers.

import Papa from "papaparse";
import { bearingDirection } from "./geo-math.js";
import type { LatLng } from "./geo-math.js";
import { summarizeBats } from "./bat-summary.js";
import type { BatSummary } from "./bat-summary.js";
import { summarizeHerps } from "./herp-summary.js";
import type { HerpSummary } from "./herp-summary.js";
import { BAT_EXPORT_ORDER, compareBy, priorityIndex } from "./priority.js";
import { annotateDistances, withinRadius } from "./proximity.js";
import type { Located, UserQuery } from "./proximity.js";
import type { BatRecord, HerpRecord, RecordStore } from "./records.js";
import { formatObservationTypes } from "./report.js";

// ── Types ────────────────────────────────────────────────────────────────────

export interface ExportTable {
  header: string[];
  rows: string[][];
}

export const EXPORT_KINDS = ["bat_occurrences", "bat_summary", "herp_occurrences", "herp_summary"] as const;

export type ExportKind = (typeof EXPORT_KINDS)[number];

export interface ExportFile {
  filename: string;
  csv: string;
}

// ── Column sets ──────────────────────────────────────────────────────────────

export const BAT_OCCURRENCE_COLUMNS = [
  "batspecies",
  "locationna",
  "roost",
  "date",
  "numberofpa",
  "detectorty",
  "nightsout",
  "surveymeth",
  "Longitude",
  "Latitude",
  "Lat_Long_Combined",
  "distance_km",
  "direction",
];

export const HERP_OCCURRENCE_COLUMNS = [
  "scientific_name",
  "common_name",
  "recordveri",
  "date",
  "placename",
  "sightingty",
  "numberofin",
  "identifica",
  "ageinyears",
  "Longitude",
  "Latitude",
  "Lat_Long_Combined",
  "distance_km",
  "direction",
];

export const BAT_SUMMARY_COLUMNS = [
  "Species",
  "All time nearest record",
  "Nearest record 2013 to 2023",
  "Nearest record 2018 to 2023",
  "All time nearest roost",
  "Nearest roost 2013 to 2023",
  "Nearest roost 2018 to 2023",
];

export function herpSummaryColumns(radiusKm: number): string[] {
  return [
    "Taxa Group",
    "Species",
    "Common Name",
    "Threat Status",
    "Observation Type Summary",
    "Total Observations",
    `Most recent sighting within ${radiusKm} km`,
    "Nearest Record (all time)",
    "Nearest Record 2013 to 2023",
    "Nearest Record 2018 to 2023",
  ];
}

// ── Field formatting ─────────────────────────────────────────────────────────

/** Floats keep a decimal point even when whole: 175 -> "175.0". */
export function formatFloat(n: number): string {
  return Number.isInteger(n) ? n.toFixed(1) : String(n);
}

export const formatBool = (b: boolean) => (b ? "True" : "False");

/** yyyy-mm-dd */
export function formatIsoDate(observedOn: number): string {
  return new Date(observedOn).toISOString().slice(0, 10);
}

function locationFields(location: LatLng): string[] {
  const lng = formatFloat(location.lng);
  const lat = formatFloat(location.lat);
  return [lng, lat, `${lat}, ${lng}`];
}

// ── Export rows ──────────────────────────────────────────────────────────────

function inRadius<T extends { location: LatLng }>(records: readonly T[], query: UserQuery): Located<T>[] {
  return withinRadius(annotateDistances(records, query.origin), query.radiusKm);
}

/** Bat events in radius as recorded (dual detections are not split). */
export function batOccurrenceTable(store: RecordStore, query: UserQuery): ExportTable {
  const located = inRadius(store.bats, query).sort(
    compareBy<Located<BatRecord>>(
      (l) => priorityIndex(BAT_EXPORT_ORDER, l.record.species),
      (l) => l.distanceKm,
    ),
  );
  return {
    header: [...BAT_OCCURRENCE_COLUMNS],
    rows: located.map(({ record, distanceKm }) => [
      record.species,
      record.locationName,
      formatBool(record.isRoost),
      formatIsoDate(record.observedOn),
      record.numberOfPasses,
      record.detectorType,
      record.nightsOut,
      record.surveyMethod,
      ...locationFields(record.location),
      formatFloat(distanceKm),
      bearingDirection(query.origin, record.location),
    ]),
  };
}

export function herpOccurrenceTable(store: RecordStore, query: UserQuery): ExportTable {
  const located = inRadius(store.herps, query).sort(
    compareBy<Located<HerpRecord>>(
      (l) => l.record.scientificName,
      (l) => l.distanceKm,
    ),
  );
  return {
    header: [...HERP_OCCURRENCE_COLUMNS],
    rows: located.map(({ record, distanceKm }) => [
      record.scientificName,
      record.commonName,
      formatBool(record.isVerified),
      formatIsoDate(record.observedOn),
      record.placeName,
      record.observationType,
      record.individualCount,
      record.identificationMethod,
      record.ageInYears,
      ...locationFields(record.location),
      formatFloat(distanceKm),
      bearingDirection(query.origin, record.location),
    ]),
  };
}

export function batSummaryTable(summary: BatSummary): ExportTable {
  return {
    header: [...BAT_SUMMARY_COLUMNS],
    rows: summary.rows.map((row) => [
      row.species,
      row.allTimeNearestRecord,
      row.nearestRecord2013To2023,
      row.nearestRecord2018To2023,
      row.allTimeNearestRoost,
      row.nearestRoost2013To2023,
      row.nearestRoost2018To2023,
    ]),
  };
}

export function herpSummaryTable(summary: HerpSummary): ExportTable {
  return {
    header: herpSummaryColumns(summary.radiusKm),
    rows:
      summary.kind === "found"
        ? summary.rows.map((row) => [
            row.threat.taxaGroup,
            row.scientificName,
            row.commonName,
            row.threat.display,
            formatObservationTypes(row.observationTypes),
            String(row.totalObservations),
            row.mostRecentSighting,
            row.nearestAllTime,
            row.nearest2013To2023,
            row.nearest2018To2023,
          ])
        : [],
  };
}

// ── CSV ──────────────────────────────────────────────────────────────────────

/**
 * Comma-separated, "\n" line endings, exactly one trailing newline, quoting
 * only where needed. A table without rows is just its header line.
 */
export function toCsv(table: ExportTable): string {
  const body = Papa.unparse({ fields: table.header, data: table.rows }, { newline: "\n" });
  return body.replace(/\n*$/, "\n");
}

/**
 * Build one of the four downloads for a query. Returns null when there is
 * nothing to export (the herp summary with no species in radius).
 */
export function buildExport(store: RecordStore, query: UserQuery, kind: ExportKind): ExportFile | null {
  const r = query.radiusKm;
  switch (kind) {
    case "bat_occurrences":
      return { filename: `bat_data_occurrences_within_${r}km.csv`, csv: toCsv(batOccurrenceTable(store, query)) };
    case "bat_summary":
      return {
        filename: `bat_summary_data_within_${r}km.csv`,
        csv: toCsv(batSummaryTable(summarizeBats(store, query))),
      };
    case "herp_occurrences":
      return {
        filename: `herpetofauna_data_occurrences_within_${r}km.csv`,
        csv: toCsv(herpOccurrenceTable(store, query)),
      };
    case "herp_summary": {
      const summary = summarizeHerps(store, query);
      if (summary.kind === "empty") return null;
      return { filename: `herpetofauna_summary_data_within_${r}km.csv`, csv: toCsv(herpSummaryTable(summary)) };
    }
  }
}
