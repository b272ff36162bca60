// ── Herpetofauna summary ─────────────────────────────────────────────────────
//
// One row per species seen within the radius, joined against the threat
// register and sorted by taxa group, threat category, threat status, then
// scientific name.
//
// "Most recent sighting" and the all-time nearest record come from the
// in-radius sightings. The 2013-2023 and 2018-2023 nearest records search the
// whole dataset, so they can point outside the radius.

import { UNKNOWN_THREAT } from "./records.js";
import type { HerpRecord, RecordStore } from "./records.js";
import {
  CATEGORY_ORDER,
  STATUS_ORDER,
  TAXA_ORDER,
  compareBy,
  priorityIndex,
} from "./priority.js";
import {
  YEARS_2013_TO_2023,
  YEARS_2018_TO_2023,
  annotateDistances,
  describeNearest,
  withinRadius,
} from "./proximity.js";
import type { Located, UserQuery } from "./proximity.js";

// ── Types ────────────────────────────────────────────────────────────────────

export interface ObservationTypeCount {
  type: string;
  count: number;
}

export interface ThreatAssessment {
  taxaGroup: string;
  category: string;
  status: string;
  /** "Threatened", or "At Risk - Declining" when category and status differ. */
  display: string;
}

export interface HerpSpeciesRow {
  scientificName: string;
  commonName: string;
  threat: ThreatAssessment;
  /** Most frequent first; ties keep first-seen order. */
  observationTypes: ObservationTypeCount[];
  totalObservations: number;
  /** dd/mm/yyyy */
  mostRecentSighting: string;
  nearestAllTime: string;
  nearest2013To2023: string;
  nearest2018To2023: string;
}

export type HerpSummary =
  | { kind: "empty"; radiusKm: number; uniqueSpeciesCount: 0; message: string }
  | { kind: "found"; radiusKm: number; uniqueSpeciesCount: number; rows: HerpSpeciesRow[] };

// ── Helpers ──────────────────────────────────────────────────────────────────

const UNKNOWN_ASSESSMENT: ThreatAssessment = {
  taxaGroup: UNKNOWN_THREAT,
  category: UNKNOWN_THREAT,
  status: UNKNOWN_THREAT,
  display: UNKNOWN_THREAT,
};

export function assessThreat(store: RecordStore, scientificName: string): ThreatAssessment {
  const entry = store.threatStatus.get(scientificName);
  if (!entry) return UNKNOWN_ASSESSMENT;
  const { taxaGroup, category, status } = entry;
  return {
    taxaGroup,
    category,
    status,
    display: category === status ? category : `${category} - ${status}`,
  };
}

export function tallyObservationTypes(records: readonly HerpRecord[]): ObservationTypeCount[] {
  const counts = new Map<string, number>();
  for (const r of records) counts.set(r.observationType, (counts.get(r.observationType) ?? 0) + 1);
  return [...counts.entries()]
    .map(([type, count]) => ({ type, count }))
    .sort((a, b) => b.count - a.count);
}

const pad2 = (n: number) => String(n).padStart(2, "0");

export function formatSightingDate(observedOn: number | undefined): string {
  if (observedOn === undefined) return "No records found";
  const date = new Date(observedOn);
  return `${pad2(date.getUTCDate())}/${pad2(date.getUTCMonth() + 1)}/${date.getUTCFullYear()}`;
}

function latestDate(records: readonly HerpRecord[]): number | undefined {
  let latest: number | undefined;
  for (const r of records) {
    if (latest === undefined || r.observedOn > latest) latest = r.observedOn;
  }
  return latest;
}

/** Group located sightings by scientific name, keeping dataset order within each group. */
function groupByName(located: readonly Located<HerpRecord>[]): Map<string, Located<HerpRecord>[]> {
  const groups = new Map<string, Located<HerpRecord>[]>();
  for (const l of located) {
    const group = groups.get(l.record.scientificName);
    if (group) group.push(l);
    else groups.set(l.record.scientificName, [l]);
  }
  return groups;
}

export const compareHerpRows = compareBy<HerpSpeciesRow>(
  (row) => priorityIndex(TAXA_ORDER, row.threat.taxaGroup),
  (row) => priorityIndex(CATEGORY_ORDER, row.threat.category),
  (row) => priorityIndex(STATUS_ORDER, row.threat.status),
  (row) => row.scientificName,
);

function buildSpeciesRow(
  store: RecordStore,
  query: UserQuery,
  scientificName: string,
  inRadius: readonly Located<HerpRecord>[],
  everywhere: readonly Located<HerpRecord>[],
): HerpSpeciesRow {
  const records = inRadius.map((l) => l.record);
  const { origin } = query;

  return {
    scientificName,
    commonName: records[0]?.commonName ?? "",
    threat: assessThreat(store, scientificName),
    observationTypes: tallyObservationTypes(records),
    totalObservations: records.length,
    mostRecentSighting: formatSightingDate(latestDate(records)),
    nearestAllTime: describeNearest(inRadius, origin),
    nearest2013To2023: describeNearest(everywhere, origin, { window: YEARS_2013_TO_2023 }),
    nearest2018To2023: describeNearest(everywhere, origin, { window: YEARS_2018_TO_2023 }),
  };
}

// ── Public API ───────────────────────────────────────────────────────────────

export function summarizeHerps(store: RecordStore, query: UserQuery): HerpSummary {
  const located = annotateDistances(store.herps, query.origin);
  const inRadius = withinRadius(located, query.radiusKm);

  const inRadiusByName = groupByName(inRadius);
  const species = [...inRadiusByName.keys()].sort();
  if (species.length === 0) {
    return {
      kind: "empty",
      radiusKm: query.radiusKm,
      uniqueSpeciesCount: 0,
      message: `No herpetofauna records found within ${query.radiusKm} km.`,
    };
  }

  const everywhereByName = groupByName(located);
  const rows = species.map((name) =>
    buildSpeciesRow(store, query, name, inRadiusByName.get(name) ?? [], everywhereByName.get(name) ?? []),
  );

  return {
    kind: "found",
    radiusKm: query.radiusKm,
    uniqueSpeciesCount: species.length,
    rows: rows.sort(compareHerpRows),
  };
}
