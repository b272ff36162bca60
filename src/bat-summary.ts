// ── Bat monitoring summary ───────────────────────────────────────────────────

import {
  BOTH_SPECIES_DETECTED,
  LONG_TAILED_BAT,
  NO_BAT_DETECTED,
  SHORT_TAILED_BAT,
  UNKNOWN_BAT_SPECIES,
} from "./records.js";
import type { BatRecord, BatSpecies, RecordStore } from "./records.js";
import {
  YEARS_2013_TO_2023,
  YEARS_2018_TO_2023,
  annotateDistances,
  describeNearest,
  withinRadius,
} from "./proximity.js";
import type { Located, UserQuery } from "./proximity.js";

// ── Types ────────────────────────────────────────────────────────────────────

export interface BatCounts {
  /** Monitoring events in radius, with dual detections counted twice. */
  totalEvents: number;
  positiveDetections: number;
  chalinolobusTuberculatus: number;
  mystacinaTuberculata: number;
  unknownBatSpecies: number;
  chalinolobusTuberculatusRoosts: number;
  mystacinaTuberculataRoosts: number;
}

export interface BatSpeciesRow {
  species: BatSpecies;
  allTimeNearestRecord: string;
  nearestRecord2013To2023: string;
  nearestRecord2018To2023: string;
  allTimeNearestRoost: string;
  nearestRoost2013To2023: string;
  nearestRoost2018To2023: string;
}

export interface BatSummary {
  radiusKm: number;
  counts: BatCounts;
  /** Long-tailed, short-tailed, then unknown species when any were counted. */
  rows: BatSpeciesRow[];
}

// ── Counting ─────────────────────────────────────────────────────────────────

/**
 * A "Both species detected" event stands for one detection of each species.
 * Only the counts see this expansion; nearest-record lookups use the events
 * as recorded.
 */
export function expandDualDetections(located: readonly Located<BatRecord>[]): Located<BatRecord>[] {
  const expanded: Located<BatRecord>[] = [];
  for (const l of located) {
    if (l.record.species === BOTH_SPECIES_DETECTED) {
      expanded.push(
        { ...l, record: { ...l.record, species: LONG_TAILED_BAT } },
        { ...l, record: { ...l.record, species: SHORT_TAILED_BAT } },
      );
    } else {
      expanded.push(l);
    }
  }
  return expanded;
}

export function countBats(inRadius: readonly Located<BatRecord>[]): BatCounts {
  const count = (species: BatSpecies, roostOnly = false) =>
    inRadius.filter((l) => l.record.species === species && (!roostOnly || l.record.isRoost)).length;

  return {
    totalEvents: inRadius.length,
    positiveDetections: inRadius.filter((l) => l.record.species !== NO_BAT_DETECTED).length,
    chalinolobusTuberculatus: count(LONG_TAILED_BAT),
    mystacinaTuberculata: count(SHORT_TAILED_BAT),
    unknownBatSpecies: count(UNKNOWN_BAT_SPECIES),
    chalinolobusTuberculatusRoosts: count(LONG_TAILED_BAT, true),
    mystacinaTuberculataRoosts: count(SHORT_TAILED_BAT, true),
  };
}

// ── Nearest-record table ─────────────────────────────────────────────────────

function buildSpeciesRow(
  species: BatSpecies,
  located: readonly Located<BatRecord>[],
  query: UserQuery,
): BatSpeciesRow {
  const records = located.filter((l) => l.record.species === species);
  const roosts = records.filter((l) => l.record.isRoost);
  const { origin } = query;

  return {
    species,
    allTimeNearestRecord: describeNearest(records, origin),
    nearestRecord2013To2023: describeNearest(records, origin, { window: YEARS_2013_TO_2023 }),
    nearestRecord2018To2023: describeNearest(records, origin, { window: YEARS_2018_TO_2023 }),
    allTimeNearestRoost: describeNearest(roosts, origin, { noun: "roosts" }),
    nearestRoost2013To2023: describeNearest(roosts, origin, { window: YEARS_2013_TO_2023, noun: "roosts" }),
    nearestRoost2018To2023: describeNearest(roosts, origin, { window: YEARS_2018_TO_2023, noun: "roosts" }),
  };
}

// ── Public API ───────────────────────────────────────────────────────────────

export function summarizeBats(store: RecordStore, query: UserQuery): BatSummary {
  const located = annotateDistances(store.bats, query.origin);
  const counts = countBats(withinRadius(expandDualDetections(located), query.radiusKm));

  const tableSpecies: BatSpecies[] = [LONG_TAILED_BAT, SHORT_TAILED_BAT];
  if (counts.unknownBatSpecies > 0) tableSpecies.push(UNKNOWN_BAT_SPECIES);

  return {
    radiusKm: query.radiusKm,
    counts,
    rows: tableSpecies.map((species) => buildSpeciesRow(species, located, query)),
  };
}
