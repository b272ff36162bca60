// ── Display projections and text rendering ───────────────────────────────────

import type { BatSpeciesRow, BatSummary } from "./bat-summary.js";
import type { HerpSpeciesRow, HerpSummary, ObservationTypeCount } from "./herp-summary.js";
import type { QueryResult } from "./query.js";

// ── Types ────────────────────────────────────────────────────────────────────

/** CSS class that highlights a threat-status cell. */
export type ThreatHighlight =
  | "threatened-bg"
  | "at-risk-bg"
  | "not-threatened-bg"
  | "non-resident-native-bg"
  | "extinct-text-color"
  | "unknown-text-color";

export type BatDisplayRow = BatSpeciesRow;

export interface HerpDisplayRow {
  taxaGroup: string;
  scientificName: string;
  commonName: string;
  threatStatus: string;
  /** null for "Introduced and Naturalised" and unlisted categories. */
  threatHighlight: ThreatHighlight | null;
  observationTypeHtml: string;
  mostRecentSighting: string;
  nearestAllTime: string;
  nearest2013To2023: string;
  nearest2018To2023: string;
}

// ── Helpers ──────────────────────────────────────────────────────────────────

const THREAT_HIGHLIGHTS: Readonly<Record<string, ThreatHighlight>> = {
  Threatened: "threatened-bg",
  "At Risk": "at-risk-bg",
  "Not Threatened": "not-threatened-bg",
  "Non-resident Native": "non-resident-native-bg",
  Extinct: "extinct-text-color",
  unknown: "unknown-text-color",
};

export function threatHighlight(category: string): ThreatHighlight | null {
  return Object.hasOwn(THREAT_HIGHLIGHTS, category) ? (THREAT_HIGHLIGHTS[category] ?? null) : null;
}

export function escapeHtml(input: string): string {
  return input
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

/** "Incidental (2), Survey (1)" */
export function formatObservationTypes(types: readonly ObservationTypeCount[]): string {
  return types.map(({ type, count }) => `${type} (${count})`).join(", ");
}

/** Observation-type tally followed by a bold total, for an HTML table cell. */
export function observationTypeHtml(types: readonly ObservationTypeCount[], total: number): string {
  const totalHtml = `<b>Total</b> (${total})`;
  if (types.length === 0) return totalHtml;
  const tally = types.map(({ type, count }) => `${escapeHtml(type)} (${count})`).join(", ");
  return `${tally}<br>&nbsp;<br>${totalHtml}`;
}

// ── Display rows ─────────────────────────────────────────────────────────────

export function batDisplayRows(summary: BatSummary): BatDisplayRow[] {
  return summary.rows.map((row) => ({ ...row }));
}

export function herpDisplayRow(row: HerpSpeciesRow): HerpDisplayRow {
  return {
    taxaGroup: escapeHtml(row.threat.taxaGroup),
    scientificName: escapeHtml(row.scientificName),
    commonName: escapeHtml(row.commonName),
    threatStatus: escapeHtml(row.threat.display),
    threatHighlight: threatHighlight(row.threat.category),
    observationTypeHtml: observationTypeHtml(row.observationTypes, row.totalObservations),
    mostRecentSighting: row.mostRecentSighting,
    nearestAllTime: row.nearestAllTime,
    nearest2013To2023: row.nearest2013To2023,
    nearest2018To2023: row.nearest2018To2023,
  };
}

export function herpDisplayRows(summary: HerpSummary): HerpDisplayRow[] {
  return summary.kind === "found" ? summary.rows.map(herpDisplayRow) : [];
}

// ── Plain-text summary ───────────────────────────────────────────────────────

function formatBatSection(summary: BatSummary): string[] {
  const { counts, radiusKm } = summary;
  const lines = [
    `Bat monitoring within ${radiusKm} km:`,
    `  Total monitoring events: ${counts.totalEvents}`,
    `  Positive bat detections: ${counts.positiveDetections}`,
    `  Chalinolobus tuberculatus (long-tailed) count: ${counts.chalinolobusTuberculatus} (including ${counts.chalinolobusTuberculatusRoosts} roosts)`,
    `  Mystacina tuberculata (short-tailed) count: ${counts.mystacinaTuberculata} (including ${counts.mystacinaTuberculataRoosts} roosts)`,
  ];
  if (counts.unknownBatSpecies > 0) {
    lines.push(`  Unknown bat species count: ${counts.unknownBatSpecies}`);
  }
  lines.push("", "Nearest bat records (full dataset):");
  for (const row of batDisplayRows(summary)) {
    lines.push(
      `  ${row.species}`,
      `    All time nearest record: ${row.allTimeNearestRecord}`,
      `    Nearest record 2013 to 2023: ${row.nearestRecord2013To2023}`,
      `    Nearest record 2018 to 2023: ${row.nearestRecord2018To2023}`,
      `    All time nearest roost: ${row.allTimeNearestRoost}`,
      `    Nearest roost 2013 to 2023: ${row.nearestRoost2013To2023}`,
      `    Nearest roost 2018 to 2023: ${row.nearestRoost2018To2023}`,
    );
  }
  return lines;
}

function formatHerpSection(summary: HerpSummary): string[] {
  const lines = [
    `Herpetofauna within ${summary.radiusKm} km:`,
    `  Unique species count: ${summary.uniqueSpeciesCount}`,
  ];
  if (summary.kind === "empty") {
    lines.push(`  ${summary.message}`);
    return lines;
  }
  for (const row of summary.rows) {
    const types = formatObservationTypes(row.observationTypes);
    lines.push(
      "",
      `  ${row.scientificName} (${row.commonName})`,
      `    Taxa group: ${row.threat.taxaGroup}`,
      `    Threat status: ${row.threat.display}`,
      `    Observation types: ${types ? `${types}; ` : ""}total ${row.totalObservations}`,
      `    Most recent sighting within ${summary.radiusKm} km: ${row.mostRecentSighting}`,
      `    Nearest record (all time): ${row.nearestAllTime}`,
      `    Nearest record 2013 to 2023: ${row.nearest2013To2023}`,
      `    Nearest record 2018 to 2023: ${row.nearest2018To2023}`,
    );
  }
  return lines;
}

/** Both summaries as plain text, bats first. */
export function formatSummaryText(result: QueryResult): string {
  return [...formatBatSection(result.bats), "", ...formatHerpSection(result.herps)].join("\n");
}
