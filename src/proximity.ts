// ── Distance annotation, radius filtering and nearest-record lookups ─────────
//
// Every query annotates a fresh set of wrappers; stored records are never
// modified, so two queries cannot see each other's distances.

import { bearingDirection, geodesicDistanceKm } from "./geo-math.js";
import type { CompassDirection, LatLng } from "./geo-math.js";

export interface Located<T> {
  record: T;
  distanceKm: number;
}

export interface UserQuery {
  origin: LatLng;
  /** Whole kilometers, 1-50. */
  radiusKm: number;
}

export interface TimeWindow {
  /** Appended to "not found" messages, e.g. "2018-2023". Empty for all time. */
  label: string;
  /** Inclusive bounds as UTC timestamps. */
  start?: number;
  end?: number;
}

export const ALL_TIME: TimeWindow = { label: "" };

export const YEARS_2013_TO_2023: TimeWindow = {
  label: "2013-2023",
  start: Date.UTC(2013, 0, 1),
  end: Date.UTC(2023, 11, 31),
};

export const YEARS_2018_TO_2023: TimeWindow = {
  label: "2018-2023",
  start: Date.UTC(2018, 0, 1),
  end: Date.UTC(2023, 11, 31),
};

/** Pair every record with its distance from `origin`. Full scan, O(N). */
export function annotateDistances<T extends { location: LatLng }>(
  records: readonly T[],
  origin: LatLng,
): Located<T>[] {
  return records.map((record) => ({ record, distanceKm: geodesicDistanceKm(origin, record.location) }));
}

export function withinRadius<T>(located: readonly Located<T>[], radiusKm: number): Located<T>[] {
  return located.filter((l) => l.distanceKm <= radiusKm);
}

/** `observedOn` is epoch milliseconds (UTC). */
export function inWindow(observedOn: number, window: TimeWindow): boolean {
  if (window.start !== undefined && observedOn < window.start) return false;
  if (window.end !== undefined && observedOn > window.end) return false;
  return true;
}

/** Closest entry, or undefined for an empty pool. Ties go to the earliest entry. */
export function findNearest<T>(pool: readonly Located<T>[]): Located<T> | undefined {
  let best: Located<T> | undefined;
  for (const candidate of pool) {
    if (best === undefined || candidate.distanceKm < best.distanceKm) best = candidate;
  }
  return best;
}

export interface NearestOptions {
  window?: TimeWindow;
  /** Noun used in the "No … found" message. */
  noun?: "records" | "roosts";
}

/**
 * Render the nearest entry of `pool` inside `window` as "12.3 km northeast",
 * or "No records found for 2018-2023" when nothing qualifies.
 */
export function describeNearest<T extends { location: LatLng; observedOn: number }>(
  pool: readonly Located<T>[],
  origin: LatLng,
  { window = ALL_TIME, noun = "records" }: NearestOptions = {},
): string {
  const nearest = findNearest(pool.filter((l) => inWindow(l.record.observedOn, window)));
  if (!nearest) {
    return window.label ? `No ${noun} found for ${window.label}` : `No ${noun} found`;
  }
  return formatDistance(nearest.distanceKm, bearingDirection(origin, nearest.record.location));
}

export function formatDistance(distanceKm: number, direction: CompassDirection): string {
  return `${distanceKm.toFixed(1)} km ${direction}`;
}
