// ── Query parsing and execution ──────────────────────────────────────────────

import { z } from "zod";
import { ValidationError } from "./errors.js";
import { summarizeBats } from "./bat-summary.js";
import type { BatSummary } from "./bat-summary.js";
import { summarizeHerps } from "./herp-summary.js";
import type { HerpSummary } from "./herp-summary.js";
import type { RecordStore } from "./records.js";
import type { UserQuery } from "./proximity.js";

export const MIN_RADIUS_KM = 1;
export const MAX_RADIUS_KM = 50;

export const INVALID_COORDINATES_MESSAGE =
  "Invalid coordinates. Please use the format 'latitude, longitude' e.g., -40.298, 175.754";
export const INVALID_RADIUS_MESSAGE = `Radius must be between ${MIN_RADIUS_KM} and ${MAX_RADIUS_KM} km.`;

/** Plain decimal degrees: optional sign, digits, optional fraction. */
const DECIMAL = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)$/;

const latitude = z.number().finite().min(-90).max(90);
const longitude = z.number().finite().min(-180).max(180);
export const radiusSchema = z.number().int().min(MIN_RADIUS_KM).max(MAX_RADIUS_KM);

/** Parse "lat, lng" text. Returns undefined for anything else. */
export function parseCoordinates(text: string): { lat: number; lng: number } | undefined {
  const parts = text.split(",");
  if (parts.length !== 2) return undefined;
  const [latText, lngText] = parts.map((p) => p.trim());
  if (!latText || !lngText || !DECIMAL.test(latText) || !DECIMAL.test(lngText)) return undefined;
  const lat = latitude.safeParse(Number(latText));
  const lng = longitude.safeParse(Number(lngText));
  if (!lat.success || !lng.success) return undefined;
  return { lat: lat.data, lng: lng.data };
}

/**
 * Validate a submitted coordinate string and radius.
 *
 * @throws {ValidationError} with the submitted values attached
 */
export function parseQuery(input: { coords: string; radius: number | string }): UserQuery {
  const submitted = { coords: input.coords, radius: String(input.radius) };

  const origin = parseCoordinates(input.coords);
  if (!origin) throw new ValidationError(INVALID_COORDINATES_MESSAGE, submitted);

  const radiusValue = typeof input.radius === "number" ? input.radius : Number(input.radius.trim());
  const radius = radiusSchema.safeParse(radiusValue);
  if (!radius.success) throw new ValidationError(INVALID_RADIUS_MESSAGE, submitted);

  return { origin, radiusKm: radius.data };
}

export interface QueryResult {
  bats: BatSummary;
  herps: HerpSummary;
}

/** Summarize both datasets around the query origin. */
export function runQuery(store: RecordStore, query: UserQuery): QueryResult {
  return {
    bats: summarizeBats(store, query),
    herps: summarizeHerps(store, query),
  };
}
