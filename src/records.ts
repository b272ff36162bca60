// ── Survey records and the Record Store ──────────────────────────────────────
//
// The store is built once at start-up and frozen. Query code reads it and
// never writes back: per-query values such as distance live in wrappers
// (see proximity.ts).

import type { LatLng } from "./geo-math.js";

// ── Bat species labels ───────────────────────────────────────────────────────

export const LONG_TAILED_BAT = "Chalinolobus tuberculatus";
export const SHORT_TAILED_BAT = "Mystacina tuberculata";
export const BOTH_SPECIES_DETECTED = "Both species detected";
export const UNKNOWN_BAT_SPECIES = "Unknown bat species";
export const NO_BAT_DETECTED = "No bat species detected";

export type BatSpecies =
  | typeof LONG_TAILED_BAT
  | typeof SHORT_TAILED_BAT
  | typeof BOTH_SPECIES_DETECTED
  | typeof UNKNOWN_BAT_SPECIES
  | typeof NO_BAT_DETECTED;

export const BAT_SPECIES: readonly BatSpecies[] = [
  BOTH_SPECIES_DETECTED,
  LONG_TAILED_BAT,
  SHORT_TAILED_BAT,
  UNKNOWN_BAT_SPECIES,
  NO_BAT_DETECTED,
];

export function isBatSpecies(value: string): value is BatSpecies {
  return (BAT_SPECIES as readonly string[]).includes(value);
}

// ── Sentinels ────────────────────────────────────────────────────────────────

/** Observation type given to herp sightings with a blank type. */
export const UNDEFINED_OBSERVATION_TYPE = "Undefined";

/** Taxa group, category and status of a species missing from the threat register. */
export const UNKNOWN_THREAT = "unknown";

// ── Record types ─────────────────────────────────────────────────────────────

export interface BatRecord {
  species: BatSpecies;
  location: LatLng;
  /** Survey date as epoch milliseconds at UTC midnight. */
  observedOn: number;
  isRoost: boolean;
  // Carried through to the occurrence export unchanged.
  locationName: string;
  numberOfPasses: string;
  detectorType: string;
  nightsOut: string;
  surveyMethod: string;
}

export interface HerpRecord {
  scientificName: string;
  commonName: string;
  location: LatLng;
  /** Sighting date as epoch milliseconds at UTC midnight. */
  observedOn: number;
  observationType: string;
  isVerified: boolean;
  placeName: string;
  individualCount: string;
  identificationMethod: string;
  ageInYears: string;
}

export interface ThreatStatusEntry {
  scientificName: string;
  taxaGroup: string;
  category: string;
  status: string;
}

export interface RecordStore {
  readonly bats: readonly BatRecord[];
  readonly herps: readonly HerpRecord[];
  /** Keyed by scientific name; the first register entry for a name wins. */
  readonly threatStatus: ReadonlyMap<string, ThreatStatusEntry>;
}

// ── Construction ─────────────────────────────────────────────────────────────

/** Read-only view over a Map. The backing Map is not reachable from outside. */
class FrozenMap<K, V> implements ReadonlyMap<K, V> {
  readonly #entries: Map<K, V>;

  constructor(entries: Map<K, V>) {
    this.#entries = entries;
    Object.freeze(this);
  }

  get size(): number {
    return this.#entries.size;
  }

  get(key: K): V | undefined {
    return this.#entries.get(key);
  }

  has(key: K): boolean {
    return this.#entries.has(key);
  }

  forEach(callbackfn: (value: V, key: K, map: ReadonlyMap<K, V>) => void, thisArg?: unknown): void {
    this.#entries.forEach((value, key) => callbackfn.call(thisArg, value, key, this));
  }

  entries(): MapIterator<[K, V]> {
    return this.#entries.entries();
  }

  keys(): MapIterator<K> {
    return this.#entries.keys();
  }

  values(): MapIterator<V> {
    return this.#entries.values();
  }

  [Symbol.iterator](): MapIterator<[K, V]> {
    return this.#entries[Symbol.iterator]();
  }
}

function freezeAll<T extends { location: LatLng }>(records: readonly T[]): readonly T[] {
  return Object.freeze(
    records.map((r) => Object.freeze({ ...r, location: Object.freeze({ ...r.location }) })),
  );
}

export function createRecordStore(input: {
  bats: readonly BatRecord[];
  herps: readonly HerpRecord[];
  threatStatus: readonly ThreatStatusEntry[];
}): RecordStore {
  const threatStatus = new Map<string, ThreatStatusEntry>();
  for (const entry of input.threatStatus) {
    if (!threatStatus.has(entry.scientificName)) {
      threatStatus.set(entry.scientificName, Object.freeze({ ...entry }));
    }
  }
  return Object.freeze({
    bats: freezeAll(input.bats),
    herps: freezeAll(input.herps),
    threatStatus: new FrozenMap(threatStatus),
  });
}
