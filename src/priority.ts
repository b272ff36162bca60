// ── Fixed sort orders ────────────────────────────────────────────────────────

import { BAT_SPECIES } from "./records.js";

export const TAXA_ORDER = ["Amphibian", "Reptile", "unknown"] as const;

export const CATEGORY_ORDER = [
  "Threatened",
  "At Risk",
  "Not Threatened",
  "Non-resident Native",
  "Introduced and Naturalised",
  "Extinct",
  "unknown",
] as const;

export const STATUS_ORDER = [
  "Nationally Critical",
  "Nationally Endangered",
  "Nationally Vulnerable",
  "Nationally Increasing",
  "Declining",
  "Relict",
  "Uncommon",
  "Recovering",
  "Migrant",
  "Vagrant",
  "Coloniser",
  "Introduced and Naturalised",
  "Extinct",
  "unknown",
] as const;

/** Order of bat labels in the occurrence export. */
export const BAT_EXPORT_ORDER = BAT_SPECIES;

/**
 * Position of `value` in `order`. Values that are not listed rank after
 * every listed value.
 */
export function priorityIndex(order: readonly string[], value: string): number {
  const idx = order.indexOf(value);
  return idx === -1 ? order.length : idx;
}

/** Comparator over several keys, each compared in turn until one differs. */
export function compareBy<T>(...keys: Array<(item: T) => number | string>) {
  return (a: T, b: T): number => {
    for (const key of keys) {
      const ka = key(a);
      const kb = key(b);
      if (ka < kb) return -1;
      if (ka > kb) return 1;
    }
    return 0;
  };
}
