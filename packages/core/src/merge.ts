/**
 * Hierarchical merger: overlays one generic value onto another.
 *
 * Tables merge key by key, recursively. Every other pairing is a wholesale
 * replacement: arrays are replaced, never concatenated or merged by index.
 * An author changing one array element repeats the whole array.
 */

import type { DataTable, DataValue } from './value';
import { cloneValue, isTable, setEntry } from './value';

/**
 * Merge `override` onto `base`, returning the result.
 * Neither argument is mutated.
 */
export function mergeValues(base: DataValue, override: DataValue): DataValue {
  if (isTable(base) && isTable(override)) {
    const result = cloneValue(base);
    mergeInto(result, override);
    return result;
  }
  return cloneValue(override);
}

/**
 * In-place form: overlay `override` onto the table `base`.
 * Keys absent from `base` are inserted as copies of the override entry.
 */
export function mergeInto(base: DataTable, override: DataTable): void {
  for (const [key, value] of Object.entries(override)) {
    const existing = Object.hasOwn(base, key) ? base[key] : undefined;
    if (isTable(existing) && isTable(value)) {
      mergeInto(existing, value);
    } else {
      setEntry(base, key, cloneValue(value));
    }
  }
}
