import type { DataTable } from '@mobforge/core';
import { stringifyToml, toDataValue, isTable } from '@mobforge/core';
import { behaviorNodeToValue } from '@mobforge/behavior';
import type { MobAsset } from './schema';

function withoutUndefined(raw: unknown): unknown {
  if (Array.isArray(raw)) return raw.map(withoutUndefined);
  if (typeof raw === 'object' && raw !== null) {
    return Object.fromEntries(
      Object.entries(raw)
        .filter(([, value]) => value !== undefined)
        .map(([key, value]) => [key, withoutUndefined(value)]),
    );
  }
  return raw;
}

/** Convert a mob back to its authored form, every field written out. */
export function mobAssetToValue(mob: MobAsset): DataTable {
  const { behavior, ...fields } = mob;
  const value = toDataValue(withoutUndefined(fields));
  if (!isTable(value)) throw new TypeError('mob definition did not convert to a table');
  if (behavior) value.behavior = behaviorNodeToValue(behavior);
  return value;
}

export function serializeMob(mob: MobAsset): string {
  return stringifyToml(mobAssetToValue(mob));
}
