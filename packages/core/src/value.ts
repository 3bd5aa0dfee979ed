/**
 * Generic value model.
 *
 * The structured-data substrate shared by the merger, the definition
 * resolver and the tree editor: tables, arrays, strings, numbers and
 * booleans. Integers and floats are both `number`.
 */

import { MobParseError } from './errors';

export type DataValue = string | number | boolean | DataValue[] | DataTable;

export interface DataTable {
  [key: string]: DataValue;
}

export function isTable(value: DataValue | undefined): value is DataTable {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isArray(value: DataValue | undefined): value is DataValue[] {
  return Array.isArray(value);
}

/**
 * Narrow a freshly parsed structure into a DataValue.
 * Rejects anything TOML key/value/table semantics cannot carry
 * (dates, bigints, null, functions).
 */
export function toDataValue(raw: unknown, source?: string): DataValue {
  return convert(raw, '', source);
}

function convert(raw: unknown, at: string, source?: string): DataValue {
  if (typeof raw === 'string' || typeof raw === 'boolean') return raw;
  if (typeof raw === 'number') {
    if (!Number.isFinite(raw)) {
      throw new MobParseError(`Non-finite number at ${describe(at)}`, source);
    }
    return raw;
  }
  if (Array.isArray(raw)) {
    return raw.map((item, i) => convert(item, `${at}[${i}]`, source));
  }
  if (raw instanceof Date) {
    throw new MobParseError(`Datetime values are not supported (at ${describe(at)})`, source);
  }
  if (typeof raw === 'object' && raw !== null) {
    const table: DataTable = {};
    for (const [key, item] of Object.entries(raw)) {
      setEntry(table, key, convert(item, at ? `${at}.${key}` : key, source));
    }
    return table;
  }
  throw new MobParseError(`Unsupported ${raw === null ? 'null' : typeof raw} value at ${describe(at)}`, source);
}

/**
 * Store `value` under `key` as an own property. Plain assignment would
 * treat `__proto__` as the prototype rather than a key.
 */
export function setEntry(table: DataTable, key: string, value: DataValue): void {
  Object.defineProperty(table, key, { value, enumerable: true, writable: true, configurable: true });
}

function describe(at: string): string {
  return at === '' ? 'document root' : `"${at}"`;
}

export function cloneValue<T extends DataValue>(value: T): T {
  return structuredClone(value);
}

/**
 * Deep structural equality. Table key order is irrelevant;
 * array order is significant.
 */
export function valuesEqual(a: DataValue | undefined, b: DataValue | undefined): boolean {
  if (a === undefined || b === undefined) return a === b;
  if (isArray(a) || isArray(b)) {
    if (!isArray(a) || !isArray(b) || a.length !== b.length) return false;
    return a.every((item, i) => valuesEqual(item, b[i]));
  }
  if (isTable(a) || isTable(b)) {
    if (!isTable(a) || !isTable(b)) return false;
    const aKeys = Object.keys(a);
    if (aKeys.length !== Object.keys(b).length) return false;
    return aKeys.every(key => Object.hasOwn(b, key) && valuesEqual(a[key], b[key]));
  }
  return a === b;
}

/** Follow table keys from `value`; undefined when any step is missing. */
export function getPath(value: DataValue, keys: string[]): DataValue | undefined {
  let current: DataValue | undefined = value;
  for (const key of keys) {
    if (!isTable(current) || !Object.hasOwn(current, key)) return undefined;
    current = current[key];
  }
  return current;
}
