/**
 * TOML codec over the generic value model.
 */

import { parse, stringify, TomlError } from 'smol-toml';
import type { DataTable } from './value';
import { isTable, toDataValue } from './value';
import { MobParseError } from './errors';

const decoder = new TextDecoder('utf-8');

export function parseToml(input: string | Uint8Array, source?: string): DataTable {
  const text = typeof input === 'string' ? input : decoder.decode(input);

  let raw: unknown;
  try {
    raw = parse(text);
  } catch (e: unknown) {
    if (e instanceof TomlError) {
      const firstLine = e.message.split('\n')[0];
      throw new MobParseError(firstLine, source, e.line);
    }
    throw e;
  }

  const value = toDataValue(raw, source);
  if (!isTable(value)) {
    throw new MobParseError('Document root must be a table', source);
  }
  return value;
}

export function stringifyToml(table: DataTable): string {
  return stringify(table);
}
