/**
 * Layered mob resolver.
 *
 * Three layers, applied in order:
 * 1. base definitions (`.mob`), which must all parse;
 * 2. extended definitions (`.mob`), which add mobs or replace base mobs whole;
 * 3. patches (`.mobpatch`), merged field by field into an existing mob.
 *
 * Every merged definition then goes through the closed schema. A mob that
 * fails it is reported and left out; the others still resolve.
 */

import type { DataTable } from '@mobforge/core';
import { MobParseError, mergeInto, parseToml } from '@mobforge/core';
import { MobDefinitionError } from './errors';
import type { MobAsset } from './schema';
import { parseMobAsset } from './schema';
import { DEFAULT_MOB_ROOT, normalizeMobRef } from './naming';

export interface SourceFile {
  path: string;
  content: string | Uint8Array;
}

export interface MobSources {
  base: SourceFile[];
  extended?: SourceFile[];
  patches?: SourceFile[];
}

export interface ResolveOptions {
  /** Asset root stripped from file paths when naming mobs. */
  root?: string;
}

export interface LayerCounts {
  base: number;
  extended: number;
  patched: number;
}

export interface MobResolution {
  /** Resolved mobs, keyed by normalized name, in name order. */
  mobs: Map<string, MobAsset>;
  /** Merged definitions before deserialization, in name order. */
  values: Map<string, DataTable>;
  failures: MobDefinitionError[];
  layers: LayerCounts;
}

const byPath = (a: SourceFile, b: SourceFile): number => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0);

function parseOptional(file: SourceFile, layer: string): DataTable | null {
  try {
    return parseToml(file.content, file.path);
  } catch (e: unknown) {
    if (e instanceof MobParseError) {
      console.warn(`Skipping ${layer} file ${file.path}: ${e.message}`);
      return null;
    }
    throw e;
  }
}

export function resolveMobs(sources: MobSources, options: ResolveOptions = {}): MobResolution {
  const root = options.root ?? DEFAULT_MOB_ROOT;
  const tables = new Map<string, DataTable>();
  const layers: LayerCounts = { base: 0, extended: 0, patched: 0 };

  for (const file of [...sources.base].sort(byPath)) {
    tables.set(normalizeMobRef(file.path, root), parseToml(file.content, file.path));
    layers.base++;
  }

  for (const file of [...(sources.extended ?? [])].sort(byPath)) {
    const table = parseOptional(file, 'extended');
    if (!table) continue;
    tables.set(normalizeMobRef(file.path, root), table);
    layers.extended++;
  }

  for (const file of [...(sources.patches ?? [])].sort(byPath)) {
    const patch = parseOptional(file, 'patch');
    if (!patch) continue;
    const name = normalizeMobRef(file.path, root);
    const target = tables.get(name);
    if (!target) {
      console.warn(`Skipping patch ${file.path}: no mob named "${name}" to patch`);
      continue;
    }
    mergeInto(target, patch);
    layers.patched++;
  }

  const mobs = new Map<string, MobAsset>();
  const values = new Map<string, DataTable>();
  const failures: MobDefinitionError[] = [];

  for (const name of [...tables.keys()].sort()) {
    const table = tables.get(name);
    if (!table) continue;
    values.set(name, table);
    try {
      mobs.set(name, parseMobAsset(table, name));
    } catch (e: unknown) {
      if (!(e instanceof MobDefinitionError)) throw e;
      console.warn(`Skipping mob ${name}: ${e.message}`);
      failures.push(e);
    }
  }

  return { mobs, values, failures, layers };
}
