/**
 * Mob file operations on disk.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import type { DataTable } from '@mobforge/core';
import { parseToml, stringifyToml } from '@mobforge/core';
import type { SourceFile } from '@mobforge/mobs';
import { DEFAULT_MOB_ROOT, MOB_EXTENSION, PATCH_EXTENSION, isPatchPath } from '@mobforge/mobs';
import { MobFileError } from './errors';

export type DocumentKind = 'mob' | 'mobpatch';

export function documentKind(filePath: string): DocumentKind {
  return isPatchPath(filePath) ? 'mobpatch' : 'mob';
}

/** A fresh mob with a name, one default collider and no sprite. */
export function newMobDocument(name: string): DataTable {
  return {
    name,
    spawnable: true,
    health: 50,
    colliders: [{ shape: { Rectangle: [10, 10] }, position: [0, 0], rotation: 0 }],
  };
}

export function loadMobFile(filePath: string): DataTable {
  if (!fs.existsSync(filePath)) throw new MobFileError('File not found', filePath);
  return parseToml(fs.readFileSync(filePath), filePath);
}

/**
 * Write a document as TOML. An existing file is first copied to
 * `<file>.bak`; the new content goes to `<file>.tmp` and is renamed over.
 */
export function saveMobFile(filePath: string, doc: DataTable): void {
  writeMobText(filePath, stringifyToml(doc));
}

export function writeMobText(filePath: string, text: string): void {
  if (fs.existsSync(filePath)) fs.copyFileSync(filePath, `${filePath}.bak`);
  const tempPath = `${filePath}.tmp`;
  fs.writeFileSync(tempPath, text);
  fs.renameSync(tempPath, filePath);
}

export function createMobFile(filePath: string, name: string, kind: DocumentKind = documentKind(filePath)): DataTable {
  if (fs.existsSync(filePath)) throw new MobFileError('File already exists', filePath);
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  const doc = kind === 'mobpatch' ? { name } : newMobDocument(name);
  saveMobFile(filePath, doc);
  return doc;
}

/**
 * Move a file into a `.deleted/` directory beside it. A name already taken
 * there gets a seconds-since-epoch prefix. Returns the new location.
 */
export function deleteMobFile(filePath: string): string {
  if (!fs.existsSync(filePath)) throw new MobFileError('File not found', filePath);
  const deletedDir = path.join(path.dirname(filePath), '.deleted');
  fs.mkdirSync(deletedDir, { recursive: true });

  const fileName = path.basename(filePath);
  let target = path.join(deletedDir, fileName);
  if (fs.existsSync(target)) {
    target = path.join(deletedDir, `${Math.floor(Date.now() / 1000)}.${fileName}`);
  }
  fs.renameSync(filePath, target);
  return target;
}

export interface CollectedSources {
  mobs: SourceFile[];
  patches: SourceFile[];
}

/**
 * Read every `.mob` and `.mobpatch` file under `dir`. Source paths are
 * `root` plus the path relative to `dir`, so they name mobs the way asset
 * references do. A missing directory yields nothing.
 */
export function collectMobSources(dir: string, root: string = DEFAULT_MOB_ROOT): CollectedSources {
  const collected: CollectedSources = { mobs: [], patches: [] };
  if (!fs.existsSync(dir)) return collected;

  const walk = (current: string): void => {
    const entries = fs.readdirSync(current, { withFileTypes: true })
      .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    for (const entry of entries) {
      const full = path.join(current, entry.name);
      if (entry.isDirectory()) {
        if (entry.name !== '.deleted') walk(full);
        continue;
      }
      const relative = path.relative(dir, full).split(path.sep).join('/');
      const source: SourceFile = { path: `${root}${relative}`, content: fs.readFileSync(full) };
      if (entry.name.endsWith(MOB_EXTENSION)) collected.mobs.push(source);
      else if (entry.name.endsWith(PATCH_EXTENSION)) collected.patches.push(source);
    }
  };
  walk(dir);
  return collected;
}
