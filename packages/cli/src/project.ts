/**
 * Loads the mob layers a project's config points at, and single documents
 * for the per-file commands.
 */

import type { DataTable } from '@mobforge/core';
import { MobParseError } from '@mobforge/core';
import type { MobResolution } from '@mobforge/mobs';
import { resolveMobs } from '@mobforge/mobs';
import { MobFileError, collectMobSources, loadMobFile } from '@mobforge/editor';
import type { MobforgeConfig } from './config';
import { CLIError } from './index';

/**
 * Read the base and extended directories and resolve them. Patches from
 * either directory apply after both definition layers. A base file that
 * does not parse stops the whole run.
 */
export function resolveProject(config: MobforgeConfig): MobResolution {
  const base = collectMobSources(config.baseDir, config.root);
  const extended = collectMobSources(config.extendedDir, config.root);
  try {
    return resolveMobs(
      {
        base: base.mobs,
        extended: extended.mobs,
        patches: [...base.patches, ...extended.patches],
      },
      { root: config.root },
    );
  } catch (e: unknown) {
    if (e instanceof MobParseError) throw new CLIError(e.message);
    throw e;
  }
}

/** Load one mob or patch file; unreadable files become CLI errors. */
export function readDocument(filePath: string): DataTable {
  try {
    return loadMobFile(filePath);
  } catch (e: unknown) {
    if (e instanceof MobFileError || e instanceof MobParseError) {
      throw new CLIError(e.message);
    }
    throw e;
  }
}
