export const DEFAULT_MOB_ROOT = 'mobs/';

export const MOB_EXTENSION = '.mob';
export const PATCH_EXTENSION = '.mobpatch';

/**
 * Registry key for a mob reference: the asset root and the file
 * extension are stripped, so `mobs/xhitara/grunt.mob` becomes
 * `xhitara/grunt`. Already normalized keys pass through unchanged.
 */
export function normalizeMobRef(ref: string, root: string = DEFAULT_MOB_ROOT): string {
  const withoutRoot = root && ref.startsWith(root) ? ref.slice(root.length) : ref;
  if (withoutRoot.endsWith(MOB_EXTENSION)) return withoutRoot.slice(0, -MOB_EXTENSION.length);
  if (withoutRoot.endsWith(PATCH_EXTENSION)) return withoutRoot.slice(0, -PATCH_EXTENSION.length);
  return withoutRoot;
}

export function isPatchPath(path: string): boolean {
  return path.endsWith(PATCH_EXTENSION);
}
