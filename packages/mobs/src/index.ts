export { resolveMobs } from './resolver';
export type { SourceFile, MobSources, ResolveOptions, MobResolution, LayerCounts } from './resolver';
export { MobRegistry } from './registry';
export { validateMob, formatIssue, formatIssues } from './validator';
export type { ValidationIssue, ValidationResult, IssueSeverity } from './validator';
export { mobAssetToValue, serializeMob } from './serialize';
export {
  DEFAULT_MOB_ROOT,
  MOB_EXTENSION,
  PATCH_EXTENSION,
  normalizeMobRef,
  isPatchPath,
} from './naming';
export * from './schema';
export * from './errors';
