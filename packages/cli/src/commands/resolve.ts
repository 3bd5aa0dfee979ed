/**
 * mobforge resolve
 *
 * Resolves every layer the config names and reports what came out.
 * Exits 1 when any merged definition failed the schema.
 */

import { MobRegistry } from '@mobforge/mobs';
import type { CLIOptions } from '../index';
import { EXIT_CODE } from '../index';
import { loadConfig } from '../config';
import { resolveProject } from '../project';

export async function resolveCommand(options: CLIOptions): Promise<number> {
  const config = loadConfig(options.configPath);
  const resolution = resolveProject(config);
  const registry = MobRegistry.build(resolution, { root: config.root });
  const failures = resolution.failures.map(f => ({ mob: f.entity, field: f.field ?? null, message: f.message }));
  const exitCode = failures.length > 0 ? EXIT_CODE.POLICY_VIOLATION : EXIT_CODE.SUCCESS;

  if (options.format === 'json') {
    console.log(JSON.stringify({
      layers: resolution.layers,
      mobs: registry.keys(),
      spawnable: registry.spawnableMobs(),
      failures,
    }, null, 2));
    return exitCode;
  }

  const { base, extended, patched } = resolution.layers;
  console.log(`  Layers: ${base} base, ${extended} extended, ${patched} patched`);
  console.log(`  Resolved ${registry.size} mob(s):`);
  const spawnable = new Set(registry.spawnableMobs());
  for (const key of registry.keys()) {
    console.log(`    ${key}${spawnable.has(key) ? ' (spawnable)' : ''}`);
  }
  if (failures.length > 0) {
    console.log('');
    console.log(`  ${failures.length} mob(s) failed:`);
    for (const failure of resolution.failures) {
      console.log(`    ${failure.message}`);
    }
  }
  return exitCode;
}
