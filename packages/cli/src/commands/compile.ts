/**
 * mobforge compile <ref>
 *
 * Compiles one resolved mob's behavior tree and prints it with any
 * diagnostics.
 */

import { compileBehavior, formatBehaveTree } from '@mobforge/behavior';
import { normalizeMobRef } from '@mobforge/mobs';
import type { CLIOptions } from '../index';
import { CLIError, EXIT_CODE } from '../index';
import { loadConfig } from '../config';
import { getPositionals } from '../flags';
import { resolveProject } from '../project';

export async function compileCommand(options: CLIOptions, args: string[]): Promise<number> {
  const [ref] = getPositionals(args);
  if (!ref) {
    throw new CLIError('Usage: mobforge compile <mob-ref>');
  }

  const config = loadConfig(options.configPath);
  const resolution = resolveProject(config);
  const key = normalizeMobRef(ref, config.root);
  const mob = resolution.mobs.get(key);
  if (!mob) {
    throw new CLIError(`Unknown mob: ${ref}`, EXIT_CODE.POLICY_VIOLATION);
  }

  const result = mob.behavior ? compileBehavior(mob.behavior) : null;

  if (options.format === 'json') {
    console.log(JSON.stringify({
      mob: key,
      tree: result?.tree ?? null,
      diagnostics: result?.diagnostics ?? [],
    }, null, 2));
    return EXIT_CODE.SUCCESS;
  }

  if (!result) {
    console.log(`  ${key} has no behavior`);
    return EXIT_CODE.SUCCESS;
  }
  console.log(formatBehaveTree(result.tree));
  for (const diagnostic of result.diagnostics) {
    console.log(`warning: ${diagnostic.message}`);
  }
  return EXIT_CODE.SUCCESS;
}
