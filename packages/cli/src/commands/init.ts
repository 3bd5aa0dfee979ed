/**
 * mobforge init
 *
 * Scaffolds the .mobforge/ directory with a default config, and creates the
 * mob directories it names.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import type { CLIOptions } from '../index';
import { EXIT_CODE } from '../index';
import { DEFAULT_CONFIG, getDefaultConfigJSON, projectRoot } from '../config';

interface InitResult {
  created: boolean;
  configPath: string;
  files: string[];
  writesPerformed: number;
}

export async function initCommand(options: CLIOptions, args: string[] = []): Promise<number> {
  const force = args.includes('--force');
  const result = initializeProject(options.configPath, force);

  if (options.format === 'json') {
    console.log(JSON.stringify(result, null, 2));
    return EXIT_CODE.SUCCESS;
  }

  if (!result.created && result.writesPerformed === 0) {
    console.log(`  .mobforge/ already exists at ${result.configPath}`);
    console.log('  Use --config <path> for a different location, or --force to rewrite the default config.');
    return EXIT_CODE.SUCCESS;
  }

  console.log(`  Initialized .mobforge/ at ${result.configPath}/`);
  console.log('');
  console.log('  Created:');
  for (const file of result.files) {
    console.log(`    ${file}`);
  }
  console.log('');
  console.log('  Next steps:');
  console.log(`    1. Add base mobs under ${DEFAULT_CONFIG.baseDir}/`);
  console.log('    2. Run: mobforge resolve');

  return EXIT_CODE.SUCCESS;
}

export function initializeProject(configDir: string, force: boolean): InitResult {
  const configFile = path.join(configDir, 'config.json');
  const exists = fs.existsSync(configFile);

  if (exists && !force) {
    return {
      created: false,
      configPath: configDir,
      files: [],
      writesPerformed: 0,
    };
  }

  const root = projectRoot(configDir);
  const dirs = [
    configDir,
    path.resolve(root, DEFAULT_CONFIG.baseDir),
    path.resolve(root, DEFAULT_CONFIG.extendedDir),
  ];
  for (const dir of dirs) {
    fs.mkdirSync(dir, { recursive: true });
  }

  let writesPerformed = 0;
  if (writeIfChanged(configFile, getDefaultConfigJSON() + '\n')) writesPerformed++;

  return {
    created: !exists,
    configPath: configDir,
    files: ['config.json', `${DEFAULT_CONFIG.baseDir}/`, `${DEFAULT_CONFIG.extendedDir}/`],
    writesPerformed,
  };
}

function writeIfChanged(targetPath: string, content: string): boolean {
  if (fs.existsSync(targetPath)) {
    const existing = fs.readFileSync(targetPath, 'utf-8');
    if (existing === content) {
      return false;
    }
  }
  fs.writeFileSync(targetPath, content);
  return true;
}
