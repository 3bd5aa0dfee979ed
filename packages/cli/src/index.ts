/**
 * mobforge CLI
 *
 * Resolves layered mob definitions, compiles their behavior trees and
 * edits behavior trees by path, all from local files.
 */

import { initCommand } from './commands/init';
import { resolveCommand } from './commands/resolve';
import { compileCommand } from './commands/compile';
import { validateCommand } from './commands/validate';
import { treeCommand } from './commands/tree';
import { editCommand } from './commands/edit';
import { getFlag } from './flags';
import packageJson from '../package.json';

const CLI_VERSION = packageJson.version;

export const HELP = `
mobforge - layered mob definitions and behavior trees

Usage:
  mobforge init [--force]          Scaffold .mobforge/ config and mob directories
  mobforge resolve                 Resolve base, extended and patch layers; list mobs
  mobforge compile <ref>           Compile a resolved mob's behavior tree
  mobforge validate <file>         Check a .mob or .mobpatch file
  mobforge tree <file> [--path <p>]
                                   List behavior tree nodes with their paths (p: 0.1)
  mobforge edit <file> --ops <json|@file>
                                   Apply behavior tree edits and save
  mobforge --help                  Show this help
  mobforge --version               Show version

Edit ops (JSON object or array, "path" and "command_path" are index lists):
  insert_child, fill_slot, delete, move, retype, set_field, remove_field,
  insert_command, delete_command, move_command, retype_command,
  set_param, remove_param, undo, redo

Options:
  --config <path>    Path to .mobforge/ directory (default: .mobforge/)
  --format <type>    Output format: text, json (default: text)
`;

export const EXIT_CODE = {
  SUCCESS: 0,
  POLICY_VIOLATION: 1,
  RUNTIME_ERROR: 2,
} as const;

export class CLIError extends Error {
  constructor(
    message: string,
    public readonly exitCode: number = EXIT_CODE.RUNTIME_ERROR
  ) {
    super(message);
    this.name = 'CLIError';
  }
}

export interface CLIOptions {
  configPath: string;
  format: 'text' | 'json';
}

export async function run(args: string[]): Promise<number> {
  const configPath = getFlag(args, '--config') || '.mobforge';
  const rawFormat = getFlag(args, '--format') || 'text';

  if (args.includes('--help') || args.includes('-h')) {
    console.log(HELP);
    return EXIT_CODE.SUCCESS;
  }

  if (args.includes('--version') || args.includes('-v')) {
    console.log(`mobforge v${CLI_VERSION}`);
    return EXIT_CODE.SUCCESS;
  }

  if (rawFormat !== 'text' && rawFormat !== 'json') {
    throw new CLIError(`Invalid --format value: ${rawFormat}. Use text or json.`);
  }

  const options: CLIOptions = {
    configPath,
    format: rawFormat,
  };

  if (args.length === 0 || args[0].startsWith('-')) {
    console.log(HELP);
    return EXIT_CODE.SUCCESS;
  }

  const command = args[0];
  const restArgs = args.slice(1);

  switch (command) {
    case 'init':
      return initCommand(options, restArgs);
    case 'resolve':
      return resolveCommand(options);
    case 'compile':
      return compileCommand(options, restArgs);
    case 'validate':
      return validateCommand(options, restArgs);
    case 'tree':
      return treeCommand(options, restArgs);
    case 'edit':
      return editCommand(options, restArgs);
    default:
      throw new CLIError(`Unknown command: ${command}\n${HELP}`);
  }
}
