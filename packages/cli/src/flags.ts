/**
 * Shared CLI flag helpers.
 */

import * as fs from 'node:fs';
import { CLIError } from './index';

/**
 * Extract a named flag's value from an argument array.
 * Returns the string following `flag`, or undefined if not present.
 */
export function getFlag(args: string[], flag: string): string | undefined {
  const idx = args.indexOf(flag);
  if (idx !== -1 && idx + 1 < args.length) {
    return args[idx + 1];
  }
  return undefined;
}

/** Flags every command accepts, each followed by a value. */
export const GLOBAL_VALUE_FLAGS = ['--config', '--format'];

/**
 * Positional arguments: everything that is neither a flag nor the value
 * of a global flag or one of `valueFlags`.
 */
export function getPositionals(args: string[], valueFlags: string[] = []): string[] {
  const out: string[] = [];
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (GLOBAL_VALUE_FLAGS.includes(arg) || valueFlags.includes(arg)) {
      i++;
      continue;
    }
    if (!arg.startsWith('--')) out.push(arg);
  }
  return out;
}

/**
 * Read a file referenced by a flag value, throwing CLIError if missing.
 */
export function readFlagFile(filePath: string, flagName: string): string {
  if (!fs.existsSync(filePath)) {
    throw new CLIError(`File not found for ${flagName}: ${filePath}`);
  }
  return fs.readFileSync(filePath, 'utf-8');
}

/**
 * Parse a dotted tree path such as `0.1.2`. An empty string or `root`
 * addresses the root.
 */
export function parseTreePath(value: string): number[] {
  if (value === '' || value === 'root') return [];
  const steps = value.split('.');
  if (!steps.every(step => /^\d+$/.test(step))) {
    throw new CLIError(`Invalid tree path: ${value}. Use dot-separated indexes such as 0.1`);
  }
  return steps.map(Number);
}
