/**
 * mobforge tree <file> [--path 0.1]
 *
 * Lists a document's behavior tree with the path of every node, the
 * addresses `edit` takes.
 */

import type { DataValue } from '@mobforge/core';
import { getField, getNode, getNodeType, listPaths } from '@mobforge/editor';
import type { CLIOptions } from '../index';
import { CLIError, EXIT_CODE } from '../index';
import { getFlag, getPositionals, parseTreePath } from '../flags';
import { readDocument } from '../project';

export interface TreeLine {
  path: string;
  type: string;
  name?: string;
}

export function describeTree(root: DataValue, base: number[]): TreeLine[] {
  const subtree = getNode(root, base);
  if (subtree === undefined) return [];
  return listPaths(subtree).map(relative => {
    const full = [...base, ...relative];
    const line: TreeLine = { path: full.length > 0 ? full.join('.') : 'root', type: getNodeType(root, full) ?? '?' };
    const name = getField(root, full, 'name');
    if (typeof name === 'string') line.name = name;
    return line;
  });
}

export async function treeCommand(options: CLIOptions, args: string[]): Promise<number> {
  const [file] = getPositionals(args, ['--path']);
  if (!file) {
    throw new CLIError('Usage: mobforge tree <file> [--path 0.1]');
  }
  const base = parseTreePath(getFlag(args, '--path') ?? '');
  const behavior = readDocument(file).behavior;
  if (behavior === undefined) {
    throw new CLIError(`${file} has no behavior tree`, EXIT_CODE.POLICY_VIOLATION);
  }
  const lines = describeTree(behavior, base);
  if (lines.length === 0) {
    throw new CLIError(`No node at path ${base.join('.')}`, EXIT_CODE.POLICY_VIOLATION);
  }

  if (options.format === 'json') {
    console.log(JSON.stringify(lines, null, 2));
    return EXIT_CODE.SUCCESS;
  }

  for (const line of lines) {
    const depth = line.path === 'root' ? 0 : line.path.split('.').length;
    const label = line.name !== undefined ? `${line.type} "${line.name}"` : line.type;
    console.log(`${'  '.repeat(depth - base.length)}${line.path}  ${label}`);
  }
  return EXIT_CODE.SUCCESS;
}
