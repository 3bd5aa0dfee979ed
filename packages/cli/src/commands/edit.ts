/**
 * mobforge edit <file> --ops <json|@file>
 *
 * Applies a list of behavior tree edits to one document through an editor
 * session, then saves it if anything changed and it still validates.
 */

import { z } from 'zod';
import type { DataTable, DataValue } from '@mobforge/core';
import { isTable, toDataValue } from '@mobforge/core';
import { BEHAVIOR_NODE_TYPES, COMMAND_ACTIONS } from '@mobforge/behavior';
import {
  EditorSession,
  deleteCommand,
  deleteNode,
  documentKind,
  fillSlot,
  insertChild,
  insertCommand,
  moveCommand,
  moveNode,
  removeCommandParam,
  removeField,
  retypeCommand,
  retypeNode,
  setCommandParam,
  setField,
  writeMobText,
} from '@mobforge/editor';
import type { CLIOptions } from '../index';
import { CLIError, EXIT_CODE } from '../index';
import { loadConfig } from '../config';
import { getFlag, getPositionals, readFlagFile } from '../flags';
import { readDocument } from '../project';

const IndexPath = z.array(z.number().int().nonnegative());
const Direction = z.union([z.literal(-1), z.literal(1)]);

const nodeOp = { path: IndexPath.default([]) };
const commandOp = { ...nodeOp, command_path: IndexPath.min(1) };

export const EditOpSchema = z.discriminatedUnion('op', [
  z.object({ op: z.literal('insert_child'), ...nodeOp, child: z.unknown().optional() }).strict(),
  z.object({ op: z.literal('fill_slot'), ...nodeOp, slot: z.number().int().nonnegative() }).strict(),
  z.object({ op: z.literal('delete'), ...nodeOp }).strict(),
  z.object({ op: z.literal('move'), ...nodeOp, direction: Direction }).strict(),
  z.object({ op: z.literal('retype'), ...nodeOp, type: z.enum(BEHAVIOR_NODE_TYPES) }).strict(),
  z.object({ op: z.literal('set_field'), ...nodeOp, field: z.string().min(1), value: z.unknown() }).strict(),
  z.object({ op: z.literal('remove_field'), ...nodeOp, field: z.string().min(1) }).strict(),
  z.object({
    op: z.literal('insert_command'),
    ...nodeOp,
    list_path: IndexPath.default([]),
    command: z.unknown().optional(),
  }).strict(),
  z.object({ op: z.literal('delete_command'), ...commandOp }).strict(),
  z.object({ op: z.literal('move_command'), ...commandOp, direction: Direction }).strict(),
  z.object({ op: z.literal('retype_command'), ...commandOp, action: z.enum(COMMAND_ACTIONS) }).strict(),
  z.object({ op: z.literal('set_param'), ...commandOp, param: z.string().min(1), value: z.unknown() }).strict(),
  z.object({ op: z.literal('remove_param'), ...commandOp, param: z.string().min(1) }).strict(),
  z.object({ op: z.literal('undo') }).strict(),
  z.object({ op: z.literal('redo') }).strict(),
]);
export type EditOp = z.infer<typeof EditOpSchema>;

const EditOpsSchema = z.array(EditOpSchema);

export function parseEditOps(text: string): EditOp[] {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    throw new CLIError('Invalid --ops: not valid JSON');
  }
  const parsed = EditOpsSchema.safeParse(Array.isArray(raw) ? raw : [raw]);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw new CLIError(`Invalid --ops: ${where}${issue ? issue.message : 'unknown error'}`);
  }
  return parsed.data;
}

function toCommand(raw: unknown): DataTable {
  const value = toDataValue(raw, 'command');
  if (!isTable(value)) throw new Error('command must be a table');
  return value;
}

/** Run one op against the session. Returns true when the document changed. */
export function applyEditOp(session: EditorSession, op: EditOp): boolean {
  const tree = (label: string, fn: (root: DataValue) => DataValue): boolean => session.editBehavior(label, fn);

  switch (op.op) {
    case 'insert_child':
      return tree('Insert child', root =>
        insertChild(root, op.path, op.child === undefined ? undefined : toDataValue(op.child, 'child')));
    case 'fill_slot':
      return tree('Fill slot', root => fillSlot(root, op.path, op.slot));
    case 'delete':
      return tree('Delete node', root => deleteNode(root, op.path));
    case 'move':
      return tree('Move node', root => moveNode(root, op.path, op.direction));
    case 'retype':
      return tree(`Change type to ${op.type}`, root => retypeNode(root, op.path, op.type));
    case 'set_field':
      return tree(`Set ${op.field}`, root => setField(root, op.path, op.field, toDataValue(op.value, op.field)));
    case 'remove_field':
      return tree(`Remove ${op.field}`, root => removeField(root, op.path, op.field));
    case 'insert_command':
      return tree('Insert command', root =>
        insertCommand(root, op.path, op.list_path, op.command === undefined ? undefined : toCommand(op.command)));
    case 'delete_command':
      return tree('Delete command', root => deleteCommand(root, op.path, op.command_path));
    case 'move_command':
      return tree('Move command', root => moveCommand(root, op.path, op.command_path, op.direction));
    case 'retype_command':
      return tree(`Change action to ${op.action}`, root => retypeCommand(root, op.path, op.command_path, op.action));
    case 'set_param':
      return tree(`Set ${op.param}`, root =>
        setCommandParam(root, op.path, op.command_path, op.param, toDataValue(op.value, op.param)));
    case 'remove_param':
      return tree(`Remove ${op.param}`, root => removeCommandParam(root, op.path, op.command_path, op.param));
    case 'undo':
      return session.undo();
    case 'redo':
      return session.redo();
  }
}

export async function editCommand(options: CLIOptions, args: string[]): Promise<number> {
  const [file] = getPositionals(args, ['--ops']);
  const opsFlag = getFlag(args, '--ops');
  if (!file || !opsFlag) {
    throw new CLIError('Usage: mobforge edit <file> --ops <json|@file>');
  }
  const ops = parseEditOps(opsFlag.startsWith('@') ? readFlagFile(opsFlag.slice(1), '--ops') : opsFlag);

  const config = loadConfig(options.configPath);
  const session = new EditorSession({ historyLimit: config.historyLimit });
  session.open(readDocument(file), { path: file, kind: documentKind(file) });

  let applied = 0;
  for (const op of ops) {
    if (applyEditOp(session, op)) applied++;
  }

  const modified = session.isModified;
  const saved = modified && session.save(writeMobText);
  const exitCode = modified && !saved ? EXIT_CODE.POLICY_VIOLATION : EXIT_CODE.SUCCESS;

  if (options.format === 'json') {
    console.log(JSON.stringify({
      file,
      applied,
      saved,
      status: session.status.entries().map(({ level, message }) => ({ level, message })),
    }, null, 2));
    return exitCode;
  }

  for (const entry of session.status.entries()) {
    console.log(`  [${entry.level}] ${entry.message}`);
  }
  if (!modified) console.log(`  ${file} unchanged`);
  return exitCode;
}
