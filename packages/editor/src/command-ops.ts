/**
 * Edits on the command lists of Action nodes.
 *
 * A command is addressed by the node path of its Action plus a command
 * path: indices into the Action's `behaviors`, then into the nested
 * `behaviors` of each TransmitMobBehavior on the way down.
 */

import type { DataTable, DataValue } from '@mobforge/core';
import { cloneValue, isArray, isTable, setEntry } from '@mobforge/core';
import type { CommandAction } from '@mobforge/behavior';
import { COMMAND_LAYOUTS, isCommandAction } from '@mobforge/behavior';
import type { Path } from './navigation';
import { getNode } from './navigation';
import { editNodeAt } from './tree-ops';

export type CommandPath = number[];

function nestedListField(command: DataTable): 'behaviors' | undefined {
  return isCommandAction(command.action) ? COMMAND_LAYOUTS[command.action].nestedList : undefined;
}

/**
 * The command list addressed by `listPath` under an Action node. With
 * `create`, missing lists along the way are added.
 */
function commandList(node: DataValue | undefined, listPath: CommandPath, create: boolean): DataValue[] | undefined {
  if (!isTable(node) || node.type !== 'Action') return undefined;
  if (!Object.hasOwn(node, 'behaviors') && create) node.behaviors = [];
  let list = node.behaviors;

  for (const index of listPath) {
    if (!isArray(list)) return undefined;
    const command = list[index];
    if (!isTable(command)) return undefined;
    const field = nestedListField(command);
    if (!field) return undefined;
    if (!Object.hasOwn(command, field) && create) command[field] = [];
    list = command[field];
  }
  return isArray(list) ? list : undefined;
}

function splitPath(commandPath: CommandPath): { listPath: CommandPath; index: number } | undefined {
  if (commandPath.length === 0) return undefined;
  return { listPath: commandPath.slice(0, -1), index: commandPath[commandPath.length - 1] };
}

export function getCommand(root: DataValue, path: Path, commandPath: CommandPath): DataTable | undefined {
  const split = splitPath(commandPath);
  if (!split) return undefined;
  const list = commandList(getNode(root, path), split.listPath, false);
  if (!list || split.index < 0 || split.index >= list.length) return undefined;
  const command = list[split.index];
  return isTable(command) ? command : undefined;
}

function editCommandAt(
  root: DataValue,
  path: Path,
  commandPath: CommandPath,
  edit: (command: DataTable) => boolean,
): DataValue {
  const split = splitPath(commandPath);
  if (!split) return root;
  return editNodeAt(root, path, node => {
    const list = commandList(node, split.listPath, false);
    if (!list || split.index < 0 || split.index >= list.length) return false;
    const command = list[split.index];
    return isTable(command) && edit(command);
  });
}

/** Append a command to the list at `listPath` (the Action's own list when empty). */
export function insertCommand(
  root: DataValue,
  path: Path,
  listPath: CommandPath = [],
  command: DataTable = { action: 'MoveDown' },
): DataValue {
  return editNodeAt(root, path, node => {
    const list = commandList(node, listPath, true);
    if (!list) return false;
    list.push(cloneValue(command));
    return true;
  });
}

export function deleteCommand(root: DataValue, path: Path, commandPath: CommandPath): DataValue {
  const split = splitPath(commandPath);
  if (!split) return root;
  return editNodeAt(root, path, node => {
    const list = commandList(node, split.listPath, false);
    if (!list || split.index < 0 || split.index >= list.length) return false;
    list.splice(split.index, 1);
    return true;
  });
}

export function moveCommand(root: DataValue, path: Path, commandPath: CommandPath, direction: -1 | 1): DataValue {
  const split = splitPath(commandPath);
  if (!split) return root;
  return editNodeAt(root, path, node => {
    const list = commandList(node, split.listPath, false);
    const { index } = split;
    const target = index + direction;
    if (!list || index < 0 || index >= list.length || target < 0 || target >= list.length) return false;
    [list[index], list[target]] = [list[target], list[index]];
    return true;
  });
}

/** Replace a command's action; every other parameter is reset to the new action's defaults. */
export function retypeCommand(root: DataValue, path: Path, commandPath: CommandPath, action: CommandAction): DataValue {
  return editCommandAt(root, path, commandPath, command => {
    if (command.action === action) return false;
    for (const key of Object.keys(command)) delete command[key];
    command.action = action;
    Object.assign(command, COMMAND_LAYOUTS[action].defaultParams());
    return true;
  });
}

export function setCommandParam(
  root: DataValue,
  path: Path,
  commandPath: CommandPath,
  param: string,
  value: DataValue,
): DataValue {
  if (param === 'action') return root;
  return editCommandAt(root, path, commandPath, command => {
    setEntry(command, param, cloneValue(value));
    return true;
  });
}

export function removeCommandParam(root: DataValue, path: Path, commandPath: CommandPath, param: string): DataValue {
  if (param === 'action') return root;
  return editCommandAt(root, path, commandPath, command => {
    if (!Object.hasOwn(command, param)) return false;
    delete command[param];
    return true;
  });
}
