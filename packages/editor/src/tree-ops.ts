/**
 * Structural edits on authored behavior trees.
 *
 * Every operation returns a new root and leaves its input untouched. An
 * edit addressed at a path that does not exist, or one the node's layout
 * does not allow, returns the input root unchanged.
 */

import type { DataTable, DataValue } from '@mobforge/core';
import { cloneValue, isArray, isTable, setEntry } from '@mobforge/core';
import type { BehaviorNodeType } from '@mobforge/behavior';
import { NODE_LAYOUTS, isControlNodeType } from '@mobforge/behavior';
import type { Path } from './navigation';
import { getNode, layoutOf } from './navigation';

export function defaultBehaviorTree(): DataTable {
  return {
    type: 'Forever',
    children: [{ type: 'Action', name: 'Movement', behaviors: [{ action: 'MoveDown' }] }],
  };
}

function newActionNode(): DataTable {
  return { type: 'Action', name: 'New Action', behaviors: [] };
}

/** Apply `edit` to the node at `path` in a copy of `root`; `edit` returns false for a no-op. */
export function editNodeAt(root: DataValue, path: Path, edit: (node: DataTable) => boolean): DataValue {
  const next = cloneValue(root);
  const node = getNode(next, path);
  if (!isTable(node) || !edit(node)) return root;
  return next;
}

function editParentOf(
  root: DataValue,
  path: Path,
  edit: (parent: DataTable, index: number) => boolean,
): DataValue {
  if (path.length === 0) return root;
  const index = path[path.length - 1];
  return editNodeAt(root, path.slice(0, -1), parent => edit(parent, index));
}

/**
 * Add a child under the node at `path`: appended to a control node's
 * children, or placed in a binary node's first empty slot.
 */
export function insertChild(root: DataValue, path: Path, child?: DataValue): DataValue {
  return editNodeAt(root, path, node => {
    const layout = layoutOf(node);
    if (!layout) return false;
    if (layout.listField) {
      const list = Object.hasOwn(node, layout.listField) ? node[layout.listField] : [];
      if (!isArray(list)) return false;
      list.push(child !== undefined ? cloneValue(child) : newActionNode());
      node[layout.listField] = list;
      return true;
    }
    const empty = layout.slots.find(slot => !Object.hasOwn(node, slot.field));
    if (!empty) return false;
    node[empty.field] = child !== undefined ? cloneValue(child) : empty.defaultNode();
    return true;
  });
}

/** Fill an empty slot of a binary node with the slot's default node. */
export function fillSlot(root: DataValue, path: Path, slotIndex: number): DataValue {
  return editNodeAt(root, path, node => {
    const slot = layoutOf(node)?.slots[slotIndex];
    if (!slot || Object.hasOwn(node, slot.field)) return false;
    node[slot.field] = slot.defaultNode();
    return true;
  });
}

/**
 * Remove the node at `path`. Children of control nodes can always be
 * removed; slots of binary nodes only when optional. The root stays.
 */
export function deleteNode(root: DataValue, path: Path): DataValue {
  return editParentOf(root, path, (parent, index) => {
    const layout = layoutOf(parent);
    if (!layout) return false;
    if (layout.listField) {
      const list = parent[layout.listField];
      if (!isArray(list) || index < 0 || index >= list.length) return false;
      list.splice(index, 1);
      return true;
    }
    const slot = layout.slots[index];
    if (!slot || slot.required || !Object.hasOwn(parent, slot.field)) return false;
    delete parent[slot.field];
    return true;
  });
}

/** Swap a control node's child with its neighbour; no-op past either end. */
export function moveNode(root: DataValue, path: Path, direction: -1 | 1): DataValue {
  return editParentOf(root, path, (parent, index) => {
    const layout = layoutOf(parent);
    if (!layout?.listField) return false;
    const list = parent[layout.listField];
    const target = index + direction;
    if (!isArray(list) || index < 0 || index >= list.length || target < 0 || target >= list.length) {
      return false;
    }
    [list[index], list[target]] = [list[target], list[index]];
    return true;
  });
}

/**
 * Change a node's type. Switching between control types keeps the
 * children; any other change clears the node and starts it from the new
 * type's defaults, required slots included.
 */
export function retypeNode(root: DataValue, path: Path, newType: BehaviorNodeType): DataValue {
  return editNodeAt(root, path, node => {
    if (node.type === newType) return false;
    const layout = NODE_LAYOUTS[newType];

    if (isControlNodeType(node.type) && layout.category === 'control') {
      node.type = newType;
      if (!isArray(node.children)) node.children = [];
      return true;
    }

    for (const key of Object.keys(node)) delete node[key];
    node.type = newType;
    Object.assign(node, layout.defaultFields());
    for (const slot of layout.slots) {
      if (slot.required) node[slot.field] = slot.defaultNode();
    }
    return true;
  });
}

/** Set a field on the node at `path`. `type` changes go through retypeNode. */
export function setField(root: DataValue, path: Path, field: string, value: DataValue): DataValue {
  if (field === 'type') return root;
  return editNodeAt(root, path, node => {
    setEntry(node, field, cloneValue(value));
    return true;
  });
}

export function removeField(root: DataValue, path: Path, field: string): DataValue {
  if (field === 'type') return root;
  return editNodeAt(root, path, node => {
    if (!Object.hasOwn(node, field)) return false;
    delete node[field];
    return true;
  });
}
