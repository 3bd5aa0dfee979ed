/**
 * Path addressing for authored behavior trees.
 *
 * A path is a list of child positions from the root. Control nodes number
 * their `children` in order; binary nodes number their slots as laid out
 * in NODE_LAYOUTS (While: condition 0, child 1; IfThen: condition 0,
 * then_child 1, else_child 2), whether the slot is filled or not.
 */

import type { DataValue } from '@mobforge/core';
import { isArray, isTable } from '@mobforge/core';
import type { NodeLayout } from '@mobforge/behavior';
import { NODE_LAYOUTS, isBehaviorNodeType } from '@mobforge/behavior';

export type Path = number[];

export function layoutOf(node: DataValue | undefined): NodeLayout | undefined {
  if (!isTable(node) || !isBehaviorNodeType(node.type)) return undefined;
  return NODE_LAYOUTS[node.type];
}

function childAt(node: DataValue | undefined, index: number): DataValue | undefined {
  const layout = layoutOf(node);
  if (!layout || !isTable(node) || !Number.isInteger(index) || index < 0) return undefined;
  if (layout.listField) {
    const list = node[layout.listField];
    return isArray(list) && index < list.length ? list[index] : undefined;
  }
  const slot = layout.slots[index];
  return slot && Object.hasOwn(node, slot.field) ? node[slot.field] : undefined;
}

export function getNode(root: DataValue, path: Path): DataValue | undefined {
  let current: DataValue | undefined = root;
  for (const index of path) {
    current = childAt(current, index);
    if (current === undefined) return undefined;
  }
  return current;
}

export function getNodeType(root: DataValue, path: Path): string | undefined {
  const node = getNode(root, path);
  return isTable(node) && typeof node.type === 'string' ? node.type : undefined;
}

/** Number of child positions: list length for control nodes, slot count for binary nodes. */
export function childCount(root: DataValue, path: Path): number {
  const node = getNode(root, path);
  const layout = layoutOf(node);
  if (!layout || !isTable(node)) return 0;
  if (layout.listField) {
    const list = node[layout.listField];
    return isArray(list) ? list.length : 0;
  }
  return layout.slots.length;
}

export function getField(root: DataValue, path: Path, field: string): DataValue | undefined {
  const node = getNode(root, path);
  return isTable(node) && Object.hasOwn(node, field) ? node[field] : undefined;
}

/** Paths of every present node, depth first, root included. */
export function listPaths(root: DataValue): Path[] {
  const paths: Path[] = [];
  const walk = (node: DataValue, path: Path): void => {
    paths.push(path);
    const count = childCount(node, []);
    for (let i = 0; i < count; i++) {
      const child = childAt(node, i);
      if (child !== undefined) walk(child, [...path, i]);
    }
  };
  walk(root, []);
  return paths;
}
