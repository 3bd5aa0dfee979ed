import { describe, it, expect } from 'vitest';
import type { DataTable, DataValue } from '@mobforge/core';
import { getNode, getNodeType, childCount, getField, listPaths } from '../navigation';
import {
  defaultBehaviorTree,
  insertChild,
  fillSlot,
  deleteNode,
  moveNode,
  retypeNode,
  setField,
  removeField,
} from '../tree-ops';

function sampleTree(): DataTable {
  return {
    type: 'Sequence',
    children: [
      { type: 'Wait', seconds: 1 },
      { type: 'While', child: { type: 'Action', name: 'Patrol', behaviors: [] } },
      {
        type: 'IfThen',
        condition: { type: 'Wait', seconds: 2 },
        then_child: { type: 'Action', name: 'Then', behaviors: [] },
      },
    ],
  };
}

describe('navigation', () => {
  it('resolves list children and binary slots', () => {
    const tree = sampleTree();
    expect(getNodeType(tree, [])).toBe('Sequence');
    expect(getNodeType(tree, [1, 1])).toBe('Action');
    expect(getNode(tree, [1, 0])).toBeUndefined();
    expect(getNodeType(tree, [2, 0])).toBe('Wait');
    expect(getField(tree, [2, 1], 'name')).toBe('Then');
  });

  it('counts slots for binary nodes whether filled or not', () => {
    const tree = sampleTree();
    expect(childCount(tree, [])).toBe(3);
    expect(childCount(tree, [1])).toBe(2);
    expect(childCount(tree, [2])).toBe(3);
    expect(childCount(tree, [0])).toBe(0);
  });

  it('treats bad paths as absent', () => {
    const tree = sampleTree();
    expect(getNode(tree, [7])).toBeUndefined();
    expect(getNode(tree, [-1])).toBeUndefined();
    expect(getNode(tree, [0, 0])).toBeUndefined();
    expect(childCount(tree, [9, 9])).toBe(0);
    expect(getField(tree, [9], 'name')).toBeUndefined();
  });

  it('lists every present node exactly once and each path leads back to it', () => {
    const tree = sampleTree();
    const paths = listPaths(tree);
    expect(paths).toEqual([[], [0], [1], [1, 1], [2], [2, 0], [2, 1]]);
    const nodes = paths.map(path => getNode(tree, path));
    expect(new Set(nodes).size).toBe(paths.length);
    expect(nodes.every(node => node !== undefined)).toBe(true);
  });
});

describe('insertChild', () => {
  it('appends a default Action to a control node', () => {
    const tree = sampleTree();
    const next = insertChild(tree, []);
    expect(childCount(next, [])).toBe(4);
    expect(getNode(next, [3])).toEqual({ type: 'Action', name: 'New Action', behaviors: [] });
    expect(childCount(tree, [])).toBe(3);
  });

  it('fills the first empty slot of a binary node', () => {
    const next = insertChild(sampleTree(), [1]);
    expect(getNode(next, [1, 0])).toEqual({ type: 'Wait', seconds: 1 });

    const withElse = insertChild(sampleTree(), [2]);
    expect(getNode(withElse, [2, 2])).toEqual({ type: 'Action', name: 'Else', behaviors: [] });
  });

  it('does nothing on a full binary node or a leaf', () => {
    const tree = sampleTree();
    const full = insertChild(insertChild(tree, [2]), [2]);
    expect(full).toEqual(insertChild(tree, [2]));
    expect(insertChild(tree, [0])).toBe(tree);
  });

  it('inserts a given child', () => {
    const next = insertChild(sampleTree(), [], { type: 'Trigger', trigger_type: 'OnHit' });
    expect(getNodeType(next, [3])).toBe('Trigger');
  });
});

describe('fillSlot', () => {
  it('fills only an empty slot', () => {
    const tree = sampleTree();
    expect(getNode(fillSlot(tree, [2], 2), [2, 2])).toEqual({ type: 'Action', name: 'Else', behaviors: [] });
    expect(fillSlot(tree, [2], 0)).toBe(tree);
    expect(fillSlot(tree, [0], 0)).toBe(tree);
  });
});

describe('deleteNode', () => {
  it('removes a control child and undoes cleanly through the original root', () => {
    const tree = sampleTree();
    const next = deleteNode(tree, [1]);
    expect(childCount(next, [])).toBe(2);
    expect(getNodeType(next, [1])).toBe('IfThen');
    expect(childCount(tree, [])).toBe(3);
  });

  it('removes only optional slots', () => {
    const withCondition = fillSlot(sampleTree(), [1], 0);
    expect(getNode(deleteNode(withCondition, [1, 0]), [1, 0])).toBeUndefined();
    expect(deleteNode(withCondition, [1, 1])).toBe(withCondition);

    const tree = sampleTree();
    expect(deleteNode(tree, [2, 0])).toBe(tree);
    expect(deleteNode(tree, [2, 1])).toBe(tree);
    const withElse = fillSlot(tree, [2], 2);
    expect(getNode(deleteNode(withElse, [2, 2]), [2, 2])).toBeUndefined();
  });

  it('never removes the root', () => {
    const tree = sampleTree();
    expect(deleteNode(tree, [])).toBe(tree);
    expect(deleteNode(tree, [5])).toBe(tree);
  });
});

describe('moveNode', () => {
  it('swaps neighbouring children', () => {
    const next = moveNode(sampleTree(), [0], 1);
    expect(getNodeType(next, [0])).toBe('While');
    expect(getNodeType(next, [1])).toBe('Wait');
  });

  it('is a no-op past either end', () => {
    const tree = sampleTree();
    expect(moveNode(tree, [0], -1)).toBe(tree);
    expect(moveNode(tree, [2], 1)).toBe(tree);
    expect(moveNode(tree, [2, 1], -1)).toBe(tree);
  });
});

describe('retypeNode', () => {
  it('keeps children when switching between control types', () => {
    const next = retypeNode(sampleTree(), [], 'Fallback');
    expect(getNodeType(next, [])).toBe('Fallback');
    expect(childCount(next, [])).toBe(3);
  });

  it('starts other types from their defaults', () => {
    const tree = sampleTree();
    expect(getNode(retypeNode(tree, [0], 'Action'), [0])).toEqual({ type: 'Action', name: 'New Action', behaviors: [] });
    expect(getNode(retypeNode(tree, [0], 'Trigger'), [0])).toEqual({ type: 'Trigger', trigger_type: '' });
    expect(getNode(retypeNode(tree, [0], 'While'), [0])).toEqual({
      type: 'While',
      child: { type: 'Action', name: 'Child', behaviors: [] },
    });
    expect(getNode(retypeNode(tree, [0], 'IfThen'), [0])).toEqual({
      type: 'IfThen',
      condition: { type: 'Wait', seconds: 1 },
      then_child: { type: 'Action', name: 'Then', behaviors: [] },
    });
    expect(getNode(retypeNode(tree, [0], 'Forever'), [0])).toEqual({ type: 'Forever', children: [] });
    expect(getNode(retypeNode(tree, [1], 'Wait'), [1])).toEqual({ type: 'Wait', seconds: 1 });
  });

  it('is a no-op for the same type', () => {
    const tree = sampleTree();
    expect(retypeNode(tree, [0], 'Wait')).toBe(tree);
  });
});

describe('setField / removeField', () => {
  it('sets and removes plain fields', () => {
    const tree = sampleTree();
    const renamed = setField(tree, [1, 1], 'name', 'Sweep');
    expect(getField(renamed, [1, 1], 'name')).toBe('Sweep');
    expect(getField(removeField(renamed, [1, 1], 'name'), [1, 1], 'name')).toBeUndefined();
  });

  it('leaves the type field to retypeNode', () => {
    const tree = sampleTree();
    expect(setField(tree, [0], 'type', 'Action')).toBe(tree);
    expect(removeField(tree, [0], 'type')).toBe(tree);
  });
});

describe('defaultBehaviorTree', () => {
  it('moves down forever', () => {
    const tree: DataValue = defaultBehaviorTree();
    expect(getNodeType(tree, [])).toBe('Forever');
    expect(getField(tree, [0], 'behaviors')).toEqual([{ action: 'MoveDown' }]);
  });
});
