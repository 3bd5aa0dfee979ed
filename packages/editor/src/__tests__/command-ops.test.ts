import { describe, it, expect } from 'vitest';
import type { DataTable } from '@mobforge/core';
import {
  getCommand,
  insertCommand,
  deleteCommand,
  moveCommand,
  retypeCommand,
  setCommandParam,
  removeCommandParam,
} from '../command-ops';
import { getField } from '../navigation';

function sampleTree(): DataTable {
  return {
    type: 'Forever',
    children: [
      {
        type: 'Action',
        name: 'Attack',
        behaviors: [
          { action: 'MoveTo', x: 5, y: 2 },
          { action: 'TransmitMobBehavior', mob_type: 'drone', behaviors: [{ action: 'MoveLeft' }] },
        ],
      },
      { type: 'Wait', seconds: 1 },
    ],
  };
}

describe('command edits', () => {
  it('reads commands, including nested ones', () => {
    const tree = sampleTree();
    expect(getCommand(tree, [0], [0])).toEqual({ action: 'MoveTo', x: 5, y: 2 });
    expect(getCommand(tree, [0], [1, 0])).toEqual({ action: 'MoveLeft' });
    expect(getCommand(tree, [0], [0, 0])).toBeUndefined();
    expect(getCommand(tree, [1], [0])).toBeUndefined();
    expect(getCommand(tree, [0], [])).toBeUndefined();
  });

  it('inserts a MoveDown by default', () => {
    const next = insertCommand(sampleTree(), [0]);
    expect(getCommand(next, [0], [2])).toEqual({ action: 'MoveDown' });
  });

  it('inserts into a nested transmit list', () => {
    const next = insertCommand(sampleTree(), [0], [1], { action: 'BrakeAngular' });
    expect(getCommand(next, [0], [1, 1])).toEqual({ action: 'BrakeAngular' });
  });

  it('creates a missing command list on an Action', () => {
    const tree: DataTable = { type: 'Action', name: 'Empty' };
    expect(getField(insertCommand(tree, []), [], 'behaviors')).toEqual([{ action: 'MoveDown' }]);
  });

  it('refuses to insert under a non-Action node', () => {
    const tree = sampleTree();
    expect(insertCommand(tree, [1])).toBe(tree);
    expect(insertCommand(tree, [0], [0])).toBe(tree);
  });

  it('resets parameters on retype', () => {
    const next = retypeCommand(sampleTree(), [0], [0], 'DoForTime');
    expect(getCommand(next, [0], [0])).toEqual({ action: 'DoForTime', seconds: 1 });

    const transmit = retypeCommand(sampleTree(), [0], [0], 'TransmitMobBehavior');
    expect(getCommand(transmit, [0], [0])).toEqual({ action: 'TransmitMobBehavior', mob_type: '', behaviors: [] });

    const tree = sampleTree();
    expect(retypeCommand(tree, [0], [0], 'MoveTo')).toBe(tree);
  });

  it('deletes and moves commands with clamping', () => {
    const tree = sampleTree();
    const deleted = deleteCommand(tree, [0], [0]);
    expect(getCommand(deleted, [0], [0])?.action).toBe('TransmitMobBehavior');

    const moved = moveCommand(tree, [0], [1], -1);
    expect(getCommand(moved, [0], [0])?.action).toBe('TransmitMobBehavior');
    expect(moveCommand(tree, [0], [1], 1)).toBe(tree);
    expect(moveCommand(tree, [0], [1, 0], -1)).toBe(tree);
    expect(deleteCommand(tree, [0], [4])).toBe(tree);
  });

  it('sets and removes parameters but never the action', () => {
    const tree = sampleTree();
    const keyed = setCommandParam(tree, [0], [1, 0], 'keys', ['a']);
    expect(getCommand(keyed, [0], [1, 0])).toEqual({ action: 'MoveLeft', keys: ['a'] });
    expect(getCommand(removeCommandParam(tree, [0], [0], 'y'), [0], [0])).toEqual({ action: 'MoveTo', x: 5 });
    expect(setCommandParam(tree, [0], [0], 'action', 'MoveUp')).toBe(tree);
    expect(removeCommandParam(tree, [0], [0], 'action')).toBe(tree);
  });
});
