import { describe, it, expect } from 'vitest';
import type { DataTable } from '@mobforge/core';
import { parseToml } from '@mobforge/core';
import { EditorSession } from '../session';
import { deleteNode, insertChild } from '../tree-ops';
import { childCount, getNodeType } from '../navigation';

function gruntDoc(): DataTable {
  return {
    name: 'Grunt',
    health: 40,
    behavior: {
      type: 'Sequence',
      children: [
        { type: 'Wait', seconds: 1 },
        { type: 'Action', name: 'Move', behaviors: [{ action: 'MoveDown' }] },
        { type: 'Wait', seconds: 2 },
      ],
    },
  };
}

function openGrunt(): EditorSession {
  const session = new EditorSession();
  session.open(gruntDoc(), { path: 'mobs/grunt.mob', kind: 'mob' });
  return session;
}

describe('EditorSession', () => {
  it('restores deleted children on undo', () => {
    const session = openGrunt();
    expect(session.editBehavior('Delete node', tree => deleteNode(tree, [1]))).toBe(true);
    expect(childCount(session.document?.behavior ?? {}, [])).toBe(2);
    expect(session.isModified).toBe(true);

    expect(session.undo()).toBe(true);
    const behavior = session.document?.behavior ?? {};
    expect(childCount(behavior, [])).toBe(3);
    expect(getNodeType(behavior, [1])).toBe('Action');
    expect(session.isModified).toBe(false);

    expect(session.redo()).toBe(true);
    expect(childCount(session.document?.behavior ?? {}, [])).toBe(2);
  });

  it('does not record edits that change nothing', () => {
    const session = openGrunt();
    expect(session.editBehavior('Delete root', tree => deleteNode(tree, []))).toBe(false);
    expect(session.canUndo).toBe(false);
    expect(session.status.last()).toMatchObject({ level: 'warning', message: 'Delete root: nothing changed' });
  });

  it('records a throwing edit in the status log', () => {
    const session = openGrunt();
    const ok = session.edit('Explode', () => {
      throw new Error('boom');
    });
    expect(ok).toBe(false);
    expect(session.status.last()).toMatchObject({ level: 'error', message: 'Explode failed: boom' });
  });

  it('tracks modified fields', () => {
    const session = openGrunt();
    session.edit('Set health', doc => ({ ...doc, health: 60 }));
    expect(session.isFieldModified('health')).toBe(true);
    expect(session.isFieldModified('name')).toBe(false);
  });

  it('refuses a behavior edit on a document without a tree', () => {
    const session = new EditorSession();
    session.newMob('Blank', 'mobs/blank.mob');
    expect(session.editBehavior('Insert', tree => insertChild(tree, []))).toBe(false);
    expect(session.status.last()?.message).toBe('Insert: document has no behavior tree');
  });

  it('previews a patch merged over its base', () => {
    const session = new EditorSession();
    session.open({ health: 80 }, { path: 'mobs/grunt.mobpatch', kind: 'mobpatch', base: gruntDoc() });
    const preview = session.previewMob();
    expect(preview?.health).toBe(80);
    expect(preview?.name).toBe('Grunt');
    expect(session.compilePreview()?.tree.node).toEqual({ kind: 'Sequence' });
  });

  it('validates patches without requiring a name', () => {
    const session = new EditorSession();
    session.open({ health: 80 }, { path: 'mobs/grunt.mobpatch', kind: 'mobpatch' });
    expect(session.validate().valid).toBe(true);
  });

  it('checks patch field types even without a base', () => {
    const session = new EditorSession();
    session.open({ spawnable: 'yes' }, { path: 'mobs/grunt.mobpatch', kind: 'mobpatch' });
    const result = session.validate();
    expect(result.valid).toBe(false);
    expect(result.errorCount).toBe(1);
    expect(result.issues[0]).toEqual({
      path: 'spawnable',
      message: 'Mob definition error (grunt, spawnable): Expected boolean, received string',
      severity: 'error',
    });

    let called = false;
    expect(session.save(() => { called = true; })).toBe(false);
    expect(called).toBe(false);
    expect(session.status.last()?.message).toBe('Cannot save mobs/grunt.mobpatch: 1 validation error(s)');
  });

  it('rejects unknown fields in a patch without a base', () => {
    const session = new EditorSession();
    session.open({ health: 80, speed: 3 }, { path: 'mobs/grunt.mobpatch', kind: 'mobpatch' });
    const result = session.validate();
    expect(result.valid).toBe(false);
    expect(result.issues[result.issues.length - 1]).toMatchObject({ path: 'speed', severity: 'error' });
  });

  it('runs the closed schema on full mobs', () => {
    const session = new EditorSession();
    session.open({ name: 'Odd', health: 10, colliders: [{ shape: { Circle: 3 }, spin: 1 }] }, { path: 'mobs/odd.mob', kind: 'mob' });
    const result = session.validate();
    expect(result.valid).toBe(false);
    expect(result.issues[0]).toMatchObject({ path: 'colliders[0].spin', severity: 'error' });
  });

  it('saves valid documents and resets the modified flag', () => {
    const session = openGrunt();
    session.edit('Set health', doc => ({ ...doc, health: 45 }));
    const written: Record<string, string> = {};
    expect(session.save((path, text) => { written[path] = text; })).toBe(true);
    expect(parseToml(written['mobs/grunt.mob']).health).toBe(45);
    expect(session.isModified).toBe(false);
  });

  it('refuses to save an invalid document', () => {
    const session = openGrunt();
    session.edit('Clear name', doc => ({ ...doc, name: '' }));
    let called = false;
    expect(session.save(() => { called = true; })).toBe(false);
    expect(called).toBe(false);
    expect(session.status.last()?.message).toBe('Cannot save mobs/grunt.mob: 1 validation error(s)');
  });

  it('reports a failing writer without throwing', () => {
    const session = openGrunt();
    const ok = session.save(() => {
      throw new Error('disk full');
    });
    expect(ok).toBe(false);
    expect(session.status.last()?.message).toBe('Save failed: disk full');
  });
});
