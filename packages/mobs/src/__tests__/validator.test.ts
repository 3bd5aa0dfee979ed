import { describe, it, expect } from 'vitest';
import { validateMob, formatIssues } from '../validator';

describe('validateMob', () => {
  it('passes a well-formed mob', () => {
    const result = validateMob({
      name: 'Grunt',
      health: 40,
      restitution: 0.2,
      colliders: [{ shape: { Rectangle: [10, 12] }, position: [0, 0], rotation: 0 }],
      behavior: {
        type: 'Forever',
        children: [{ type: 'Action', name: 'Movement', behaviors: [{ action: 'MoveDown' }] }],
      },
    });
    expect(result.valid).toBe(true);
    expect(result.issues).toEqual([]);
  });

  it('requires a name on mobs but not on patches', () => {
    expect(formatIssues(validateMob({ health: 10 }))).toBe('[ERROR] name: Required field is missing');
    expect(validateMob({ health: 10 }, { isPatch: true }).valid).toBe(true);
  });

  it('rejects an empty name', () => {
    expect(formatIssues(validateMob({ name: '' }))).toBe('[ERROR] name: Cannot be empty');
  });

  it('checks numeric ranges', () => {
    const result = validateMob({ name: 'A', health: 0, restitution: 1.5, friction: -1, collider_density: 0 });
    expect(formatIssues(result)).toBe([
      '[ERROR] health: Must be a positive integer',
      '[ERROR] collider_density: Must be positive',
      '[ERROR] restitution: Must be between 0 and 1',
      '[ERROR] friction: Must be between 0 and 10',
    ].join('\n'));
    expect(result.errorCount).toBe(4);
  });

  it('checks vectors', () => {
    const result = validateMob({ name: 'A', max_linear_speed: [1, 'fast'], linear_acceleration: [1] });
    expect(formatIssues(result)).toBe([
      '[ERROR] max_linear_speed: Element 1 must be a number',
      '[ERROR] linear_acceleration: Must be an array of 2 numbers [x, y]',
    ].join('\n'));
  });

  it('warns about unknown collider shapes', () => {
    const result = validateMob({ name: 'A', colliders: [{ shape: { Triangle: 3 } }, { shape: { Circle: -1 } }] });
    expect(result.issues).toEqual([
      { path: 'colliders[0].shape', message: "Unknown shape type 'Triangle'", severity: 'warning' },
      { path: 'colliders[1].shape', message: 'Circle radius must be positive', severity: 'error' },
    ]);
    expect(formatIssues(result).split('\n')[0]).toBe("[WARN] colliders[0].shape: Unknown shape type 'Triangle'");
  });

  it('checks spawner required fields', () => {
    const result = validateMob({
      name: 'A',
      projectile_spawners: { spawners: { north: { timer: 0, faction: 'Enemy' } } },
      mob_spawners: { spawners: { bay: { position: [0, 0] } } },
    });
    expect(formatIssues(result)).toBe([
      '[ERROR] projectile_spawners.spawners.north.timer: Must be positive',
      "[ERROR] projectile_spawners.spawners.north: Missing required field 'projectile_type'",
      "[ERROR] mob_spawners.spawners.bay: Missing required field 'timer'",
      "[ERROR] mob_spawners.spawners.bay: Missing required field 'mob_ref'",
    ].join('\n'));
  });

  it('walks behavior trees through lists and slots', () => {
    const result = validateMob({
      name: 'A',
      behavior: {
        type: 'Sequence',
        children: [
          { type: 'Mystery' },
          { type: 'While', child: { seconds: 2 } },
          { type: 'Action', name: 'X', behaviors: [{ action: 'MoveTo', x: 1 }, { action: 'Teleport' }] },
        ],
      },
    });
    expect(formatIssues(result)).toBe([
      "[WARN] behavior.children[0].type: Unknown behavior type 'Mystery'",
      "[ERROR] behavior.children[1].child: Missing required field 'type'",
      '[ERROR] behavior.children[2].behaviors[0]: Invalid parameters for MoveTo',
      "[ERROR] behavior.children[2].behaviors[1].action: Unknown action 'Teleport'",
    ].join('\n'));
  });

  it('checks the fields of known behavior nodes', () => {
    const result = validateMob({
      name: 'A',
      behavior: {
        type: 'Sequence',
        children: [
          { type: 'Wait', seconds: 'soon' },
          { type: 'Action', behaviors: [] },
          { type: 'Trigger', trigger_type: 'OnHit', delay: 1 },
        ],
      },
    });
    expect(result.issues).toEqual([
      { path: 'behavior.children[0]', message: 'Invalid Wait node: seconds: Expected number, received string', severity: 'error' },
      { path: 'behavior.children[1]', message: 'Invalid Action node: missing field "name"', severity: 'error' },
      { path: 'behavior.children[2]', message: "Invalid Trigger node: Unrecognized key(s) in object: 'delay'", severity: 'error' },
    ]);
    expect(result.valid).toBe(false);
  });

  it('checks commands nested in transmit lists', () => {
    const result = validateMob({
      name: 'A',
      behavior: {
        type: 'Action',
        name: 'Relay',
        behaviors: [{ action: 'TransmitMobBehavior', mob_type: 'drone', behaviors: [{ action: 'DoForTime' }] }],
      },
    });
    expect(formatIssues(result)).toBe('[ERROR] behavior.behaviors[0].behaviors[0]: Invalid parameters for DoForTime');
  });

  it('checks jointed mobs and decorations', () => {
    const result = validateMob({
      name: 'A',
      jointed_mobs: [{ key: 'arm' }],
      decorations: [['eye', [1]], 'loose'],
    });
    expect(formatIssues(result)).toBe([
      "[ERROR] jointed_mobs[0]: Missing required field 'mob_ref'",
      '[ERROR] decorations[0]: Position must be [x, y]',
      '[ERROR] decorations[1]: Must be an array [sprite_key, [x, y]]',
    ].join('\n'));
  });

  it('flags unknown top-level fields', () => {
    expect(formatIssues(validateMob({ name: 'A', helth: 3 }))).toBe('[ERROR] helth: Unknown field');
  });
});
