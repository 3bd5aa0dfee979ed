/**
 * Authoring checks for mob documents.
 *
 * Looser than the schema in one way (patches need not be complete) and
 * stricter in another (physics ranges, positive timers, known behavior
 * types). Every problem is collected; nothing throws.
 */

import type { DataTable, DataValue } from '@mobforge/core';
import { isArray, isTable } from '@mobforge/core';
import {
  COMMAND_LAYOUTS,
  NODE_LAYOUTS,
  isBehaviorNodeType,
  isCommandAction,
  parseBehaviorCommand,
  parseBehaviorNode,
} from '@mobforge/behavior';
import type { BehaviorNodeType } from '@mobforge/behavior';
import { MOB_ASSET_FIELDS } from './schema';

export type IssueSeverity = 'error' | 'warning';

export interface ValidationIssue {
  path: string;
  message: string;
  severity: IssueSeverity;
}

export interface ValidationResult {
  issues: ValidationIssue[];
  errorCount: number;
  warningCount: number;
  valid: boolean;
}

class IssueCollector {
  readonly issues: ValidationIssue[] = [];

  error(path: string, message: string): void {
    this.issues.push({ path, message, severity: 'error' });
  }

  warning(path: string, message: string): void {
    this.issues.push({ path, message, severity: 'warning' });
  }

  result(): ValidationResult {
    const errorCount = this.issues.filter(i => i.severity === 'error').length;
    return {
      issues: this.issues,
      errorCount,
      warningCount: this.issues.length - errorCount,
      valid: errorCount === 0,
    };
  }
}

const POSITIVE_NUMBERS = [
  'max_angular_speed',
  'angular_acceleration',
  'angular_deceleration',
  'collider_density',
  'projectile_speed',
  'projectile_range_seconds',
];

const VEC2_FIELDS = ['max_linear_speed', 'linear_acceleration', 'linear_deceleration'];

export function validateMob(value: DataValue, options: { isPatch?: boolean } = {}): ValidationResult {
  const out = new IssueCollector();
  if (!isTable(value)) {
    out.error('', 'Root must be a table');
    return out.result();
  }

  for (const key of Object.keys(value)) {
    if (!MOB_ASSET_FIELDS.includes(key)) out.error(key, 'Unknown field');
  }

  const name = value.name;
  if (name === undefined) {
    if (!options.isPatch) out.error('name', 'Required field is missing');
  } else if (typeof name !== 'string') {
    out.error('name', 'Must be a string');
  } else if (name === '') {
    out.error('name', 'Cannot be empty');
  }

  if (value.health !== undefined) checkPositiveInteger(out, value.health, 'health');
  if (value.projectile_damage !== undefined) checkPositiveInteger(out, value.projectile_damage, 'projectile_damage');

  for (const field of VEC2_FIELDS) {
    if (value[field] !== undefined) checkVec2(out, value[field], field);
  }
  for (const field of POSITIVE_NUMBERS) {
    const item = value[field];
    if (item === undefined) continue;
    if (typeof item !== 'number') out.error(field, 'Must be a number');
    else if (item <= 0) out.error(field, 'Must be positive');
  }
  checkRange(out, value, 'restitution', 0, 1);
  checkRange(out, value, 'friction', 0, 10);

  if (value.colliders !== undefined) checkColliders(out, value.colliders);
  if (value.projectile_spawners !== undefined) {
    checkSpawners(out, value.projectile_spawners, 'projectile_spawners', ['projectile_type', 'faction']);
  }
  if (value.mob_spawners !== undefined) {
    checkSpawners(out, value.mob_spawners, 'mob_spawners', ['mob_ref']);
  }
  if (value.behavior !== undefined) checkBehavior(out, value.behavior, 'behavior');
  if (value.jointed_mobs !== undefined) checkJointedMobs(out, value.jointed_mobs);
  if (value.decorations !== undefined) checkDecorations(out, value.decorations);

  return out.result();
}

function checkPositiveInteger(out: IssueCollector, value: DataValue, path: string): void {
  if (typeof value !== 'number' || !Number.isInteger(value)) out.error(path, 'Must be an integer');
  else if (value <= 0) out.error(path, 'Must be a positive integer');
}

function checkRange(out: IssueCollector, table: DataTable, field: string, min: number, max: number): void {
  const value = table[field];
  if (value === undefined) return;
  if (typeof value !== 'number') {
    out.error(field, 'Must be a number');
  } else if (value < min || value > max) {
    out.error(field, `Must be between ${min} and ${max}`);
  }
}

function checkVec2(out: IssueCollector, value: DataValue, path: string): void {
  if (!isArray(value)) {
    out.error(path, 'Must be an array [x, y]');
    return;
  }
  if (value.length !== 2) {
    out.error(path, 'Must be an array of 2 numbers [x, y]');
    return;
  }
  value.forEach((item, i) => {
    if (typeof item !== 'number') out.error(path, `Element ${i} must be a number`);
  });
}

function checkColliders(out: IssueCollector, value: DataValue): void {
  if (!isArray(value)) {
    out.error('colliders', 'Must be an array');
    return;
  }
  value.forEach((collider, i) => {
    const path = `colliders[${i}]`;
    if (!isTable(collider)) {
      out.error(path, 'Must be a table');
      return;
    }
    if (collider.shape === undefined) out.error(path, "Missing required field 'shape'");
    else checkShape(out, collider.shape, `${path}.shape`);
    if (collider.position !== undefined) checkVec2(out, collider.position, `${path}.position`);
    if (collider.rotation !== undefined && typeof collider.rotation !== 'number') {
      out.error(`${path}.rotation`, 'Must be a number');
    }
  });
}

function checkShape(out: IssueCollector, value: DataValue, path: string): void {
  if (!isTable(value)) {
    out.error(path, 'Shape must be a table');
    return;
  }
  const entries = Object.entries(value);
  if (entries.length !== 1) {
    out.error(path, 'Shape must have exactly one type');
    return;
  }
  const [shapeType, dimensions] = entries[0];
  switch (shapeType) {
    case 'Rectangle':
      if (!isArray(dimensions) || dimensions.length !== 2) {
        out.error(path, 'Rectangle requires [width, height]');
        return;
      }
      dimensions.forEach((dim, i) => {
        if (typeof dim !== 'number') out.error(path, `Rectangle dimension ${i} must be a number`);
        else if (dim <= 0) out.error(path, `Rectangle dimension ${i} must be positive`);
      });
      return;
    case 'Circle':
      if (typeof dimensions !== 'number') out.error(path, 'Circle requires a radius number');
      else if (dimensions <= 0) out.error(path, 'Circle radius must be positive');
      return;
    case 'Capsule':
      if (!isArray(dimensions) || dimensions.length !== 2) {
        out.error(path, 'Capsule requires [radius, half_length]');
      }
      return;
    default:
      out.warning(path, `Unknown shape type '${shapeType}'`);
  }
}

function checkSpawners(out: IssueCollector, value: DataValue, root: string, required: string[]): void {
  if (!isTable(value)) {
    out.error(root, 'Must be a table');
    return;
  }
  const spawners = value.spawners;
  if (spawners === undefined) return;
  if (!isTable(spawners)) {
    out.error(`${root}.spawners`, 'Must be a table');
    return;
  }
  for (const [key, spawner] of Object.entries(spawners)) {
    const path = `${root}.spawners.${key}`;
    if (!isTable(spawner)) {
      out.error(path, 'Must be a table');
      continue;
    }
    const timer = spawner.timer;
    if (timer === undefined) out.error(path, "Missing required field 'timer'");
    else if (typeof timer !== 'number') out.error(`${path}.timer`, 'Must be a number');
    else if (timer <= 0) out.error(`${path}.timer`, 'Must be positive');
    for (const field of required) {
      if (spawner[field] === undefined) out.error(path, `Missing required field '${field}'`);
    }
  }
}

function checkBehavior(out: IssueCollector, value: DataValue, path: string): void {
  if (!isTable(value)) {
    out.error(path, 'Must be a table');
    return;
  }
  const type = value.type;
  if (type === undefined) {
    out.error(path, "Missing required field 'type'");
    return;
  }
  if (typeof type !== 'string') {
    out.error(`${path}.type`, 'Must be a string');
    return;
  }
  if (!isBehaviorNodeType(type)) {
    out.warning(`${path}.type`, `Unknown behavior type '${type}'`);
    return;
  }

  const layout = NODE_LAYOUTS[type];
  checkNodeFields(out, value, type, path);
  if (layout.listField) {
    const children = value[layout.listField];
    if (children === undefined) {
      out.error(path, `Missing required field '${layout.listField}'`);
    } else if (!isArray(children)) {
      out.error(`${path}.${layout.listField}`, 'Must be an array');
    } else {
      children.forEach((child, i) => checkBehavior(out, child, `${path}.${layout.listField}[${i}]`));
    }
  }
  for (const slot of layout.slots) {
    const child = value[slot.field];
    if (child !== undefined) checkBehavior(out, child, `${path}.${slot.field}`);
    else if (slot.required) out.error(path, `Missing required field '${slot.field}'`);
  }
  if (type === 'Action') checkCommands(out, value.behaviors, `${path}.behaviors`);
}

/**
 * Check a node's own fields. Children and commands are replaced by valid
 * stand-ins so that only this node's problems are reported here.
 */
function checkNodeFields(out: IssueCollector, value: DataTable, type: BehaviorNodeType, path: string): void {
  const layout = NODE_LAYOUTS[type];
  const stub: DataTable = { ...value };
  if (layout.listField) stub[layout.listField] = [];
  for (const slot of layout.slots) stub[slot.field] = slot.defaultNode();
  if (type === 'Action') stub.behaviors = [];

  const node = parseBehaviorNode(stub);
  if (node.type === 'Unknown') out.error(path, `Invalid ${type} node: ${node.reason}`);
}

function checkCommands(out: IssueCollector, value: DataValue | undefined, path: string): void {
  if (value === undefined) {
    out.error(path, 'Required field is missing');
    return;
  }
  if (!isArray(value)) {
    out.error(path, 'Must be an array');
    return;
  }
  value.forEach((command, i) => {
    const at = `${path}[${i}]`;
    if (!isTable(command)) {
      out.error(at, 'Must be a table');
      return;
    }
    const action = command.action;
    if (action === undefined) {
      out.error(at, "Missing required field 'action'");
      return;
    }
    if (!isCommandAction(action)) {
      out.error(`${at}.action`, `Unknown action '${String(action)}'`);
      return;
    }
    const nested = COMMAND_LAYOUTS[action].nestedList;
    if (nested) {
      checkCommands(out, command[nested], `${at}.${nested}`);
      if (parseBehaviorCommand({ ...command, [nested]: [] }) === null) {
        out.error(at, `Invalid parameters for ${action}`);
      }
    } else if (parseBehaviorCommand(command) === null) {
      out.error(at, `Invalid parameters for ${action}`);
    }
  });
}

function checkDecorations(out: IssueCollector, value: DataValue): void {
  if (!isArray(value)) {
    out.error('decorations', 'Must be an array');
    return;
  }
  value.forEach((decoration, i) => {
    const path = `decorations[${i}]`;
    if (!isArray(decoration)) {
      out.error(path, 'Must be an array [sprite_key, [x, y]]');
      return;
    }
    if (decoration.length !== 2) {
      out.error(path, 'Must be [sprite_key, [x, y]]');
      return;
    }
    const [sprite, position] = decoration;
    if (typeof sprite !== 'string') out.error(path, 'First element must be a string (sprite key)');
    if (!isArray(position)) out.error(path, 'Second element must be position [x, y]');
    else if (position.length !== 2) out.error(path, 'Position must be [x, y]');
  });
}

function checkJointedMobs(out: IssueCollector, value: DataValue): void {
  if (!isArray(value)) {
    out.error('jointed_mobs', 'Must be an array');
    return;
  }
  value.forEach((joint, i) => {
    const path = `jointed_mobs[${i}]`;
    if (!isTable(joint)) {
      out.error(path, 'Must be a table');
      return;
    }
    if (joint.key === undefined) out.error(path, "Missing required field 'key'");
    if (joint.mob_ref === undefined) out.error(path, "Missing required field 'mob_ref'");
  });
}

export function formatIssue(issue: ValidationIssue): string {
  const label = issue.severity === 'error' ? 'ERROR' : 'WARN';
  return issue.path ? `[${label}] ${issue.path}: ${issue.message}` : `[${label}] ${issue.message}`;
}

export function formatIssues(result: ValidationResult): string {
  return result.issues.map(formatIssue).join('\n');
}
