/**
 * Behavior DSL parser.
 *
 * Reads an authored behavior tree from a generic value. Parsing never
 * throws: a node that cannot be read becomes an `Unknown` node in place
 * and its siblings and ancestors are still parsed normally.
 */

import { z } from 'zod';
import type { DataTable, DataValue } from '@mobforge/core';
import { toDataValue } from '@mobforge/core';
import type {
  BehaviorCommand,
  BehaviorNode,
  CommandAction,
  IfThenNode,
  UnknownNode,
  WhileNode,
} from './types';
import {
  CONTROL_NODE_TYPES,
  NODE_LAYOUTS,
  SIMPLE_COMMAND_ACTIONS,
  isBehaviorNodeType,
  isCommandAction,
} from './types';

type Parsed<T> = { ok: true; value: T } | { ok: false; reason: string };

// ============================================================================
// Command schemas
// ============================================================================

const KeysSchema = z.array(z.string());

const CommandSchema: z.ZodType<BehaviorCommand, z.ZodTypeDef, unknown> = z
  .unknown()
  .transform((raw, ctx) => {
    const parsed = parseCommand(raw);
    if (!parsed.ok) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: parsed.reason });
      return z.NEVER;
    }
    return parsed.value;
  });

const SimpleCommandSchema = z.object({ action: z.enum(SIMPLE_COMMAND_ACTIONS) }).strict();

const MoveToSchema = z.object({
  action: z.literal('MoveTo'),
  x: z.number(),
  y: z.number(),
}).strict();

const SpawnSchema = z.object({
  action: z.enum(['SpawnMob', 'SpawnProjectile']),
  keys: KeysSchema.optional(),
}).strict();

const DoForTimeSchema = z.object({
  action: z.literal('DoForTime'),
  seconds: z.number(),
}).strict();

const TransmitSchema = z.object({
  action: z.literal('TransmitMobBehavior'),
  mob_type: z.string(),
  behaviors: z.array(z.lazy(() => CommandSchema)),
}).strict();

const RotateJointsSchema = z.object({
  action: z.literal('RotateJointsClockwise'),
  keys: KeysSchema,
}).strict();

const COMMAND_SCHEMAS: Record<CommandAction, z.ZodType<BehaviorCommand, z.ZodTypeDef, unknown>> = {
  MoveDown: SimpleCommandSchema,
  MoveUp: SimpleCommandSchema,
  MoveLeft: SimpleCommandSchema,
  MoveRight: SimpleCommandSchema,
  BrakeHorizontal: SimpleCommandSchema,
  BrakeAngular: SimpleCommandSchema,
  MoveTo: MoveToSchema,
  FindPlayerTarget: SimpleCommandSchema,
  MoveToTarget: SimpleCommandSchema,
  RotateToTarget: SimpleCommandSchema,
  MoveForward: SimpleCommandSchema,
  LoseTarget: SimpleCommandSchema,
  SpawnMob: SpawnSchema,
  SpawnProjectile: SpawnSchema,
  DoForTime: DoForTimeSchema,
  TransmitMobBehavior: TransmitSchema,
  RotateJointsClockwise: RotateJointsSchema,
};

// ============================================================================
// Node schemas (child slots are read separately)
// ============================================================================

const ControlSchema = z.object({
  type: z.enum(CONTROL_NODE_TYPES),
  children: z.array(z.unknown()),
}).strict();

const WhileSchema = z.object({
  type: z.literal('While'),
  condition: z.unknown(),
  child: z.unknown(),
}).strict();

const IfThenSchema = z.object({
  type: z.literal('IfThen'),
  condition: z.unknown(),
  then_child: z.unknown(),
  else_child: z.unknown(),
}).strict();

const WaitSchema = z.object({ type: z.literal('Wait'), seconds: z.number() }).strict();

const ActionSchema = z.object({
  type: z.literal('Action'),
  name: z.string(),
  behaviors: z.array(CommandSchema),
}).strict();

const TriggerSchema = z.object({ type: z.literal('Trigger'), trigger_type: z.string() }).strict();

// ============================================================================
// Parsing
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describeZodError(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) return 'invalid value';
  const at = issue.path.join('.');
  if (issue.code === z.ZodIssueCode.invalid_type && issue.received === 'undefined') {
    return `missing field "${at}"`;
  }
  return at ? `${at}: ${issue.message}` : issue.message;
}

function parseCommand(raw: unknown): Parsed<BehaviorCommand> {
  if (!isRecord(raw)) return { ok: false, reason: 'command must be a table' };
  const action = raw.action;
  if (action === undefined) return { ok: false, reason: 'missing field "action"' };
  if (!isCommandAction(action)) {
    return { ok: false, reason: `unknown action ${JSON.stringify(action)}` };
  }
  const result = COMMAND_SCHEMAS[action].safeParse(raw);
  return result.success
    ? { ok: true, value: result.data }
    : { ok: false, reason: describeZodError(result.error) };
}

function unknownNode(declaredType: string | undefined, raw: unknown, reason: string): UnknownNode {
  return { type: 'Unknown', declaredType, raw, reason };
}

/** Parse one action command; `null` when it is malformed. */
export function parseBehaviorCommand(raw: unknown): BehaviorCommand | null {
  const parsed = parseCommand(raw);
  return parsed.ok ? parsed.value : null;
}

export function parseBehaviorNode(raw: unknown): BehaviorNode {
  if (!isRecord(raw)) return unknownNode(undefined, raw, 'node must be a table');

  const declared = raw.type;
  if (typeof declared !== 'string') return unknownNode(undefined, raw, 'missing field "type"');
  if (!isBehaviorNodeType(declared)) {
    return unknownNode(declared, raw, `unknown node type "${declared}"`);
  }

  for (const slot of NODE_LAYOUTS[declared].slots) {
    if (slot.required && raw[slot.field] === undefined) {
      return unknownNode(declared, raw, `missing field "${slot.field}"`);
    }
  }

  switch (declared) {
    case 'Forever':
    case 'Sequence':
    case 'Fallback': {
      const result = ControlSchema.safeParse(raw);
      if (!result.success) return unknownNode(declared, raw, describeZodError(result.error));
      return { type: result.data.type, children: result.data.children.map(child => parseBehaviorNode(child)) };
    }
    case 'While': {
      const result = WhileSchema.safeParse(raw);
      if (!result.success) return unknownNode(declared, raw, describeZodError(result.error));
      const node: WhileNode = { type: 'While', child: parseBehaviorNode(result.data.child) };
      if (result.data.condition !== undefined) node.condition = parseBehaviorNode(result.data.condition);
      return node;
    }
    case 'IfThen': {
      const result = IfThenSchema.safeParse(raw);
      if (!result.success) return unknownNode(declared, raw, describeZodError(result.error));
      const node: IfThenNode = {
        type: 'IfThen',
        condition: parseBehaviorNode(result.data.condition),
        then_child: parseBehaviorNode(result.data.then_child),
      };
      if (result.data.else_child !== undefined) node.else_child = parseBehaviorNode(result.data.else_child);
      return node;
    }
    case 'Wait': {
      const result = WaitSchema.safeParse(raw);
      return result.success ? result.data : unknownNode(declared, raw, describeZodError(result.error));
    }
    case 'Action': {
      const result = ActionSchema.safeParse(raw);
      return result.success ? result.data : unknownNode(declared, raw, describeZodError(result.error));
    }
    case 'Trigger': {
      const result = TriggerSchema.safeParse(raw);
      return result.success ? result.data : unknownNode(declared, raw, describeZodError(result.error));
    }
  }
}

// ============================================================================
// Back to generic values
// ============================================================================

export function behaviorCommandToValue(command: BehaviorCommand): DataTable {
  switch (command.action) {
    case 'MoveTo':
      return { action: command.action, x: command.x, y: command.y };
    case 'SpawnMob':
    case 'SpawnProjectile':
      return command.keys === undefined
        ? { action: command.action }
        : { action: command.action, keys: [...command.keys] };
    case 'DoForTime':
      return { action: command.action, seconds: command.seconds };
    case 'TransmitMobBehavior':
      return {
        action: command.action,
        mob_type: command.mob_type,
        behaviors: command.behaviors.map(behaviorCommandToValue),
      };
    case 'RotateJointsClockwise':
      return { action: command.action, keys: [...command.keys] };
    default:
      return { action: command.action };
  }
}

/**
 * Convert a parsed tree back to its authored form. Unknown nodes are
 * written back as they were read.
 */
export function behaviorNodeToValue(node: BehaviorNode): DataValue {
  switch (node.type) {
    case 'Forever':
    case 'Sequence':
    case 'Fallback':
      return { type: node.type, children: node.children.map(behaviorNodeToValue) };
    case 'While': {
      const table: DataTable = { type: node.type };
      if (node.condition) table.condition = behaviorNodeToValue(node.condition);
      table.child = behaviorNodeToValue(node.child);
      return table;
    }
    case 'IfThen': {
      const table: DataTable = {
        type: node.type,
        condition: behaviorNodeToValue(node.condition),
        then_child: behaviorNodeToValue(node.then_child),
      };
      if (node.else_child) table.else_child = behaviorNodeToValue(node.else_child);
      return table;
    }
    case 'Wait':
      return { type: node.type, seconds: node.seconds };
    case 'Action':
      return { type: node.type, name: node.name, behaviors: node.behaviors.map(behaviorCommandToValue) };
    case 'Trigger':
      return { type: node.type, trigger_type: node.trigger_type };
    case 'Unknown':
      return toDataValue(node.raw);
  }
}
