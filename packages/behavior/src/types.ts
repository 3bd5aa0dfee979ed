/**
 * Behavior DSL types.
 *
 * Authored behavior trees are tagged by `type`; action commands by `action`.
 * The layout tables at the bottom of this file are the single description
 * of each variant's shape. Parser, compiler and editor all read them.
 */

import type { DataTable } from '@mobforge/core';

// ============================================================================
// Nodes
// ============================================================================

export const CONTROL_NODE_TYPES = ['Forever', 'Sequence', 'Fallback'] as const;
export const BINARY_NODE_TYPES = ['While', 'IfThen'] as const;
export const LEAF_NODE_TYPES = ['Wait', 'Action', 'Trigger'] as const;

export const BEHAVIOR_NODE_TYPES = [
  ...CONTROL_NODE_TYPES,
  ...BINARY_NODE_TYPES,
  ...LEAF_NODE_TYPES,
] as const;

export type ControlNodeType = (typeof CONTROL_NODE_TYPES)[number];
export type BinaryNodeType = (typeof BINARY_NODE_TYPES)[number];
export type LeafNodeType = (typeof LEAF_NODE_TYPES)[number];
export type BehaviorNodeType = (typeof BEHAVIOR_NODE_TYPES)[number];

export interface ControlNode {
  type: ControlNodeType;
  children: BehaviorNode[];
}

export interface WhileNode {
  type: 'While';
  condition?: BehaviorNode;
  child: BehaviorNode;
}

export interface IfThenNode {
  type: 'IfThen';
  condition: BehaviorNode;
  then_child: BehaviorNode;
  else_child?: BehaviorNode;
}

export interface WaitNode {
  type: 'Wait';
  seconds: number;
}

export interface ActionNode {
  type: 'Action';
  name: string;
  behaviors: BehaviorCommand[];
}

export interface TriggerNode {
  type: 'Trigger';
  trigger_type: string;
}

/**
 * A node the parser could not read: an unrecognized `type`, a missing
 * required field or a field of the wrong shape. Kept in place so the rest
 * of the tree survives.
 */
export interface UnknownNode {
  type: 'Unknown';
  declaredType: string | undefined;
  raw: unknown;
  reason: string;
}

export type BehaviorNode =
  | ControlNode
  | WhileNode
  | IfThenNode
  | WaitNode
  | ActionNode
  | TriggerNode
  | UnknownNode;

// ============================================================================
// Commands
// ============================================================================

export const SIMPLE_COMMAND_ACTIONS = [
  'MoveDown',
  'MoveUp',
  'MoveLeft',
  'MoveRight',
  'BrakeHorizontal',
  'BrakeAngular',
  'FindPlayerTarget',
  'MoveToTarget',
  'RotateToTarget',
  'MoveForward',
  'LoseTarget',
] as const;

export const COMMAND_ACTIONS = [
  'MoveDown',
  'MoveUp',
  'MoveLeft',
  'MoveRight',
  'BrakeHorizontal',
  'BrakeAngular',
  'MoveTo',
  'FindPlayerTarget',
  'MoveToTarget',
  'RotateToTarget',
  'MoveForward',
  'LoseTarget',
  'SpawnMob',
  'SpawnProjectile',
  'DoForTime',
  'TransmitMobBehavior',
  'RotateJointsClockwise',
] as const;

export type SimpleCommandAction = (typeof SIMPLE_COMMAND_ACTIONS)[number];
export type CommandAction = (typeof COMMAND_ACTIONS)[number];

export interface SimpleCommand {
  action: SimpleCommandAction;
}

export interface MoveToCommand {
  action: 'MoveTo';
  x: number;
  y: number;
}

/** Omitted `keys` means every spawner fires. */
export interface SpawnCommand {
  action: 'SpawnMob' | 'SpawnProjectile';
  keys?: string[];
}

export interface DoForTimeCommand {
  action: 'DoForTime';
  seconds: number;
}

export interface TransmitMobBehaviorCommand {
  action: 'TransmitMobBehavior';
  mob_type: string;
  behaviors: BehaviorCommand[];
}

export interface RotateJointsClockwiseCommand {
  action: 'RotateJointsClockwise';
  keys: string[];
}

export type BehaviorCommand =
  | SimpleCommand
  | MoveToCommand
  | SpawnCommand
  | DoForTimeCommand
  | TransmitMobBehaviorCommand
  | RotateJointsClockwiseCommand;

// ============================================================================
// Layouts
// ============================================================================

export type NodeCategory = 'control' | 'binary' | 'leaf';

export interface SlotLayout {
  field: string;
  required: boolean;
  /** Node placed in the slot when the editor fills it. */
  defaultNode: () => DataTable;
}

export interface NodeLayout {
  category: NodeCategory;
  /** Field holding the child list of a control node. */
  listField?: 'children';
  /** Single-node slots of a binary node, in path index order. */
  slots: SlotLayout[];
  /** Non-child fields a freshly retyped node starts with. */
  defaultFields: () => DataTable;
}

const actionNode = (name: string): DataTable => ({ type: 'Action', name, behaviors: [] });
const waitNode = (seconds: number): DataTable => ({ type: 'Wait', seconds });

const controlLayout: NodeLayout = {
  category: 'control',
  listField: 'children',
  slots: [],
  defaultFields: () => ({ children: [] }),
};

export const NODE_LAYOUTS: Record<BehaviorNodeType, NodeLayout> = {
  Forever: controlLayout,
  Sequence: controlLayout,
  Fallback: controlLayout,
  While: {
    category: 'binary',
    slots: [
      { field: 'condition', required: false, defaultNode: () => waitNode(1.0) },
      { field: 'child', required: true, defaultNode: () => actionNode('Child') },
    ],
    defaultFields: () => ({}),
  },
  IfThen: {
    category: 'binary',
    slots: [
      { field: 'condition', required: true, defaultNode: () => waitNode(1.0) },
      { field: 'then_child', required: true, defaultNode: () => actionNode('Then') },
      { field: 'else_child', required: false, defaultNode: () => actionNode('Else') },
    ],
    defaultFields: () => ({}),
  },
  Wait: { category: 'leaf', slots: [], defaultFields: () => ({ seconds: 1.0 }) },
  Action: { category: 'leaf', slots: [], defaultFields: () => ({ name: 'New Action', behaviors: [] }) },
  Trigger: { category: 'leaf', slots: [], defaultFields: () => ({ trigger_type: '' }) },
};

export interface CommandLayout {
  /** Parameters a freshly retyped command starts with. */
  defaultParams: () => DataTable;
  /** Field holding a nested command list. */
  nestedList?: 'behaviors';
}

const noParams: CommandLayout = { defaultParams: () => ({}) };

export const COMMAND_LAYOUTS: Record<CommandAction, CommandLayout> = {
  MoveDown: noParams,
  MoveUp: noParams,
  MoveLeft: noParams,
  MoveRight: noParams,
  BrakeHorizontal: noParams,
  BrakeAngular: noParams,
  MoveTo: { defaultParams: () => ({ x: 0, y: 0 }) },
  FindPlayerTarget: noParams,
  MoveToTarget: noParams,
  RotateToTarget: noParams,
  MoveForward: noParams,
  LoseTarget: noParams,
  SpawnMob: noParams,
  SpawnProjectile: noParams,
  DoForTime: { defaultParams: () => ({ seconds: 1.0 }) },
  TransmitMobBehavior: {
    defaultParams: () => ({ mob_type: '', behaviors: [] }),
    nestedList: 'behaviors',
  },
  RotateJointsClockwise: { defaultParams: () => ({ keys: [] }) },
};

const NODE_TYPE_SET: ReadonlySet<string> = new Set(BEHAVIOR_NODE_TYPES);
const CONTROL_TYPE_SET: ReadonlySet<string> = new Set(CONTROL_NODE_TYPES);
const ACTION_SET: ReadonlySet<string> = new Set(COMMAND_ACTIONS);

export function isBehaviorNodeType(value: unknown): value is BehaviorNodeType {
  return typeof value === 'string' && NODE_TYPE_SET.has(value);
}

export function isControlNodeType(value: unknown): value is ControlNodeType {
  return typeof value === 'string' && CONTROL_TYPE_SET.has(value);
}

export function isCommandAction(value: unknown): value is CommandAction {
  return typeof value === 'string' && ACTION_SET.has(value);
}

/** Path index of a named slot on a binary node, or -1. */
export function slotIndex(type: BehaviorNodeType, field: string): number {
  return NODE_LAYOUTS[type].slots.findIndex(slot => slot.field === field);
}
