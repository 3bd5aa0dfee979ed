/**
 * Behavior tree compiler.
 *
 * Lowers an authored tree into the runtime's executable form. Anything the
 * runtime cannot express yet (conditions, triggers, unreadable nodes) still
 * compiles to something harmless and is reported as a diagnostic with the
 * path of the node it concerns.
 */

import type { BehaviorCommand, BehaviorNode, BehaviorNodeType } from './types';
import { slotIndex } from './types';
import type { BehaveTree, MobBehavior } from './runtime';
import { parseBehaviorNode } from './parser';

export type DiagnosticCode =
  | 'unknown-node'
  | 'condition-ignored'
  | 'else-ignored'
  | 'trigger-unimplemented';

export interface CompileDiagnostic {
  code: DiagnosticCode;
  path: number[];
  message: string;
}

export interface CompileResult {
  tree: BehaveTree;
  diagnostics: CompileDiagnostic[];
}

export function compileCommand(command: BehaviorCommand): MobBehavior {
  switch (command.action) {
    case 'MoveTo':
      return { type: 'MoveTo', target: { x: command.x, y: command.y } };
    case 'SpawnMob':
    case 'SpawnProjectile':
      return { type: command.action, keys: command.keys ? [...command.keys] : null };
    case 'DoForTime':
      return { type: 'DoForTime', seconds: command.seconds };
    case 'TransmitMobBehavior':
      return {
        type: 'TransmitMobBehavior',
        mobType: command.mob_type,
        behaviors: command.behaviors.map(compileCommand),
      };
    case 'RotateJointsClockwise':
      return { type: 'RotateJointsClockwise', keys: [...command.keys] };
    default:
      return { type: command.action };
  }
}

function formatPath(path: number[]): string {
  return path.length === 0 ? 'root' : path.join('.');
}

const leaf = (node: BehaveTree['node']): BehaveTree => ({ node, children: [] });

function childPath(path: number[], type: BehaviorNodeType, field: string): number[] {
  return [...path, slotIndex(type, field)];
}

function compileNode(node: BehaviorNode, path: number[], diagnostics: CompileDiagnostic[]): BehaveTree {
  switch (node.type) {
    case 'Forever': {
      const children = node.children.map((child, i) => compileNode(child, [...path, i], diagnostics));
      const body = children.length === 1
        ? children[0]
        : { node: { kind: 'Sequence' as const }, children };
      return { node: { kind: 'Forever' }, children: [body] };
    }
    case 'Sequence':
    case 'Fallback':
      return {
        node: { kind: node.type },
        children: node.children.map((child, i) => compileNode(child, [...path, i], diagnostics)),
      };
    case 'While': {
      if (node.condition) {
        compileNode(node.condition, childPath(path, 'While', 'condition'), diagnostics);
        diagnostics.push({
          code: 'condition-ignored',
          path,
          message: `While at ${formatPath(path)}: condition is not evaluated; the child repeats unconditionally`,
        });
      }
      const child = compileNode(node.child, childPath(path, 'While', 'child'), diagnostics);
      return { node: { kind: 'While' }, children: [child] };
    }
    case 'IfThen': {
      compileNode(node.condition, childPath(path, 'IfThen', 'condition'), diagnostics);
      diagnostics.push({
        code: 'condition-ignored',
        path,
        message: `IfThen at ${formatPath(path)}: condition is not evaluated; then_child always runs`,
      });
      const then = compileNode(node.then_child, childPath(path, 'IfThen', 'then_child'), diagnostics);
      if (node.else_child) {
        compileNode(node.else_child, childPath(path, 'IfThen', 'else_child'), diagnostics);
        diagnostics.push({
          code: 'else-ignored',
          path,
          message: `IfThen at ${formatPath(path)}: else_child never runs`,
        });
      }
      return then;
    }
    case 'Wait':
      return leaf({ kind: 'Wait', seconds: node.seconds });
    case 'Action':
      return leaf({ kind: 'SpawnNamed', name: node.name, behaviors: node.behaviors.map(compileCommand) });
    case 'Trigger':
      diagnostics.push({
        code: 'trigger-unimplemented',
        path,
        message: `Trigger "${node.trigger_type}" at ${formatPath(path)} is not implemented; compiled as Wait 0s`,
      });
      return leaf({ kind: 'Wait', seconds: 0 });
    case 'Unknown':
      diagnostics.push({
        code: 'unknown-node',
        path,
        message: `Unreadable node${node.declaredType === undefined ? '' : ` of type "${node.declaredType}"`} at ${formatPath(path)}: ${node.reason}; compiled as Wait 0s`,
      });
      return leaf({ kind: 'Wait', seconds: 0 });
  }
}

export function compileBehavior(node: BehaviorNode): CompileResult {
  const diagnostics: CompileDiagnostic[] = [];
  const tree = compileNode(node, [], diagnostics);
  return { tree, diagnostics };
}

/** Parse and compile an authored tree in one step. */
export function compileBehaviorValue(raw: unknown): CompileResult {
  return compileBehavior(parseBehaviorNode(raw));
}
