/**
 * Executable behavior trees as the game runtime consumes them.
 */

import type { SimpleCommandAction } from './types';

export interface Vec2 {
  x: number;
  y: number;
}

export type MobBehavior =
  | { type: SimpleCommandAction }
  | { type: 'MoveTo'; target: Vec2 }
  | { type: 'SpawnMob'; keys: string[] | null }
  | { type: 'SpawnProjectile'; keys: string[] | null }
  | { type: 'DoForTime'; seconds: number }
  | { type: 'TransmitMobBehavior'; mobType: string; behaviors: MobBehavior[] }
  | { type: 'RotateJointsClockwise'; keys: string[] };

export type Behave =
  | { kind: 'Forever' }
  | { kind: 'Sequence' }
  | { kind: 'Fallback' }
  | { kind: 'While' }
  | { kind: 'Wait'; seconds: number }
  | { kind: 'SpawnNamed'; name: string; behaviors: MobBehavior[] };

export interface BehaveTree {
  node: Behave;
  children: BehaveTree[];
}

export function formatMobBehavior(behavior: MobBehavior): string {
  switch (behavior.type) {
    case 'MoveTo':
      return `MoveTo(${behavior.target.x}, ${behavior.target.y})`;
    case 'SpawnMob':
    case 'SpawnProjectile':
      return `${behavior.type}(${behavior.keys === null ? '*' : behavior.keys.join(', ')})`;
    case 'DoForTime':
      return `DoForTime(${behavior.seconds}s)`;
    case 'TransmitMobBehavior':
      return `TransmitMobBehavior(${behavior.mobType}: [${behavior.behaviors.map(formatMobBehavior).join(', ')}])`;
    case 'RotateJointsClockwise':
      return `RotateJointsClockwise(${behavior.keys.join(', ')})`;
    default:
      return behavior.type;
  }
}

function formatBehave(node: Behave): string {
  switch (node.kind) {
    case 'Wait':
      return `Wait ${node.seconds}s`;
    case 'SpawnNamed':
      return `SpawnNamed "${node.name}" [${node.behaviors.map(formatMobBehavior).join(', ')}]`;
    default:
      return node.kind;
  }
}

/** Indented outline, two spaces per level, one node per line. */
export function formatBehaveTree(tree: BehaveTree): string {
  const lines: string[] = [];
  const walk = (current: BehaveTree, depth: number): void => {
    lines.push(`${'  '.repeat(depth)}${formatBehave(current.node)}`);
    for (const child of current.children) walk(child, depth + 1);
  };
  walk(tree, 0);
  return lines.join('\n');
}
