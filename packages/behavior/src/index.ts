export {
  parseBehaviorNode,
  parseBehaviorCommand,
  behaviorNodeToValue,
  behaviorCommandToValue,
} from './parser';
export { compileBehavior, compileBehaviorValue, compileCommand } from './compiler';
export type { CompileResult, CompileDiagnostic, DiagnosticCode } from './compiler';
export { formatBehaveTree, formatMobBehavior } from './runtime';
export type { Behave, BehaveTree, MobBehavior, Vec2 } from './runtime';
export * from './types';
