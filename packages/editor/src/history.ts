/**
 * Bounded undo/redo history of document snapshots.
 */

export const DEFAULT_HISTORY_LIMIT = 50;

export class History<T> {
  private past: T[] = [];
  private future: T[] = [];

  constructor(readonly maxSize: number = DEFAULT_HISTORY_LIMIT) {}

  /** Record the state before an edit. Clears anything that could be redone. */
  push(snapshot: T): void {
    this.past.push(structuredClone(snapshot));
    this.trim();
    this.future = [];
  }

  /** Step back from `current`; undefined when there is nothing to undo. */
  undo(current: T): T | undefined {
    const previous = this.past.pop();
    if (previous === undefined) return undefined;
    this.future.push(structuredClone(current));
    return previous;
  }

  redo(current: T): T | undefined {
    const next = this.future.pop();
    if (next === undefined) return undefined;
    this.past.push(structuredClone(current));
    this.trim();
    return next;
  }

  canUndo(): boolean {
    return this.past.length > 0;
  }

  canRedo(): boolean {
    return this.future.length > 0;
  }

  clear(): void {
    this.past = [];
    this.future = [];
  }

  get undoDepth(): number {
    return this.past.length;
  }

  get redoDepth(): number {
    return this.future.length;
  }

  private trim(): void {
    while (this.past.length > this.maxSize) this.past.shift();
  }
}
