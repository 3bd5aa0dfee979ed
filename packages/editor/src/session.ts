/**
 * Editor session: one open document, its history and its status log.
 *
 * Failures inside the session (a throwing edit, a refused save) are
 * recorded in the status log and reported through return values.
 */

import type { DataTable, DataValue } from '@mobforge/core';
import { cloneValue, isTable, mergeValues, stringifyToml, valuesEqual } from '@mobforge/core';
import type { CompileResult } from '@mobforge/behavior';
import { compileBehaviorValue } from '@mobforge/behavior';
import type { ValidationResult } from '@mobforge/mobs';
import { MobDefinitionError, normalizeMobRef, parseMobAsset, parseMobPatch, validateMob } from '@mobforge/mobs';
import { History, DEFAULT_HISTORY_LIMIT } from './history';
import { StatusLog } from './status-log';
import type { DocumentKind } from './files';
import { newMobDocument } from './files';

export interface OpenOptions {
  path: string;
  kind: DocumentKind;
  /** Resolved definition a patch applies to, for the merged preview. */
  base?: DataTable;
}

export interface SessionOptions {
  historyLimit?: number;
}

interface OpenDocument {
  path: string;
  kind: DocumentKind;
  base: DataTable | undefined;
  current: DataTable;
  original: DataTable;
  preview: DataTable;
}

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

export class EditorSession {
  readonly status = new StatusLog();
  private readonly history: History<DataTable>;
  private doc: OpenDocument | null = null;

  constructor(options: SessionOptions = {}) {
    this.history = new History<DataTable>(options.historyLimit ?? DEFAULT_HISTORY_LIMIT);
  }

  open(doc: DataTable, options: OpenOptions): void {
    const current = cloneValue(doc);
    const base = options.base ? cloneValue(options.base) : undefined;
    this.doc = {
      path: options.path,
      kind: options.kind,
      base,
      current,
      original: cloneValue(current),
      preview: this.buildPreview(current, options.kind, base),
    };
    this.history.clear();
    this.status.success(`Opened ${options.path}`);
  }

  newMob(name: string, path: string): void {
    this.open(newMobDocument(name), { path, kind: 'mob' });
  }

  get isOpen(): boolean {
    return this.doc !== null;
  }

  get path(): string | undefined {
    return this.doc?.path;
  }

  get kind(): DocumentKind | undefined {
    return this.doc?.kind;
  }

  /** Copy of the document being edited. */
  get document(): DataTable | undefined {
    return this.doc ? cloneValue(this.doc.current) : undefined;
  }

  get canUndo(): boolean {
    return this.history.canUndo();
  }

  get canRedo(): boolean {
    return this.history.canRedo();
  }

  /**
   * Apply a whole-document edit. `fn` gets a copy of the document and
   * returns the next one. Returns true when the document changed.
   */
  edit(label: string, fn: (doc: DataTable) => DataValue): boolean {
    const doc = this.doc;
    if (!doc) {
      this.status.error(`${label}: no document open`);
      return false;
    }
    let next: DataValue;
    try {
      next = fn(cloneValue(doc.current));
    } catch (e: unknown) {
      this.status.error(`${label} failed: ${errorMessage(e)}`);
      return false;
    }
    if (!isTable(next)) {
      this.status.error(`${label} failed: document root must be a table`);
      return false;
    }
    if (valuesEqual(next, doc.current)) {
      this.status.warning(`${label}: nothing changed`);
      return false;
    }
    this.history.push(doc.current);
    this.replace(next);
    this.status.success(label);
    return true;
  }

  /** Apply a tree edit to the document's `behavior` tree. */
  editBehavior(label: string, fn: (tree: DataValue) => DataValue): boolean {
    if (this.doc && !Object.hasOwn(this.doc.current, 'behavior')) {
      this.status.error(`${label}: document has no behavior tree`);
      return false;
    }
    return this.edit(label, doc => ({ ...doc, behavior: fn(doc.behavior) }));
  }

  undo(): boolean {
    const doc = this.doc;
    const previous = doc ? this.history.undo(doc.current) : undefined;
    if (!previous) {
      this.status.warning('Nothing to undo');
      return false;
    }
    this.replace(previous);
    this.status.success('Undo');
    return true;
  }

  redo(): boolean {
    const doc = this.doc;
    const next = doc ? this.history.redo(doc.current) : undefined;
    if (!next) {
      this.status.warning('Nothing to redo');
      return false;
    }
    this.replace(next);
    this.status.success('Redo');
    return true;
  }

  get isModified(): boolean {
    return this.doc !== null && !valuesEqual(this.doc.current, this.doc.original);
  }

  isFieldModified(field: string): boolean {
    if (!this.doc) return false;
    const { current, original } = this.doc;
    const now = Object.hasOwn(current, field) ? current[field] : undefined;
    const before = Object.hasOwn(original, field) ? original[field] : undefined;
    return !valuesEqual(now, before);
  }

  /** Base merged with the patch for patches; the document itself for mobs. */
  previewMob(): DataTable | undefined {
    return this.doc ? cloneValue(this.doc.preview) : undefined;
  }

  compilePreview(): CompileResult | null {
    const behavior = this.doc?.preview.behavior;
    return behavior === undefined ? null : compileBehaviorValue(behavior);
  }

  validate(): ValidationResult {
    const doc = this.doc;
    if (!doc) {
      return { issues: [{ path: '', message: 'No document open', severity: 'error' }], errorCount: 1, warningCount: 0, valid: false };
    }
    const result = validateMob(doc.current, { isPatch: doc.kind === 'mobpatch' });
    if (result.errorCount > 0) return result;

    const entity = normalizeMobRef(doc.path);
    try {
      if (doc.kind === 'mob') {
        parseMobAsset(doc.current, entity);
      } else {
        parseMobPatch(doc.current, entity);
        if (doc.base) parseMobAsset(doc.preview, entity);
      }
    } catch (e: unknown) {
      if (!(e instanceof MobDefinitionError)) throw e;
      const issues = [...result.issues, { path: e.field ?? '', message: e.message, severity: 'error' as const }];
      return { issues, errorCount: result.errorCount + 1, warningCount: result.warningCount, valid: false };
    }
    return result;
  }

  /**
   * Validate, serialize and hand the TOML text to `write`. Nothing is
   * written when validation finds errors.
   */
  save(write: (path: string, text: string) => void): boolean {
    const doc = this.doc;
    if (!doc) {
      this.status.error('Save failed: no document open');
      return false;
    }
    const validation = this.validate();
    if (!validation.valid) {
      this.status.error(`Cannot save ${doc.path}: ${validation.errorCount} validation error(s)`);
      return false;
    }
    try {
      write(doc.path, stringifyToml(doc.current));
    } catch (e: unknown) {
      this.status.error(`Save failed: ${errorMessage(e)}`);
      return false;
    }
    doc.original = cloneValue(doc.current);
    this.status.success(`Saved ${doc.path}`);
    return true;
  }

  private replace(next: DataTable): void {
    if (!this.doc) return;
    this.doc.current = next;
    this.doc.preview = this.buildPreview(next, this.doc.kind, this.doc.base);
  }

  private buildPreview(current: DataTable, kind: DocumentKind, base: DataTable | undefined): DataTable {
    if (kind === 'mobpatch' && base) {
      const merged = mergeValues(base, current);
      if (isTable(merged)) return merged;
    }
    return cloneValue(current);
  }
}
