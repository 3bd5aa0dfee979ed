/**
 * Mob definition errors.
 */

import type { ZodError, ZodIssue } from 'zod';

export class MobDefinitionError extends Error {
  public readonly entity: string;
  public readonly field: string | undefined;

  constructor(message: string, entity: string, field?: string) {
    super(field ? `Mob definition error (${entity}, ${field}): ${message}` : `Mob definition error (${entity}): ${message}`);
    this.name = 'MobDefinitionError';
    this.entity = entity;
    this.field = field;
  }
}

/** `colliders[0].shape` style rendering of an issue path. */
export function formatFieldPath(path: (string | number)[]): string {
  let out = '';
  for (const step of path) {
    if (typeof step === 'number') out += `[${step}]`;
    else out += out ? `.${step}` : step;
  }
  return out;
}

function describeIssue(issue: ZodIssue): { field: string; message: string } {
  const at = formatFieldPath(issue.path);
  if (issue.code === 'unrecognized_keys') {
    const key = issue.keys[0] ?? '';
    return { field: at ? `${at}.${key}` : key, message: `unknown field "${key}"` };
  }
  if (issue.code === 'invalid_type' && issue.received === 'undefined') {
    return { field: at, message: 'missing required field' };
  }
  return { field: at, message: issue.message };
}

export function definitionErrorFromZod(entity: string, error: ZodError): MobDefinitionError {
  const issue = error.issues[0];
  if (!issue) return new MobDefinitionError('invalid definition', entity);
  const { field, message } = describeIssue(issue);
  return new MobDefinitionError(message, entity, field || undefined);
}
