/**
 * mobforge validate <file>
 *
 * Runs the authoring checks and the closed schema over one `.mob` or
 * `.mobpatch` file.
 */

import { formatIssues } from '@mobforge/mobs';
import { EditorSession, documentKind } from '@mobforge/editor';
import type { CLIOptions } from '../index';
import { CLIError, EXIT_CODE } from '../index';
import { getPositionals } from '../flags';
import { readDocument } from '../project';

export async function validateCommand(options: CLIOptions, args: string[]): Promise<number> {
  const [file] = getPositionals(args);
  if (!file) {
    throw new CLIError('Usage: mobforge validate <file>');
  }

  const session = new EditorSession();
  session.open(readDocument(file), { path: file, kind: documentKind(file) });
  const result = session.validate();
  const exitCode = result.valid ? EXIT_CODE.SUCCESS : EXIT_CODE.POLICY_VIOLATION;

  if (options.format === 'json') {
    console.log(JSON.stringify({ file, ...result }, null, 2));
    return exitCode;
  }

  if (result.issues.length > 0) {
    console.log(formatIssues(result));
  }
  console.log(`${file}: ${result.valid ? 'valid' : 'invalid'} (${result.errorCount} error(s), ${result.warningCount} warning(s))`);
  return exitCode;
}
