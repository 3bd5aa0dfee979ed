/**
 * Shared error types.
 *
 * Structured errors for malformed source text and values that fall outside
 * the generic value model.
 */

export class MobParseError extends Error {
  public readonly source: string | undefined;
  public readonly line: number | undefined;

  constructor(message: string, source?: string, line?: number) {
    super(formatParseMessage(message, source, line));
    this.name = 'MobParseError';
    this.source = source;
    this.line = line;
  }
}

function formatParseMessage(message: string, source?: string, line?: number): string {
  const where = [source, line !== undefined ? `line ${line}` : undefined]
    .filter((part): part is string => part !== undefined)
    .join(', ');
  return where ? `Parse error (${where}): ${message}` : `Parse error: ${message}`;
}
