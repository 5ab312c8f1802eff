/**
 * Ledger Domain Errors
 *
 * Custom error classes for parsing, file format and file access failures.
 */

export class LedgerError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'LedgerError';
  }
}

export class LedgerParseError extends LedgerError {
  readonly line: number | undefined;

  constructor(message: string, line?: number) {
    super(line === undefined ? message : `Line ${line}: ${message}`);
    this.name = 'LedgerParseError';
    this.line = line;
  }
}

export class LedgerFormatError extends LedgerError {
  constructor(
    readonly line: number,
    readonly segments: number,
    expected: number
  ) {
    super(`Line ${line}: expected ${expected} fields but found ${segments}`);
    this.name = 'LedgerFormatError';
  }
}

export class LedgerIOError extends LedgerError {
  constructor(
    readonly path: string,
    action: 'read' | 'write',
    cause: unknown
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to ${action} ledger file ${path}: ${reason}`, { cause });
    this.name = 'LedgerIOError';
  }
}
