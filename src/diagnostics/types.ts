/**
 * Severity level for a diagnostic.
 */
export type DiagnosticSeverity = 'error' | 'warning' | 'info';

/**
 * A compiler diagnostic (error/warning/info) with an optional source location.
 *
 * Diagnostics must have stable IDs so downstream tooling can rely on them.
 */
export interface Diagnostic {
  /** Stable diagnostic identifier (e.g., `BFQ001`). */
  id: DiagnosticId;
  severity: DiagnosticSeverity;
  message: string;
  file: string;
  /** 1-based line number, when known. */
  line?: number;
  /** 1-based column number, when known. */
  column?: number;
}

/**
 * Known diagnostic IDs.
 */
export const DiagnosticIds = {
  /** Unknown/unclassified diagnostic. */
  Unknown: 'BFQ000',

  /** Failed to read a source file from disk. */
  IoReadFailed: 'BFQ001',

  /** Internal error during parsing (unexpected exception). */
  InternalParseError: 'BFQ002',

  /** A token that cannot start a statement and does not close an enclosing loop. */
  UnexpectedToken: 'BFQ100',

  /** Tokens ran out while a loop was still open. */
  EndOfInput: 'BFQ101',

  /** Compiler option outside its accepted range (tape size, cell stride). */
  InvalidOption: 'BFQ200',
} as const;

/**
 * Union type of all defined diagnostic IDs.
 */
export type DiagnosticId = (typeof DiagnosticIds)[keyof typeof DiagnosticIds];
