import type { BlockNode, ProgramNode, Statement, StatementNode } from './ast.js';
import type { SourceSpan, Token, TokenKind } from './tokens.js';
import { describeToken, isCountedToken } from './tokens.js';
import { lexSourceFile } from './lexer.js';
import type { SourceFile } from './source.js';
import { endOfFileSpan, makeSourceFile } from './source.js';
import type { Diagnostic } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';

/**
 * Parse errors surfaced to callers.
 */
export type ParseError = { kind: 'UnexpectedToken'; token: Token } | { kind: 'EndOfInput' };

/**
 * `recoverable` lets the caller try another alternative or end the current block;
 * `fatal` aborts the parse without trying anything else.
 */
export type ParseSeverity = 'recoverable' | 'fatal';

export type ParseFailure = { ok: false; severity: ParseSeverity; error: ParseError };

/**
 * `pos` is the index of the first token the parser did not consume.
 */
export type ParserResult<T> = { ok: true; pos: number; value: T } | ParseFailure;

/**
 * Parsers read `tokens` from index `pos` and never copy the stream.
 */
export type Parser<T> = (tokens: readonly Token[], pos: number) => ParserResult<T>;

export type ParseOutcome = { ok: true; ast: ProgramNode } | { ok: false; error: ParseError };

function success<T>(pos: number, value: T): ParserResult<T> {
  return { ok: true, pos, value };
}

function recoverable(error: ParseError): ParseFailure {
  return { ok: false, severity: 'recoverable', error };
}

/**
 * Try each alternative in order.
 *
 * Only recoverable failures backtrack; a fatal failure is returned as-is. When every
 * alternative fails, the last failure wins.
 */
export function alt<T>(...parsers: Parser<T>[]): Parser<T> {
  return (tokens, pos) => {
    let last: ParseFailure = recoverable({ kind: 'EndOfInput' });
    for (const p of parsers) {
      const res = p(tokens, pos);
      if (res.ok || res.severity === 'fatal') return res;
      last = res;
    }
    return last;
  };
}

/**
 * Consume exactly one token of the given kind.
 */
export function expectToken(
  tokens: readonly Token[],
  pos: number,
  kind: TokenKind,
): ParserResult<Token> {
  const first = tokens[pos];
  if (!first) return recoverable({ kind: 'EndOfInput' });
  if (first.kind !== kind) return recoverable({ kind: 'UnexpectedToken', token: first });
  return success(pos + 1, first);
}

function joinSpans(a: SourceSpan, b: SourceSpan): SourceSpan {
  return { file: a.file, start: a.start, end: b.end };
}

function statementNode(stat: Statement, span: SourceSpan): StatementNode {
  return { kind: 'Statement', attr: { span }, stat };
}

const simpleStatement: Parser<StatementNode> = (tokens, pos) => {
  const t = tokens[pos];
  if (!t) return recoverable({ kind: 'EndOfInput' });
  if (isCountedToken(t)) {
    switch (t.kind) {
      case 'MoveLeft':
      case 'MoveRight':
        return success(pos + 1, statementNode({ kind: t.kind, count: t.count }, t.span));
      case 'Increment':
        return success(pos + 1, statementNode({ kind: 'Add', count: t.count }, t.span));
      case 'Decrement':
        return success(pos + 1, statementNode({ kind: 'Subtract', count: t.count }, t.span));
    }
  }
  if (t.kind === 'Read' || t.kind === 'Write') {
    return success(pos + 1, statementNode({ kind: t.kind }, t.span));
  }
  return recoverable({ kind: 'UnexpectedToken', token: t });
};

const loopStatement: Parser<StatementNode> = (tokens, pos) => {
  const open = expectToken(tokens, pos, 'LoopOpen');
  if (!open.ok) return open;

  const inner = parseBlock(tokens, open.pos);
  if (!inner.ok) return inner;

  const close = expectToken(tokens, inner.pos, 'LoopClose');
  if (!close.ok) {
    // Report what stopped the inner block rather than the missing bracket itself.
    return inner.pos >= tokens.length ? close : inner.stop;
  }

  const stat: Statement = { kind: 'Loop', block: inner.value };
  return success(close.pos, statementNode(stat, joinSpans(open.value.span, close.value.span)));
};

export const parseStatement: Parser<StatementNode> = alt(simpleStatement, loopStatement);

export type BlockResult =
  | { ok: true; pos: number; value: BlockNode; stop: ParseFailure }
  | ParseFailure;

/**
 * Greedily parse statements until one fails.
 *
 * The token that ended the block is left at `pos`; `stop` is the failure that ended it,
 * so callers can report it if they cannot accept that token.
 */
export function parseBlock(tokens: readonly Token[], start = 0): BlockResult {
  const stats: StatementNode[] = [];
  let pos = start;
  for (;;) {
    const res = parseStatement(tokens, pos);
    if (!res.ok) {
      if (res.severity === 'fatal') return res;
      const first = stats[0]?.attr.span;
      const last = stats[stats.length - 1]?.attr.span;
      const block: BlockNode = {
        kind: 'Block',
        attr: first && last ? { span: joinSpans(first, last) } : {},
        stats,
      };
      return { ok: true, pos, value: block, stop: res };
    }
    stats.push(res.value);
    pos = res.pos;
  }
}

/**
 * Parse a full token stream. Every token must belong to the outer block.
 */
export function parse(tokens: readonly Token[]): ParseOutcome {
  const res = parseBlock(tokens);
  if (!res.ok) return { ok: false, error: res.error };
  if (res.pos < tokens.length) return { ok: false, error: res.stop.error };
  return { ok: true, ast: res.value };
}

/**
 * User-facing message for a parse error.
 */
export function describeParseError(error: ParseError): string {
  if (error.kind === 'EndOfInput') {
    return 'Unexpected end of input: a loop opened with "[" is never closed';
  }
  const token = error.token;
  if (token.kind === 'LoopClose') {
    return `Unexpected token ${describeToken(token)}: "]" has no matching "["`;
  }
  return `Unexpected token ${describeToken(token)}`;
}

function parseErrorDiagnostic(file: SourceFile, error: ParseError): Diagnostic {
  const where = error.kind === 'EndOfInput' ? endOfFileSpan(file) : error.token.span;
  return {
    id: error.kind === 'EndOfInput' ? DiagnosticIds.EndOfInput : DiagnosticIds.UnexpectedToken,
    severity: 'error',
    message: describeParseError(error),
    file: file.path,
    line: where.start.line,
    column: where.start.column,
  };
}

/**
 * Lex and parse a source file, reporting failures as diagnostics.
 *
 * `program` is absent when parsing failed; no partial tree is produced.
 */
export function parseProgram(
  filePath: string,
  text: string,
  diagnostics: Diagnostic[],
): { tokens: Token[]; program?: ProgramNode } {
  const file = makeSourceFile(filePath, text);
  const tokens = lexSourceFile(file);
  const res = parse(tokens);
  if (!res.ok) {
    diagnostics.push(parseErrorDiagnostic(file, res.error));
    return { tokens };
  }
  return { tokens, program: res.ast };
}
