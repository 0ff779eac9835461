import { describe, expect, it } from 'vitest';

import { DiagnosticIds } from '../src/diagnostics/types.js';
import type { Diagnostic } from '../src/diagnostics/types.js';
import type { StatementNode } from '../src/frontend/ast.js';
import { lex } from '../src/frontend/lexer.js';
import type { Parser } from '../src/frontend/parser.js';
import {
  alt,
  expectToken,
  parse,
  parseBlock,
  parseProgram,
  parseStatement,
} from '../src/frontend/parser.js';
import { blockShape, loopDepth } from './helpers/ast.js';

function parseOk(source: string) {
  const res = parse(lex(source));
  if (!res.ok) throw new Error(`expected ${JSON.stringify(source)} to parse`);
  return res.ast;
}

describe('parser statements', () => {
  it('maps every simple token to its statement', () => {
    expect(blockShape(parseOk('<>+-,.'))).toEqual([
      { kind: 'MoveLeft', count: 1 },
      { kind: 'MoveRight', count: 1 },
      { kind: 'Add', count: 1 },
      { kind: 'Subtract', count: 1 },
      { kind: 'Read' },
      { kind: 'Write' },
    ]);
  });

  it('parses a single statement and leaves the rest', () => {
    const res = parseStatement(lex('<<>'), 0);
    expect(res.ok).toBe(true);
    if (!res.ok) return;
    expect(res.value.stat).toEqual({ kind: 'MoveLeft', count: 2 });
    expect(res.pos).toBe(1);
  });

  it('parses from the given position', () => {
    const res = parseStatement(lex('+ , >'), 1);
    expect(res.ok).toBe(true);
    if (!res.ok) return;
    expect(res.value.stat).toEqual({ kind: 'Read' });
    expect(res.pos).toBe(2);
  });

  it('fails recoverably on a closing bracket', () => {
    const tokens = lex(']');
    const res = parseStatement(tokens, 0);
    expect(res).toEqual({
      ok: false,
      severity: 'recoverable',
      error: { kind: 'UnexpectedToken', token: tokens[0] },
    });
  });

  it('fails recoverably with EndOfInput on an empty stream', () => {
    expect(parseStatement(lex('+'), 1)).toEqual({
      ok: false,
      severity: 'recoverable',
      error: { kind: 'EndOfInput' },
    });
  });
});

describe('parser blocks', () => {
  it('stops at the first token that is not a statement and returns it unconsumed', () => {
    const tokens = lex('+>]<');
    const res = parseBlock(tokens);
    expect(res.ok).toBe(true);
    if (!res.ok) return;
    expect(res.value.stats).toHaveLength(2);
    expect(res.pos).toBe(2);
    expect(tokens[res.pos]?.kind).toBe('LoopClose');
    expect(res.stop.error.kind).toBe('UnexpectedToken');
  });

  it('parses an empty block from an empty stream', () => {
    const ast = parseOk('');
    expect(ast.kind).toBe('Block');
    expect(ast.stats).toEqual([]);
  });

  it('parses the clear-cell idiom', () => {
    expect(blockShape(parseOk('[-]'))).toEqual([
      { kind: 'Loop', block: [{ kind: 'Subtract', count: 1 }] },
    ]);
  });

  it('parses empty loops', () => {
    expect(blockShape(parseOk('[]'))).toEqual([{ kind: 'Loop', block: [] }]);
  });

  it('matches loop depth to bracket depth', () => {
    expect(loopDepth(parseOk('+'))).toBe(0);
    expect(loopDepth(parseOk('[[]][]'))).toBe(2);
    expect(loopDepth(parseOk('[>[<[+]-]]'))).toBe(3);
  });

  it('keeps statement order inside nested loops', () => {
    expect(blockShape(parseOk('+[>[-]<]'))).toEqual([
      { kind: 'Add', count: 1 },
      {
        kind: 'Loop',
        block: [
          { kind: 'MoveRight', count: 1 },
          { kind: 'Loop', block: [{ kind: 'Subtract', count: 1 }] },
          { kind: 'MoveLeft', count: 1 },
        ],
      },
    ]);
  });

  it('attaches source spans to statements and loops', () => {
    const ast = parseOk('+\n[-]');
    const loop = ast.stats[1];
    expect(loop?.attr.span?.start).toEqual({ line: 2, column: 1, offset: 2 });
    expect(loop?.attr.span?.end).toEqual({ line: 2, column: 4, offset: 5 });
  });
});

describe('parser errors', () => {
  it('parses long programs in linear time', () => {
    const tokens = lex('+>'.repeat(50_000));
    const started = performance.now();
    const res = parse(tokens);
    const elapsed = performance.now() - started;
    expect(res.ok).toBe(true);
    if (!res.ok) return;
    expect(res.ast.stats).toHaveLength(100_000);
    expect(elapsed).toBeLessThan(2_000);
  });

  it('reports EndOfInput for an unmatched opening bracket', () => {
    expect(parse(lex('+[-'))).toEqual({ ok: false, error: { kind: 'EndOfInput' } });
  });

  it('reports EndOfInput when several loops are left open', () => {
    expect(parse(lex('[[+]'))).toEqual({ ok: false, error: { kind: 'EndOfInput' } });
    expect(parse(lex('[[['))).toEqual({ ok: false, error: { kind: 'EndOfInput' } });
  });

  it('reports UnexpectedToken for a stray closing bracket', () => {
    const tokens = lex('+]');
    expect(parse(tokens)).toEqual({
      ok: false,
      error: { kind: 'UnexpectedToken', token: tokens[1] },
    });
  });

  it('reports the stray bracket that follows a complete loop', () => {
    const tokens = lex('[-]]');
    const res = parse(tokens);
    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.error).toEqual({ kind: 'UnexpectedToken', token: tokens[3] });
  });

  it('produces diagnostics with locations through parseProgram', () => {
    const diagnostics: Diagnostic[] = [];
    const res = parseProgram('bad.b', '++\n  ]', diagnostics);
    expect(res.program).toBeUndefined();
    expect(res.tokens).toHaveLength(2);
    expect(diagnostics).toEqual([
      {
        id: DiagnosticIds.UnexpectedToken,
        severity: 'error',
        message: 'Unexpected token LoopClose: "]" has no matching "["',
        file: 'bad.b',
        line: 2,
        column: 3,
      },
    ]);
  });

  it('points EndOfInput diagnostics at the end of the file', () => {
    const diagnostics: Diagnostic[] = [];
    parseProgram('open.b', '[\n+', diagnostics);
    expect(diagnostics).toEqual([
      {
        id: DiagnosticIds.EndOfInput,
        severity: 'error',
        message: 'Unexpected end of input: a loop opened with "[" is never closed',
        file: 'open.b',
        line: 2,
        column: 2,
      },
    ]);
  });
});

describe('parser combinators', () => {
  const never: Parser<StatementNode> = (tokens, pos) => {
    const t = tokens[pos];
    return {
      ok: false,
      severity: 'recoverable',
      error: t ? { kind: 'UnexpectedToken', token: t } : { kind: 'EndOfInput' },
    };
  };
  const fatal: Parser<StatementNode> = () => ({
    ok: false,
    severity: 'fatal',
    error: { kind: 'EndOfInput' },
  });

  it('backtracks past recoverable failures', () => {
    const res = alt(never, parseStatement)(lex('+'), 0);
    expect(res.ok).toBe(true);
  });

  it('stops at a fatal failure without trying later alternatives', () => {
    const res = alt(fatal, parseStatement)(lex('+'), 0);
    expect(res).toEqual({ ok: false, severity: 'fatal', error: { kind: 'EndOfInput' } });
  });

  it('expectToken distinguishes exhaustion from a mismatch', () => {
    const tokens = lex('[');
    expect(expectToken(tokens, 1, 'LoopClose')).toEqual({
      ok: false,
      severity: 'recoverable',
      error: { kind: 'EndOfInput' },
    });
    expect(expectToken(tokens, 0, 'LoopClose')).toEqual({
      ok: false,
      severity: 'recoverable',
      error: { kind: 'UnexpectedToken', token: tokens[0] },
    });
    expect(expectToken(tokens, 0, 'LoopOpen')).toEqual({ ok: true, pos: 1, value: tokens[0] });
  });
});
