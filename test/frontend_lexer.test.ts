import { describe, expect, it } from 'vitest';

import { lex } from '../src/frontend/lexer.js';
import { describeToken } from '../src/frontend/tokens.js';
import { shapes } from './helpers/ast.js';

describe('lexer', () => {
  it('returns no tokens for empty input', () => {
    expect(lex('')).toEqual([]);
  });

  it('coalesces runs of directional and arithmetic characters', () => {
    expect(shapes(lex('>>>'))).toEqual([{ kind: 'MoveRight', count: 3 }]);
    expect(shapes(lex('+'))).toEqual([{ kind: 'Increment', count: 1 }]);
    expect(shapes(lex('<<--++'))).toEqual([
      { kind: 'MoveLeft', count: 2 },
      { kind: 'Decrement', count: 2 },
      { kind: 'Increment', count: 2 },
    ]);
  });

  it('emits one token per bare character, without coalescing', () => {
    expect(shapes(lex('..,,[]]'))).toEqual([
      { kind: 'Write' },
      { kind: 'Write' },
      { kind: 'Read' },
      { kind: 'Read' },
      { kind: 'LoopOpen' },
      { kind: 'LoopClose' },
      { kind: 'LoopClose' },
    ]);
  });

  it('drops commentary without affecting adjacent runs', () => {
    expect(shapes(lex('add ++ two +\n and print.'))).toEqual([
      { kind: 'Increment', count: 2 },
      { kind: 'Increment', count: 1 },
      { kind: 'Write' },
    ]);
  });

  it('does not join runs separated by commentary', () => {
    expect(shapes(lex('> >'))).toEqual([
      { kind: 'MoveRight', count: 1 },
      { kind: 'MoveRight', count: 1 },
    ]);
  });

  it('is total over arbitrary text', () => {
    const noise = 'héllo wörld 🙂 \u0000 \t\r\n{}()#$%^&*~`|\\/?!@';
    expect(() => lex(noise)).not.toThrow();
    expect(lex(noise)).toEqual([]);
  });

  it('records line and column spans', () => {
    const tokens = lex('x\n  ++[', 'prog.b');
    expect(tokens.map((t) => [describeToken(t), t.span.start.line, t.span.start.column])).toEqual([
      ['Increment(2)', 2, 3],
      ['LoopOpen', 2, 5],
    ]);
    expect(tokens[0]?.span).toEqual({
      file: 'prog.b',
      start: { line: 2, column: 3, offset: 4 },
      end: { line: 2, column: 5, offset: 6 },
    });
  });

  it('lexes the clear-cell idiom', () => {
    expect(shapes(lex('[-]'))).toEqual([
      { kind: 'LoopOpen' },
      { kind: 'Decrement', count: 1 },
      { kind: 'LoopClose' },
    ]);
  });
});
