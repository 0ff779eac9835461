/**
 * Token contracts shared by the lexer and the parser.
 */
export interface SourcePosition {
  /** 1-based line number. */
  line: number;
  /** 1-based column number. */
  column: number;
  /** 0-based character offset in the file. */
  offset: number;
}

/**
 * Source span; `end` points just past the last character.
 */
export interface SourceSpan {
  /** User-facing file path (as provided on input). */
  file: string;
  start: SourcePosition;
  end: SourcePosition;
}

/**
 * Token kinds that carry a run length.
 */
export type CountedTokenKind = 'MoveLeft' | 'MoveRight' | 'Increment' | 'Decrement';

/**
 * Token kinds produced from a single character.
 */
export type BareTokenKind = 'Read' | 'Write' | 'LoopOpen' | 'LoopClose';

export type TokenKind = CountedTokenKind | BareTokenKind;

/**
 * A coalesced run of one directional/arithmetic character. `count` is always >= 1.
 */
export interface CountedToken {
  readonly kind: CountedTokenKind;
  readonly count: number;
  readonly span: SourceSpan;
}

export interface BareToken {
  readonly kind: BareTokenKind;
  readonly span: SourceSpan;
}

export type Token = CountedToken | BareToken;

export const countedTokenChars: Readonly<Record<string, CountedTokenKind>> = {
  '<': 'MoveLeft',
  '>': 'MoveRight',
  '+': 'Increment',
  '-': 'Decrement',
};

export const bareTokenChars: Readonly<Record<string, BareTokenKind>> = {
  '.': 'Write',
  ',': 'Read',
  '[': 'LoopOpen',
  ']': 'LoopClose',
};

export function isCountedToken(token: Token): token is CountedToken {
  return 'count' in token;
}

/**
 * Short user-facing rendering, e.g. `MoveRight(3)` or `LoopClose`.
 */
export function describeToken(token: Token): string {
  return isCountedToken(token) ? `${token.kind}(${token.count})` : token.kind;
}
