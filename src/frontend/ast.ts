/**
 * Frontend AST contracts.
 *
 * The tree is strict: every loop owns exactly one nested block and nothing is shared.
 */
import type { SourceSpan } from './tokens.js';

/**
 * Attribute slot carried by every node.
 *
 * Code generation does not read it; it exists for tooling metadata such as source spans.
 */
export interface NodeAttr {
  span?: SourceSpan;
}

/**
 * Ordered statement sequence. May be empty.
 */
export interface BlockNode {
  kind: 'Block';
  attr: NodeAttr;
  stats: readonly StatementNode[];
}

export interface StatementNode {
  kind: 'Statement';
  attr: NodeAttr;
  stat: Statement;
}

export type CountedStatementKind = 'MoveLeft' | 'MoveRight' | 'Add' | 'Subtract';

export type Statement =
  | { readonly kind: CountedStatementKind; readonly count: number }
  | { readonly kind: 'Read' }
  | { readonly kind: 'Write' }
  | { readonly kind: 'Loop'; readonly block: BlockNode };

/**
 * Root of a parsed program.
 */
export type ProgramNode = BlockNode;
