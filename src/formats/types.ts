import type { ProgramNode } from '../frontend/ast.js';
import type { Token } from '../frontend/tokens.js';
import type { QbeModule } from '../qbe/ir.js';

/**
 * Options shared by the text writers.
 */
export interface WriteTextOptions {
  /**
   * Line ending to use when emitting text formats.
   */
  lineEnding?: '\n' | '\r\n';
}

/**
 * In-memory QBE IL module text.
 */
export interface QbeArtifact {
  kind: 'qbe';
  text: string;
}

/**
 * In-memory AST outline (debug view).
 */
export interface AstArtifact {
  kind: 'ast';
  text: string;
}

/**
 * In-memory token dump, one token per line.
 */
export interface TokensArtifact {
  kind: 'tokens';
  text: string;
}

/**
 * Union of all artifact kinds produced by the compiler.
 */
export type Artifact = QbeArtifact | AstArtifact | TokensArtifact;

export type ArtifactKind = Artifact['kind'];

/**
 * Format writers used by the pipeline to turn compiler stage outputs into artifacts.
 */
export interface FormatWriters {
  writeQbe(module: QbeModule, opts?: WriteTextOptions): QbeArtifact;
  writeAst?(program: ProgramNode, opts?: WriteTextOptions): AstArtifact;
  writeTokens?(tokens: readonly Token[], opts?: WriteTextOptions): TokensArtifact;
}
