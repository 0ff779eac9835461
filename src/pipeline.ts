import type { Diagnostic } from './diagnostics/types.js';
import type { Artifact, FormatWriters } from './formats/types.js';

/**
 * Options that influence compilation behavior and which artifacts are produced.
 */
export interface CompilerOptions {
  /** Number of addressable tape cells. Default: 30000. */
  tapeCells?: number;
  /** Bytes between neighbouring cells: 1 (byte cells) or 8 (wide cells). Default: 1. */
  stride?: number;
  /** Emit the QBE IL module. Default: true unless another emit flag is given. */
  emitQbe?: boolean;
  /** Emit the AST outline. */
  emitAst?: boolean;
  /** Emit the token dump. */
  emitTokens?: boolean;
  /** Line ending for text artifacts. */
  lineEnding?: '\n' | '\r\n';
}

/**
 * Result of a compilation run: diagnostics plus any produced artifacts.
 */
export interface CompileResult {
  diagnostics: Diagnostic[];
  artifacts: Artifact[];
}

/**
 * Dependency injection surface for the compiler pipeline.
 *
 * Callers provide concrete format writers so the core pipeline can stay in-memory.
 */
export interface PipelineDeps {
  formats: FormatWriters;
}

/**
 * Top-level compile function signature used by the pipeline contract.
 */
export type CompileFn = (
  entryFile: string,
  options: CompilerOptions,
  deps: PipelineDeps,
) => Promise<CompileResult>;
