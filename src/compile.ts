import { readFile } from 'node:fs/promises';

import type { Diagnostic } from './diagnostics/types.js';
import { DiagnosticIds } from './diagnostics/types.js';
import type { Artifact, WriteTextOptions } from './formats/types.js';
import { parseProgram } from './frontend/parser.js';
import { emitProgram } from './lowering/emit.js';
import type { CompileFn, CompilerOptions, CompileResult, PipelineDeps } from './pipeline.js';

function hasErrors(diagnostics: Diagnostic[]): boolean {
  return diagnostics.some((d) => d.severity === 'error');
}

function withDefaults(
  options: CompilerOptions,
): Required<Pick<CompilerOptions, 'emitQbe' | 'emitAst' | 'emitTokens'>> {
  const anyEmitSpecified = [options.emitQbe, options.emitAst, options.emitTokens].some(
    (v) => v !== undefined,
  );

  const emitQbe = anyEmitSpecified ? (options.emitQbe ?? false) : true;
  const emitAst = options.emitAst ?? false;
  const emitTokens = options.emitTokens ?? false;

  return { emitQbe, emitAst, emitTokens };
}

/**
 * Compile already-loaded source text.
 *
 * Stages run in order (lex, parse, lower, write) and the first stage that reports an error
 * ends the run with no artifacts.
 */
export function compileSource(
  file: string,
  text: string,
  options: CompilerOptions,
  deps: PipelineDeps,
): CompileResult {
  const diagnostics: Diagnostic[] = [];

  let parsed: ReturnType<typeof parseProgram>;
  try {
    parsed = parseProgram(file, text, diagnostics);
  } catch (err) {
    diagnostics.push({
      id: DiagnosticIds.InternalParseError,
      severity: 'error',
      message: `Internal error during parse: ${String(err)}`,
      file,
    });
    return { diagnostics, artifacts: [] };
  }
  const { tokens, program } = parsed;
  if (!program || hasErrors(diagnostics)) {
    return { diagnostics, artifacts: [] };
  }

  const { module } = emitProgram(program, diagnostics, {
    file,
    ...(options.tapeCells !== undefined ? { tapeCells: options.tapeCells } : {}),
    ...(options.stride !== undefined ? { stride: options.stride } : {}),
  });
  if (!module || hasErrors(diagnostics)) {
    return { diagnostics, artifacts: [] };
  }

  const emit = withDefaults(options);
  const textOpts: WriteTextOptions = options.lineEnding ? { lineEnding: options.lineEnding } : {};
  const artifacts: Artifact[] = [];

  if (emit.emitTokens) {
    if (deps.formats.writeTokens) {
      artifacts.push(deps.formats.writeTokens(tokens, textOpts));
    } else {
      diagnostics.push({
        id: DiagnosticIds.Unknown,
        severity: 'warning',
        message: 'emitTokens=true but no token writer is configured; skipping token dump.',
        file,
      });
    }
  }
  if (emit.emitAst) {
    if (deps.formats.writeAst) {
      artifacts.push(deps.formats.writeAst(program, textOpts));
    } else {
      diagnostics.push({
        id: DiagnosticIds.Unknown,
        severity: 'warning',
        message: 'emitAst=true but no AST writer is configured; skipping AST outline.',
        file,
      });
    }
  }
  if (emit.emitQbe) {
    artifacts.push(deps.formats.writeQbe(module, textOpts));
  }

  return { diagnostics, artifacts };
}

/**
 * Compile a program from a source file.
 *
 * Read failures become an `IoReadFailed` diagnostic; nothing is thrown for user errors.
 */
export const compile: CompileFn = async (
  entryFile: string,
  options: CompilerOptions,
  deps: PipelineDeps,
): Promise<CompileResult> => {
  let sourceText: string;
  try {
    sourceText = await readFile(entryFile, 'utf8');
  } catch (err) {
    return {
      diagnostics: [
        {
          id: DiagnosticIds.IoReadFailed,
          severity: 'error',
          message: `Failed to read entry file: ${String(err)}`,
          file: entryFile,
        },
      ],
      artifacts: [],
    };
  }

  return compileSource(entryFile, sourceText, options, deps);
};
