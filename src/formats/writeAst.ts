import type { ProgramNode } from '../frontend/ast.js';
import { printAst } from '../frontend/printAst.js';
import { withLineEnding } from './lineEnding.js';
import type { AstArtifact, WriteTextOptions } from './types.js';

export function writeAst(program: ProgramNode, opts?: WriteTextOptions): AstArtifact {
  return { kind: 'ast', text: withLineEnding(printAst(program), opts) };
}
