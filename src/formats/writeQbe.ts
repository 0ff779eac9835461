import type { QbeModule } from '../qbe/ir.js';
import { printModule } from '../qbe/print.js';
import { withLineEnding } from './lineEnding.js';
import type { QbeArtifact, WriteTextOptions } from './types.js';

/**
 * Create the `.ssa` artifact consumed by the QBE backend.
 */
export function writeQbe(module: QbeModule, opts?: WriteTextOptions): QbeArtifact {
  return { kind: 'qbe', text: withLineEnding(printModule(module), opts) };
}
