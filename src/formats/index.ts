import type { FormatWriters } from './types.js';
import { writeAst } from './writeAst.js';
import { writeQbe } from './writeQbe.js';
import { writeTokens } from './writeTokens.js';

/**
 * Default in-memory artifact writers.
 *
 * These writers implement the `FormatWriters` contract and return artifacts without writing to disk.
 */
export const defaultFormatWriters: FormatWriters = {
  writeQbe,
  writeAst,
  writeTokens,
};
