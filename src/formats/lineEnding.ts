import type { WriteTextOptions } from './types.js';

/**
 * Rewrite `\n`-terminated text to the requested line ending.
 */
export function withLineEnding(text: string, opts?: WriteTextOptions): string {
  const lineEnding = opts?.lineEnding ?? '\n';
  return lineEnding === '\n' ? text : text.split('\n').join(lineEnding);
}
