import type { SourcePosition, SourceSpan } from './tokens.js';

export interface SourceFile {
  path: string;
  text: string;
}

export function makeSourceFile(path: string, text: string): SourceFile {
  return { path, text };
}

export const startOfFile: SourcePosition = { line: 1, column: 1, offset: 0 };

/**
 * Move `from` forward to offset `to`, counting newlines on the way.
 *
 * Columns count UTF-16 code units, matching string offsets.
 */
export function advance(text: string, from: SourcePosition, to: number): SourcePosition {
  let { line, column } = from;
  for (let i = from.offset; i < to; i++) {
    if (text[i] === '\n') {
      line++;
      column = 1;
    } else {
      column++;
    }
  }
  return { line, column, offset: to };
}

/** Zero-width span after the last character. */
export function endOfFileSpan(file: SourceFile): SourceSpan {
  const end = advance(file.text, startOfFile, file.text.length);
  return { file: file.path, start: end, end };
}
