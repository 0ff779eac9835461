import type { Token } from './tokens.js';
import { bareTokenChars, countedTokenChars } from './tokens.js';
import type { SourceFile } from './source.js';
import { advance, makeSourceFile, startOfFile } from './source.js';

/**
 * Scan source text into tokens.
 *
 * Lexing is total: runs of `<`, `>`, `+` and `-` collapse into one counted token,
 * `.`, `,`, `[` and `]` map to one token each, and every other character is commentary.
 */
export function lex(text: string, filePath = '<input>'): Token[] {
  return lexSourceFile(makeSourceFile(filePath, text));
}

export function lexSourceFile(file: SourceFile): Token[] {
  const text = file.text;
  const out: Token[] = [];
  let here = startOfFile;
  while (here.offset < text.length) {
    const ch = text[here.offset]!;

    const counted = countedTokenChars[ch];
    if (counted !== undefined) {
      let end = here.offset;
      while (end < text.length && text[end] === ch) end++;
      const next = advance(text, here, end);
      out.push({
        kind: counted,
        count: end - here.offset,
        span: { file: file.path, start: here, end: next },
      });
      here = next;
      continue;
    }

    const next = advance(text, here, here.offset + 1);
    const bare = bareTokenChars[ch];
    if (bare !== undefined) {
      out.push({ kind: bare, span: { file: file.path, start: here, end: next } });
    }
    here = next;
  }
  return out;
}
