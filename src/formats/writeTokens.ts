import type { Token } from '../frontend/tokens.js';
import { describeToken } from '../frontend/tokens.js';
import { withLineEnding } from './lineEnding.js';
import type { TokensArtifact, WriteTextOptions } from './types.js';

/**
 * Dump tokens as `Kind(count) @line:column`, one per line.
 */
export function writeTokens(tokens: readonly Token[], opts?: WriteTextOptions): TokensArtifact {
  const text = tokens
    .map((t) => `${describeToken(t)} @${t.span.start.line}:${t.span.start.column}\n`)
    .join('');
  return { kind: 'tokens', text: withLineEnding(text, opts) };
}
