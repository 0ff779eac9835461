import { describe, expect, it } from 'vitest';
import { readdir } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

import { compile } from '../src/compile.js';
import { defaultFormatWriters } from '../src/formats/index.js';
import type { Artifact } from '../src/formats/types.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const allEmits = { emitQbe: true, emitAst: true, emitTokens: true };

async function exampleEntries(): Promise<string[]> {
  const examplesDir = join(__dirname, '..', 'examples');
  return (await readdir(examplesDir, { withFileTypes: true }))
    .filter((e) => e.isFile() && e.name.endsWith('.b'))
    .map((e) => join(examplesDir, e.name))
    .sort((a, b) => a.localeCompare(b));
}

function artifactTexts(artifacts: Artifact[]): Array<{ kind: string; data: string }> {
  return artifacts.map((a) => ({ kind: a.kind, data: a.text }));
}

describe('examples', () => {
  it('compile cleanly', async () => {
    const entries = await exampleEntries();
    expect(entries.length).toBeGreaterThan(0);

    for (const entry of entries) {
      const res = await compile(entry, allEmits, { formats: defaultFormatWriters });
      expect(res.diagnostics).toEqual([]);
      expect(res.artifacts.map((a) => a.kind)).toEqual(['tokens', 'ast', 'qbe']);
    }
  });

  it('compile deterministically across repeated runs', async () => {
    for (const entry of await exampleEntries()) {
      const first = await compile(entry, allEmits, { formats: defaultFormatWriters });
      const firstSnap = artifactTexts(first.artifacts);

      for (let i = 0; i < 3; i++) {
        const next = await compile(entry, allEmits, { formats: defaultFormatWriters });
        expect(next.diagnostics).toEqual([]);
        expect(artifactTexts(next.artifacts)).toEqual(firstSnap);
      }
    }
  });
});
