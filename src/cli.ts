#!/usr/bin/env node
import { mkdir, writeFile } from 'node:fs/promises';
import { existsSync, readFileSync, realpathSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import { compile } from './compile.js';
import type { Diagnostic } from './diagnostics/types.js';
import { defaultFormatWriters } from './formats/index.js';
import type { Artifact, ArtifactKind } from './formats/types.js';
import type { CompilerOptions } from './pipeline.js';

type CliExit = { code: number };

type CliOptions = {
  entryFile: string;
  outputPath?: string;
  emit: ArtifactKind;
  tapeCells?: number;
  stride?: number;
};

function usage(): string {
  return [
    'bfqc [options] <program.b>',
    '',
    'Options:',
    '  -o, --output <file>     Write the artifact to <file> instead of stdout',
    '  -e, --emit <kind>       Artifact to produce: qbe|ast|tokens (default: qbe)',
    '      --tape-cells <n>    Number of tape cells (default: 30000)',
    '      --stride <n>        Bytes per cell: 1|8 (default: 1)',
    '  -V, --version           Print version',
    '  -h, --help              Show help',
    '',
    'Notes:',
    '  - <program.b> must be the last argument.',
    '  - The QBE module is written to stdout unless --output is given.',
    '',
  ].join('\n');
}

function fail(message: string): never {
  throw Object.assign(new Error(message), { name: 'CliError' });
}

function parseIntegerFlag(flag: string, value: string): number {
  if (!/^[0-9]+$/.test(value)) fail(`${flag} expects a non-negative integer (got "${value}")`);
  return Number.parseInt(value, 10);
}

function packageVersion(): string {
  let dir = dirname(fileURLToPath(import.meta.url));
  for (;;) {
    const candidate = join(dir, 'package.json');
    if (existsSync(candidate)) {
      const pkg = JSON.parse(readFileSync(candidate, 'utf8')) as { version?: unknown };
      return String(pkg.version ?? '0.0.0');
    }
    const parent = dirname(dir);
    if (parent === dir) return '0.0.0';
    dir = parent;
  }
}

function parseArgs(argv: string[]): CliOptions | CliExit {
  let outputPath: string | undefined;
  let emit: ArtifactKind = 'qbe';
  let tapeCells: number | undefined;
  let stride: number | undefined;
  let entryFile: string | undefined;

  // Accepts both `--flag value` and `--flag=value`; returns the value and how many argv slots it used.
  const valueOf = (a: string, long: string, i: number): [string, number] => {
    if (a.startsWith(`${long}=`)) {
      const v = a.slice(long.length + 1);
      if (!v) fail(`${long} expects a value`);
      return [v, 0];
    }
    const v = argv[i + 1];
    if (!v) fail(`${a} expects a value`);
    return [v, 1];
  };

  for (let i = 0; i < argv.length; i++) {
    const a = argv[i]!;
    if (a === '-h' || a === '--help') {
      process.stdout.write(usage());
      return { code: 0 };
    }
    if (a === '-V' || a === '--version') {
      process.stdout.write(`${packageVersion()}\n`);
      return { code: 0 };
    }
    if (a === '-o' || a === '--output' || a.startsWith('--output=')) {
      const [v, used] = valueOf(a, '--output', i);
      outputPath = v;
      i += used;
      continue;
    }
    if (a === '-e' || a === '--emit' || a.startsWith('--emit=')) {
      const [v, used] = valueOf(a, '--emit', i);
      if (v !== 'qbe' && v !== 'ast' && v !== 'tokens') {
        fail(`Unsupported --emit "${v}" (expected qbe|ast|tokens)`);
      }
      emit = v;
      i += used;
      continue;
    }
    if (a === '--tape-cells' || a.startsWith('--tape-cells=')) {
      const [v, used] = valueOf(a, '--tape-cells', i);
      tapeCells = parseIntegerFlag('--tape-cells', v);
      i += used;
      continue;
    }
    if (a === '--stride' || a.startsWith('--stride=')) {
      const [v, used] = valueOf(a, '--stride', i);
      stride = parseIntegerFlag('--stride', v);
      i += used;
      continue;
    }
    if (a.startsWith('-')) {
      fail(`Unknown option "${a}"`);
    }
    if (entryFile !== undefined || i !== argv.length - 1) {
      fail(`Expected exactly one <program.b> argument (and it must be last)`);
    }
    entryFile = a;
  }

  if (!entryFile) {
    fail(`Expected exactly one <program.b> argument (and it must be last)`);
  }

  return {
    entryFile,
    ...(outputPath ? { outputPath } : {}),
    emit,
    ...(tapeCells !== undefined ? { tapeCells } : {}),
    ...(stride !== undefined ? { stride } : {}),
  };
}

function compilerOptions(parsed: CliOptions): CompilerOptions {
  return {
    emitQbe: parsed.emit === 'qbe',
    emitAst: parsed.emit === 'ast',
    emitTokens: parsed.emit === 'tokens',
    ...(parsed.tapeCells !== undefined ? { tapeCells: parsed.tapeCells } : {}),
    ...(parsed.stride !== undefined ? { stride: parsed.stride } : {}),
  };
}

async function writeArtifact(artifact: Artifact, outputPath: string | undefined): Promise<void> {
  if (!outputPath) {
    process.stdout.write(artifact.text);
    return;
  }
  const path = resolve(outputPath);
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, artifact.text, 'utf8');
  process.stdout.write(`${path}\n`);
}

function compareDiagnosticsForCli(a: Diagnostic, b: Diagnostic): number {
  const fileCmp = a.file.localeCompare(b.file);
  if (fileCmp !== 0) return fileCmp;

  const lineCmp = (a.line ?? Number.POSITIVE_INFINITY) - (b.line ?? Number.POSITIVE_INFINITY);
  if (lineCmp !== 0) return lineCmp;

  const colCmp = (a.column ?? Number.POSITIVE_INFINITY) - (b.column ?? Number.POSITIVE_INFINITY);
  if (colCmp !== 0) return colCmp;

  const sevRank = (severity: Diagnostic['severity']): number => {
    if (severity === 'error') return 0;
    if (severity === 'warning') return 1;
    return 2;
  };
  const sevCmp = sevRank(a.severity) - sevRank(b.severity);
  if (sevCmp !== 0) return sevCmp;

  const idCmp = a.id.localeCompare(b.id);
  if (idCmp !== 0) return idCmp;

  return a.message.localeCompare(b.message);
}

export function formatDiagnostic(d: Diagnostic): string {
  const loc =
    d.line !== undefined && d.column !== undefined ? `${d.file}:${d.line}:${d.column}` : d.file;
  return `${loc}: ${d.severity}: [${d.id}] ${d.message}`;
}

/**
 * Run the CLI against `argv` (without the node/script prefix) and return the exit code.
 *
 * 0 on success, 1 when compilation reported errors, 2 on bad usage.
 */
export async function runCli(argv: string[]): Promise<number> {
  try {
    const parsed = parseArgs(argv);
    if ('code' in parsed) return parsed.code;

    const res = await compile(parsed.entryFile, compilerOptions(parsed), {
      formats: defaultFormatWriters,
    });

    const sortedDiagnostics = [...res.diagnostics].sort(compareDiagnosticsForCli);
    for (const d of sortedDiagnostics) {
      process.stderr.write(`${formatDiagnostic(d)}\n`);
    }

    if (sortedDiagnostics.some((d) => d.severity === 'error')) {
      return 1;
    }

    const artifact = res.artifacts.find((a) => a.kind === parsed.emit);
    if (!artifact) {
      process.stderr.write(`bfqc: no ${parsed.emit} artifact was produced\n`);
      return 1;
    }
    await writeArtifact(artifact, parsed.outputPath);
    return 0;
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    process.stderr.write(`bfqc: ${msg}\n`);
    process.stderr.write(`${usage()}\n`);
    return 2;
  }
}

function normalizePathForCompare(path: string): string {
  const resolved = resolve(path);
  const real = (() => {
    try {
      return realpathSync.native(resolved);
    } catch {
      return resolved;
    }
  })();
  const normalized = real.replace(/\\/g, '/');
  return process.platform === 'win32' ? normalized.toLowerCase() : normalized;
}

function isDirectCliInvocation(invokedAs: string | undefined): boolean {
  if (!invokedAs) return false;
  const self = fileURLToPath(import.meta.url);
  return normalizePathForCompare(invokedAs) === normalizePathForCompare(self);
}

if (isDirectCliInvocation(process.argv[1])) {
  // eslint-disable-next-line no-void
  void runCli(process.argv.slice(2)).then((code) => process.exit(code));
}
