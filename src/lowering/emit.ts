import type { Diagnostic } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import type { BlockNode, StatementNode } from '../frontend/ast.js';
import type { QbeLoad, QbeModule, QbeStore, QbeValue } from '../qbe/ir.js';
import { FunctionBuilder, constant, temp } from '../qbe/ir.js';

export const DEFAULT_TAPE_CELLS = 30_000;

/**
 * Distance in bytes between neighbouring cells.
 *
 * `1` packs byte cells; `8` keeps the wide spacing with word-sized loads and stores.
 */
export type CellStride = 1 | 8;

export interface EmitOptions {
  /** Number of addressable cells. Default: 30000. */
  tapeCells?: number;
  /** Cell stride in bytes, 1 or 8. Default: 1. */
  stride?: number;
  /** File reported on option diagnostics. */
  file?: string;
}

type ResolvedEmitOptions = { tapeCells: number; stride: CellStride };

export function isCellStride(n: number): n is CellStride {
  return n === 1 || n === 8;
}

interface CellAccess {
  load: QbeLoad;
  store: QbeStore;
}

const cellAccess: Record<CellStride, CellAccess> = {
  1: { load: 'loadub', store: 'storeb' },
  8: { load: 'loadw', store: 'storew' },
};

/**
 * Per-compilation lowering state. Counters only ever grow, so every temporary and label
 * in the procedure is unique.
 */
export interface GeneratorContext {
  fn: FunctionBuilder;
  nextTemp: number;
  nextLabel: number;
  tapeCells: number;
  stride: CellStride;
}

function diag(diagnostics: Diagnostic[], file: string, message: string): void {
  diagnostics.push({ id: DiagnosticIds.InvalidOption, severity: 'error', message, file });
}

const tape = temp('tape');
const ptr = temp('ptr');

export function createContext(options: ResolvedEmitOptions): GeneratorContext {
  return {
    fn: new FunctionBuilder('main', { exported: true, returnType: 'w' }),
    nextTemp: 0,
    nextLabel: 0,
    tapeCells: options.tapeCells,
    stride: options.stride,
  };
}

function freshTemp(ctx: GeneratorContext): QbeValue {
  return temp(`v${ctx.nextTemp++}`);
}

function freshLabel(ctx: GeneratorContext, prefix: string): string {
  return `${prefix}${ctx.nextLabel++}`;
}

/** Bytes the guard lets the pointer reach: the lower half of the allocation. */
function addressableBytes(ctx: GeneratorContext): number {
  return ctx.tapeCells * ctx.stride;
}

function emitRuntime(ctx: GeneratorContext): void {
  const allocated = addressableBytes(ctx) * 2;
  ctx.fn.assign(tape, 'l', { kind: 'alloc8', bytes: allocated });
  ctx.fn.call('memset', [
    { type: 'l', value: tape },
    { type: 'w', value: constant(0) },
    { type: 'l', value: constant(allocated) },
  ]);
  ctx.fn.assign(ptr, 'l', { kind: 'copy', value: tape });
}

/**
 * Halt with status 1 unless `ptr - tape` lies in `[0, addressable)`.
 *
 * The comparison is unsigned, so a pointer moved below the tape base wraps to a huge
 * offset and fails the same check.
 */
function emitBoundsCheck(ctx: GeneratorContext): void {
  const cont = freshLabel(ctx, 'cont');
  const halt = freshLabel(ctx, 'halt');

  const offset = freshTemp(ctx);
  ctx.fn.assign(offset, 'l', { kind: 'sub', lhs: ptr, rhs: tape });

  const inBounds = freshTemp(ctx);
  ctx.fn.assign(inBounds, 'w', {
    kind: 'cmp',
    op: 'ugt',
    type: 'l',
    lhs: constant(addressableBytes(ctx)),
    rhs: offset,
  });
  ctx.fn.jump({ kind: 'jnz', cond: inBounds, ifNonZero: cont, ifZero: halt });

  ctx.fn.addBlock(halt);
  ctx.fn.jump({ kind: 'ret', value: constant(1) });
  ctx.fn.addBlock(cont);
}

function loadCell(ctx: GeneratorContext): QbeValue {
  const cell = freshTemp(ctx);
  ctx.fn.assign(cell, 'w', { kind: 'load', op: cellAccess[ctx.stride].load, address: ptr });
  return cell;
}

function emitStatement(ctx: GeneratorContext, node: StatementNode): void {
  const stat = node.stat;
  switch (stat.kind) {
    case 'MoveLeft':
    case 'MoveRight': {
      const kind = stat.kind === 'MoveLeft' ? 'sub' : 'add';
      ctx.fn.assign(ptr, 'l', { kind, lhs: ptr, rhs: constant(stat.count * ctx.stride) });
      emitBoundsCheck(ctx);
      return;
    }
    case 'Add':
    case 'Subtract': {
      const cell = loadCell(ctx);
      const result = freshTemp(ctx);
      const kind = stat.kind === 'Add' ? 'add' : 'sub';
      ctx.fn.assign(result, 'w', { kind, lhs: cell, rhs: constant(stat.count) });
      ctx.fn.store(cellAccess[ctx.stride].store, result, ptr);
      return;
    }
    case 'Read':
      // ssize_t read(int fd, void *buf, size_t count)
      ctx.fn.call('read', [
        { type: 'w', value: constant(0) },
        { type: 'l', value: ptr },
        { type: 'l', value: constant(1) },
      ]);
      return;
    case 'Write':
      ctx.fn.call('write', [
        { type: 'w', value: constant(1) },
        { type: 'l', value: ptr },
        { type: 'l', value: constant(1) },
      ]);
      return;
    case 'Loop': {
      const c = ctx.nextLabel++;
      const begin = `loop${c}`;
      const end = `end${c}`;

      const entry = loadCell(ctx);
      ctx.fn.jump({ kind: 'jnz', cond: entry, ifNonZero: begin, ifZero: end });
      ctx.fn.addBlock(begin);

      emitBlock(ctx, stat.block);

      const again = loadCell(ctx);
      ctx.fn.jump({ kind: 'jnz', cond: again, ifNonZero: begin, ifZero: end });
      ctx.fn.addBlock(end);
      return;
    }
  }
}

function emitBlock(ctx: GeneratorContext, block: BlockNode): void {
  for (const stat of block.stats) emitStatement(ctx, stat);
}

function resolveOptions(
  options: EmitOptions,
  diagnostics: Diagnostic[],
): ResolvedEmitOptions | undefined {
  const file = options.file ?? '<input>';
  const tapeCells = options.tapeCells ?? DEFAULT_TAPE_CELLS;
  const stride = options.stride ?? 1;
  let ok = true;
  if (!Number.isSafeInteger(tapeCells) || tapeCells < 1) {
    diag(
      diagnostics,
      file,
      `Tape size must be a positive integer number of cells (got ${tapeCells})`,
    );
    ok = false;
  }
  if (!isCellStride(stride)) {
    diag(diagnostics, file, `Cell stride must be 1 or 8 (got ${stride})`);
    return undefined;
  }
  return ok ? { tapeCells, stride } : undefined;
}

/**
 * Lower a parsed program into a QBE module holding one exported `$main`.
 *
 * Layout:
 * - `@runtime` allocates and zeroes the tape and points `%ptr` at its base.
 * - `@start` holds the program; every pointer move is followed by a bounds-check guard.
 * - Normal completion returns 0, a failed guard returns 1.
 *
 * The only failure is an option outside its range, reported as an `InvalidOption` diagnostic
 * with no module produced.
 */
export function emitProgram(
  program: BlockNode,
  diagnostics: Diagnostic[],
  options: EmitOptions = {},
): { module?: QbeModule } {
  const resolved = resolveOptions(options, diagnostics);
  if (!resolved) return {};
  const ctx = createContext(resolved);

  ctx.fn.addBlock('runtime');
  emitRuntime(ctx);
  ctx.fn.addBlock('start');
  emitBlock(ctx, program);
  ctx.fn.jump({ kind: 'ret', value: constant(0) });

  return { module: { functions: [ctx.fn.build()] } };
}
