/**
 * Typed model of the QBE IL subset the lowering produces.
 *
 * Only `w` (32-bit) and `l` (64-bit) base types are needed; pointers are `l`.
 */
export type QbeType = 'w' | 'l';

export type QbeValue = { kind: 'temp'; name: string } | { kind: 'const'; value: number };

export type QbeLoad = 'loadub' | 'loadw';
export type QbeStore = 'storeb' | 'storew';
export type QbeArith = 'add' | 'sub';
/** Unsigned greater-than; the only comparison the bounds guard needs. */
export type QbeCmpOp = 'ugt';

/**
 * Right-hand side of an assignment (`%dest =T <op>`).
 */
export type QbeOperation =
  | { kind: 'copy'; value: QbeValue }
  | { kind: QbeArith; lhs: QbeValue; rhs: QbeValue }
  | { kind: 'load'; op: QbeLoad; address: QbeValue }
  | { kind: 'alloc8'; bytes: number }
  | { kind: 'cmp'; op: QbeCmpOp; type: QbeType; lhs: QbeValue; rhs: QbeValue };

export interface QbeCallArg {
  type: QbeType;
  value: QbeValue;
}

export type QbeInstr =
  | { kind: 'assign'; dest: QbeValue; type: QbeType; operation: QbeOperation }
  | { kind: 'store'; op: QbeStore; value: QbeValue; address: QbeValue }
  | { kind: 'call'; target: string; args: QbeCallArg[] };

/**
 * Block terminator. A block without one falls through to the next declared block.
 */
export type QbeJump =
  | { kind: 'jnz'; cond: QbeValue; ifNonZero: string; ifZero: string }
  | { kind: 'ret'; value?: QbeValue };

export interface QbeBlock {
  label: string;
  instrs: QbeInstr[];
  jump?: QbeJump;
}

export interface QbeFunction {
  exported: boolean;
  name: string;
  returnType?: QbeType;
  blocks: QbeBlock[];
}

export interface QbeModule {
  functions: QbeFunction[];
}

export function temp(name: string): QbeValue {
  return { kind: 'temp', name };
}

export function constant(value: number): QbeValue {
  return { kind: 'const', value };
}

/**
 * Incrementally builds one function, block by block.
 *
 * Appending after a terminated block opens nothing implicitly; callers always start a
 * new block with {@link FunctionBuilder.addBlock} after a jump.
 */
export class FunctionBuilder {
  private readonly fn: QbeFunction;

  constructor(name: string, opts: { exported?: boolean; returnType?: QbeType } = {}) {
    this.fn = {
      exported: opts.exported ?? false,
      name,
      ...(opts.returnType ? { returnType: opts.returnType } : {}),
      blocks: [],
    };
  }

  addBlock(label: string): void {
    this.fn.blocks.push({ label, instrs: [] });
  }

  assign(dest: QbeValue, type: QbeType, operation: QbeOperation): void {
    this.current().instrs.push({ kind: 'assign', dest, type, operation });
  }

  store(op: QbeStore, value: QbeValue, address: QbeValue): void {
    this.current().instrs.push({ kind: 'store', op, value, address });
  }

  call(target: string, args: QbeCallArg[]): void {
    this.current().instrs.push({ kind: 'call', target, args });
  }

  jump(jump: QbeJump): void {
    const block = this.current();
    if (block.jump) {
      throw new Error(`Block @${block.label} already ends in ${block.jump.kind}`);
    }
    block.jump = jump;
  }

  build(): QbeFunction {
    return this.fn;
  }

  private current(): QbeBlock {
    const block = this.fn.blocks[this.fn.blocks.length - 1];
    if (!block) throw new Error(`Function $${this.fn.name} has no open block`);
    return block;
  }
}
