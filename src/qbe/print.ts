import type {
  QbeBlock,
  QbeCallArg,
  QbeFunction,
  QbeInstr,
  QbeJump,
  QbeModule,
  QbeOperation,
  QbeValue,
} from './ir.js';

export function printValue(v: QbeValue): string {
  switch (v.kind) {
    case 'temp':
      return `%${v.name}`;
    case 'const':
      return String(v.value);
  }
}

function printArgs(args: QbeCallArg[]): string {
  return args.map((a) => `${a.type} ${printValue(a.value)}`).join(', ');
}

function printOperation(op: QbeOperation): string {
  switch (op.kind) {
    case 'copy':
      return `copy ${printValue(op.value)}`;
    case 'add':
    case 'sub':
      return `${op.kind} ${printValue(op.lhs)}, ${printValue(op.rhs)}`;
    case 'load':
      return `${op.op} ${printValue(op.address)}`;
    case 'alloc8':
      return `alloc8 ${op.bytes}`;
    case 'cmp':
      return `c${op.op}${op.type} ${printValue(op.lhs)}, ${printValue(op.rhs)}`;
  }
}

export function printInstr(instr: QbeInstr): string {
  switch (instr.kind) {
    case 'assign':
      return `${printValue(instr.dest)} =${instr.type} ${printOperation(instr.operation)}`;
    case 'store':
      return `${instr.op} ${printValue(instr.value)}, ${printValue(instr.address)}`;
    case 'call':
      return `call $${instr.target}(${printArgs(instr.args)})`;
  }
}

export function printJump(jump: QbeJump): string {
  switch (jump.kind) {
    case 'jnz':
      return `jnz ${printValue(jump.cond)}, @${jump.ifNonZero}, @${jump.ifZero}`;
    case 'ret':
      return jump.value ? `ret ${printValue(jump.value)}` : 'ret';
  }
}

function printBlock(block: QbeBlock, lines: string[]): void {
  lines.push(`@${block.label}`);
  for (const instr of block.instrs) lines.push(`\t${printInstr(instr)}`);
  if (block.jump) lines.push(`\t${printJump(block.jump)}`);
}

export function printFunction(fn: QbeFunction): string {
  const lines: string[] = [];
  const linkage = fn.exported ? 'export ' : '';
  const ret = fn.returnType ? `${fn.returnType} ` : '';
  lines.push(`${linkage}function ${ret}$${fn.name}() {`);
  for (const block of fn.blocks) printBlock(block, lines);
  lines.push('}');
  return lines.join('\n');
}

/**
 * Render a module as QBE IL text. Functions are separated by a blank line; the text ends
 * with a newline.
 */
export function printModule(module: QbeModule): string {
  return module.functions.map((fn) => `${printFunction(fn)}\n`).join('\n');
}
