import type { BlockNode, StatementNode } from './ast.js';

function indent(depth: number): string {
  return ' '.repeat(depth * 2);
}

function printBlock(block: BlockNode, depth: number, lines: string[]): void {
  lines.push(`${indent(depth)}Block`);
  for (const stat of block.stats) printStatement(stat, depth + 1, lines);
}

function printStatement(node: StatementNode, depth: number, lines: string[]): void {
  const stat = node.stat;
  switch (stat.kind) {
    case 'Loop':
      lines.push(`${indent(depth)}Loop`);
      printBlock(stat.block, depth + 1, lines);
      return;
    case 'Read':
    case 'Write':
      lines.push(`${indent(depth)}${stat.kind}`);
      return;
    default:
      lines.push(`${indent(depth)}${stat.kind}(${stat.count})`);
  }
}

/**
 * Render the tree as an indented outline, one node per line.
 */
export function printAst(root: BlockNode): string {
  const lines: string[] = [];
  printBlock(root, 0, lines);
  return lines.map((l) => `${l}\n`).join('');
}
