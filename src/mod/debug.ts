import type { ArchiveInfo, HuffmanTree, SymbolCode, SymbolFrequency } from "./common/types";

import { NodeKind } from "./common/types";
import { symbolLabel } from "./common/utils";
import { codeToString } from "./encode/codes";

const TREE_INDENT = "     ";

export function formatFrequencies(frequencies: ReadonlyArray<SymbolFrequency>): string {
  return frequencies.map(({ symbol, frequency }) => `[${symbolLabel(symbol)}] - ${frequency}`).join("\n");
}

export function formatCodes(codes: ReadonlyArray<SymbolCode>): string {
  return codes.map((code) => `[${symbolLabel(code.symbol)}]\t${codeToString(code)}`).join("\n");
}

/**
 * Tree rotated a quarter turn to the left: the high branch is printed above
 * its parent, the low branch below, one indent per level.
 */
export function formatTree(tree: HuffmanTree): string {
  const lines: string[] = [];
  const stack: [number, number][] = [];
  let current: [number, number] | undefined = [tree._root, 0];
  while (current || stack.length > 0) {
    while (current) {
      stack.push(current);
      const node = tree._nodes[current[0]];
      current = node._kind == NodeKind.INTERNAL ? [node._high, current[1] + 1] : undefined;
    }
    const top = stack.pop();
    if (!top) {
      break;
    }
    const node = tree._nodes[top[0]];
    lines.push(TREE_INDENT.repeat(top[1]) + String(node._freq).padStart(5));
    current = node._kind == NodeKind.INTERNAL ? [node._low, top[1] + 1] : undefined;
  }
  return lines.join("\n");
}

export function formatArchive(info: ArchiveInfo): string {
  const sections = [
    `symbols: ${info.symbols}, length: ${info.length}, header: ${info.headerSize} bytes, ` +
      `payload: ${info.payloadSize} bytes, depth: ${info.depth}`,
  ];
  if (info.frequencies.length > 0) {
    sections.push(formatFrequencies(info.frequencies), formatCodes(info.codes));
  }
  return sections.join("\n\n");
}
