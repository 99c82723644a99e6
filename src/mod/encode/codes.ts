import type { CodeTable, HuffmanTree, SymbolCode } from "../common/types";

import { NUM_SYMBOLS } from "../common/constants";
import { NodeKind } from "../common/types";

type PathEntry = { _node: number; _bits: number[] };

/**
 * Assigns each leaf the bits of its root-to-leaf path, `0` for the low child
 * and `1` for the high child. Codes come out in depth-first order, low
 * branch first. A tree made of a single leaf yields one empty code.
 */
export function buildCodes(tree: HuffmanTree): SymbolCode[] {
  const codes: SymbolCode[] = [];
  const stack: PathEntry[] = [{ _node: tree._root, _bits: [] }];
  let entry: PathEntry | undefined;
  while ((entry = stack.pop())) {
    const node = tree._nodes[entry._node];
    if (node._kind == NodeKind.LEAF) {
      codes.push({ symbol: node._symbol, bits: Uint8Array.from(entry._bits), length: entry._bits.length });
      continue;
    }
    stack.push({ _node: node._high, _bits: [...entry._bits, 1] });
    stack.push({ _node: node._low, _bits: [...entry._bits, 0] });
  }
  return codes;
}

export function createCodeTable(codes: ReadonlyArray<SymbolCode>): CodeTable {
  const table = new Array<SymbolCode | undefined>(NUM_SYMBOLS).fill(undefined);
  for (const code of codes) {
    table[code.symbol] = code;
  }
  return table;
}

export function codeToString(code: SymbolCode): string {
  return Array.from(code.bits).join("");
}

export function isPrefixFree(codes: ReadonlyArray<SymbolCode>): boolean {
  const words = codes.map(codeToString).sort();
  for (let i = 1; i < words.length; i++) {
    if (words[i].startsWith(words[i - 1])) {
      return false;
    }
  }
  return true;
}
