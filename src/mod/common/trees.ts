import type { HuffmanTree } from "./types";
import type { SymbolList } from "./symbol-list";

import { HuffmanErrorCode, NodeKind, SortOrder } from "./types";
import { HuffmanError } from "./errors";

/**
 * Merges the two front entries of `list` until one remains. The list must
 * already be sorted by frequency; it is left holding only the root.
 */
export function buildTree(list: SymbolList): HuffmanTree {
  if (list.size == 0) {
    throw new HuffmanError(HuffmanErrorCode.UNSUPPORTED_INPUT, "no symbols to build a tree from");
  }
  const nodes = list._nodes;
  while (list.size > 1) {
    const low = list.at(0);
    const high = list.at(1);
    list.remove(0);
    list.remove(0);
    nodes.push({
      _kind: NodeKind.INTERNAL,
      _freq: nodes[low]._freq + nodes[high]._freq,
      _low: low,
      _high: high,
    });
    list.insert(nodes.length - 1, 0);
    list.sort(SortOrder.FREQUENCY);
  }
  return { _nodes: nodes, _root: list.at(0) };
}

export function isDegenerate(tree: HuffmanTree): boolean {
  return tree._nodes[tree._root]._kind == NodeKind.LEAF;
}

export function treeDepth(tree: HuffmanTree): number {
  let depth = 0;
  const stack: [number, number][] = [[tree._root, 0]];
  let entry: [number, number] | undefined;
  while ((entry = stack.pop())) {
    const [index, level] = entry;
    const node = tree._nodes[index];
    if (node._kind == NodeKind.INTERNAL) {
      stack.push([node._high, level + 1], [node._low, level + 1]);
    } else if (level > depth) {
      depth = level;
    }
  }
  return depth;
}
