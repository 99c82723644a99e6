import type { HuffmanTreeNode, SymbolFrequency } from "./types";

import { NUM_SYMBOLS } from "./constants";
import { NodeKind, SortOrder } from "./types";

export type NodeComparator = (a: HuffmanTreeNode, b: HuffmanTreeNode) => number;

// Merged nodes carry no symbol and sort as symbol 0.
export function sortSymbol(node: HuffmanTreeNode): number {
  return node._kind == NodeKind.LEAF ? node._symbol : 0;
}

export function compareFrequency(a: HuffmanTreeNode, b: HuffmanTreeNode): number {
  if (a._freq != b._freq) {
    return a._freq < b._freq ? -1 : 1;
  }
  return sortSymbol(a) - sortSymbol(b);
}

export function compareSymbol(a: HuffmanTreeNode, b: HuffmanTreeNode): number {
  return sortSymbol(a) - sortSymbol(b);
}

const COMPARATORS: Readonly<Record<SortOrder, NodeComparator>> = {
  [SortOrder.FREQUENCY]: compareFrequency,
  [SortOrder.SYMBOL]: compareSymbol,
};

export function createLeaf(symbol: number, freq: number): HuffmanTreeNode {
  if (!Number.isInteger(symbol) || symbol < 0 || symbol >= NUM_SYMBOLS) {
    throw new RangeError(`symbol ${symbol} is not a byte value`);
  }
  return { _kind: NodeKind.LEAF, _symbol: symbol, _freq: freq };
}

/**
 * Ordered sequence of tree nodes. Entries are indices into a node arena that
 * the list shares with the tree built from it, so leaves become tree nodes
 * without being copied.
 */
export class SymbolList implements Iterable<HuffmanTreeNode> {
  readonly _nodes: HuffmanTreeNode[];
  private _order: number[];

  constructor(nodes: HuffmanTreeNode[] = []) {
    this._nodes = nodes;
    this._order = [];
  }

  static fromFrequencies(frequencies: ReadonlyArray<SymbolFrequency>): SymbolList {
    const list = new SymbolList();
    for (const { symbol, frequency } of frequencies) {
      if (list.find(symbol) !== undefined) {
        throw new RangeError(`symbol ${symbol} is listed twice`);
      }
      list.append(symbol, frequency);
    }
    return list;
  }

  get size(): number {
    return this._order.length;
  }

  /** Arena index of the entry at `position`. */
  at(position: number): number {
    this._check(position);
    return this._order[position];
  }

  nodeAt(position: number): HuffmanTreeNode {
    return this._nodes[this.at(position)];
  }

  /** Position of the leaf holding `symbol`, by linear scan. */
  find(symbol: number): number | undefined {
    for (let i = 0; i < this._order.length; i++) {
      const node = this._nodes[this._order[i]];
      if (node._kind == NodeKind.LEAF && node._symbol == symbol) {
        return i;
      }
    }
    return undefined;
  }

  /**
   * Inserts the arena entry `node` in front of `position`, or after the last
   * entry when `position` is omitted. A node can be listed only once.
   */
  insert(node: number, position?: number): void {
    if (!Number.isInteger(node) || node < 0 || node >= this._nodes.length) {
      throw new RangeError(`node ${node} is not in the arena`);
    }
    if (this._order.includes(node)) {
      throw new RangeError(`node ${node} is already listed`);
    }
    if (position === undefined || position == this._order.length) {
      this._order.push(node);
      return;
    }
    this._check(position);
    this._order.splice(position, 0, node);
  }

  append(symbol: number, freq: number): number {
    this._nodes.push(createLeaf(symbol, freq));
    const node = this._nodes.length - 1;
    this._order.push(node);
    return node;
  }

  /** Takes out the entry at `position`; an empty list yields `undefined`. */
  remove(position: number = 0): number | undefined {
    if (this._order.length == 0 && position == 0) {
      return undefined;
    }
    this._check(position);
    const [node] = this._order.splice(position, 1);
    return node;
  }

  sort(order: SortOrder = SortOrder.FREQUENCY): void {
    this._order = mergeSort(this._order, this._nodes, COMPARATORS[order]);
  }

  frequencies(): SymbolFrequency[] {
    const out: SymbolFrequency[] = [];
    for (const node of this) {
      if (node._kind == NodeKind.LEAF) {
        out.push({ symbol: node._symbol, frequency: node._freq });
      }
    }
    return out;
  }

  *[Symbol.iterator](): Iterator<HuffmanTreeNode> {
    for (const index of this._order) {
      yield this._nodes[index];
    }
  }

  private _check(position: number): void {
    if (!Number.isInteger(position) || position < 0 || position >= this._order.length) {
      throw new RangeError(`position ${position} out of range for list of size ${this._order.length}`);
    }
  }
}

// Splits by position, not value; on equal keys the left half wins, so the
// sort is stable.
function mergeSort(order: number[], nodes: ReadonlyArray<HuffmanTreeNode>, compare: NodeComparator): number[] {
  if (order.length <= 1) {
    return order;
  }
  const middle = order.length >> 1;
  const left = mergeSort(order.slice(0, middle), nodes, compare);
  const right = mergeSort(order.slice(middle), nodes, compare);
  const merged = new Array<number>(order.length);
  let i = 0;
  let j = 0;
  let k = 0;
  while (i < left.length && j < right.length) {
    if (compare(nodes[left[i]], nodes[right[j]]) <= 0) {
      merged[k++] = left[i++];
    } else {
      merged[k++] = right[j++];
    }
  }
  while (i < left.length) {
    merged[k++] = left[i++];
  }
  while (j < right.length) {
    merged[k++] = right[j++];
  }
  return merged;
}
