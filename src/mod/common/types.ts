export interface SymbolFrequency {
  symbol: number;
  frequency: number;
}

export enum NodeKind {
  LEAF = 0,
  INTERNAL = 1,
}

export type HuffmanLeaf = { _kind: NodeKind.LEAF; _symbol: number; _freq: number };

// _low and _high index into the owning tree's node arena.
export type HuffmanInternal = { _kind: NodeKind.INTERNAL; _freq: number; _low: number; _high: number };

export type HuffmanTreeNode = HuffmanLeaf | HuffmanInternal;

export interface HuffmanTree {
  readonly _nodes: ReadonlyArray<HuffmanTreeNode>;
  readonly _root: number;
}

export interface SymbolCode {
  symbol: number;
  bits: Uint8Array;
  length: number;
}

export type CodeTable = ReadonlyArray<SymbolCode | undefined>;

export enum SortOrder {
  FREQUENCY = 0,
  SYMBOL = 1,
}

export enum HuffmanErrorCode {
  INPUT_UNREADABLE = -1,
  MALFORMED_ARCHIVE = -2,
  UNSUPPORTED_INPUT = -3,
}

export interface ArchiveInfo {
  symbols: number;
  length: number;
  headerSize: number;
  payloadSize: number;
  depth: number;
  frequencies: SymbolFrequency[];
  codes: SymbolCode[];
  tree: HuffmanTree | undefined;
}
