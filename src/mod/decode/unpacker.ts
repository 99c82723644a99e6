import type { HuffmanTree, HuffmanTreeNode } from "../common/types";

import { BYTE_BITS } from "../common/constants";
import { HuffmanErrorCode, NodeKind } from "../common/types";
import { HuffmanError } from "../common/errors";

export interface BitReader {
  _input: Uint8Array;
  _next_index: number;
  _hold: number;
  _bits: number;
}

export function createBitReader(input: Uint8Array, offset: number = 0): BitReader {
  return { _input: input, _next_index: offset, _hold: 0, _bits: 0 };
}

/** Next bit, most significant first within each byte. */
export function pull_bit(s: BitReader): number {
  if (s._bits == 0) {
    if (s._next_index >= s._input.length) {
      throw new HuffmanError(HuffmanErrorCode.MALFORMED_ARCHIVE, "bitstream ends before the last symbol");
    }
    s._hold = s._input[s._next_index++];
    s._bits = BYTE_BITS;
  }
  s._bits--;
  return (s._hold >>> s._bits) & 1;
}

/**
 * Decodes exactly `length` symbols; whatever follows in `payload` is padding.
 * A single-leaf tree reads no bits at all.
 */
export function unpackBits(tree: HuffmanTree, payload: Uint8Array, length: number): Uint8Array {
  const out = new Uint8Array(length);
  const root = tree._nodes[tree._root];
  if (root._kind == NodeKind.LEAF) {
    out.fill(root._symbol);
    return out;
  }
  const s = createBitReader(payload);
  for (let count = 0; count < length; count++) {
    let node: HuffmanTreeNode = root;
    for (;;) {
      if (node._kind == NodeKind.LEAF) {
        out[count] = node._symbol;
        break;
      }
      node = tree._nodes[pull_bit(s) ? node._high : node._low];
    }
  }
  return out;
}
