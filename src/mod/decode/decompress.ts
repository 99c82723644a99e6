import type { ArchiveInfo } from "../common/types";

import { EMPTY_UINT8 } from "../common/constants";
import { buildTree, treeDepth } from "../common/trees";
import { readHeader } from "../archive/header";
import { buildCodes } from "../encode/codes";
import { unpackBits } from "./unpacker";

export function decompress(archive: Uint8Array): Uint8Array {
  const { list, length, offset } = readHeader(archive);
  if (list.size == 0) {
    return EMPTY_UINT8;
  }
  return unpackBits(buildTree(list), archive.subarray(offset), length);
}

export function inspect(archive: Uint8Array): ArchiveInfo {
  const { list, length, offset } = readHeader(archive);
  const frequencies = list.frequencies();
  const tree = list.size == 0 ? undefined : buildTree(list);
  return {
    symbols: frequencies.length,
    length,
    headerSize: offset,
    payloadSize: archive.length - offset,
    depth: tree ? treeDepth(tree) : 0,
    frequencies,
    codes: tree ? buildCodes(tree) : [],
    tree,
  };
}
