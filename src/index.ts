export * from "./mod/common/constants";
export * from "./mod/common/types";
export { HuffmanError, ERR_MSG, ERROR_MESSAGES } from "./mod/common/errors";
export { SymbolList, compareFrequency, compareSymbol, sortSymbol, createLeaf } from "./mod/common/symbol-list";
export type { NodeComparator } from "./mod/common/symbol-list";
export { buildTree, isDegenerate, treeDepth } from "./mod/common/trees";
export { get_uint32, put_uint32, concatChunks, symbolLabel } from "./mod/common/utils";
export { headerSize, readHeader, writeHeader } from "./mod/archive/header";
export type { ArchiveHeader } from "./mod/archive/header";
export { analyzeFrequencies, countSymbols } from "./mod/encode/frequency";
export type { FrequencyAnalysis } from "./mod/encode/frequency";
export { buildCodes, createCodeTable, codeToString, isPrefixFree } from "./mod/encode/codes";
export { packBits, packedSize, createBitWriter, send_bit, send_code, bi_windup } from "./mod/encode/packer";
export type { BitWriter } from "./mod/encode/packer";
export { compress } from "./mod/encode/compress";
export { unpackBits, createBitReader, pull_bit } from "./mod/decode/unpacker";
export type { BitReader } from "./mod/decode/unpacker";
export { decompress, inspect } from "./mod/decode/decompress";
export { formatArchive, formatCodes, formatFrequencies, formatTree } from "./mod/debug";
export {
  HuffmanCompressionStream,
  HuffmanDecompressionStream,
  createBufferedHuffmanTransform,
} from "./mod/streams";
export type { HuffmanStreamOptions } from "./mod/streams";
