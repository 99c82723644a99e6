import { MAX_LENGTH } from "../common/constants";
import { HuffmanErrorCode, SortOrder } from "../common/types";
import { HuffmanError } from "../common/errors";
import { buildTree } from "../common/trees";
import { concatChunks } from "../common/utils";
import { writeHeader } from "../archive/header";
import { analyzeFrequencies } from "./frequency";
import { buildCodes } from "./codes";
import { packBits, packedSize } from "./packer";

export function compress(input: Uint8Array): Uint8Array {
  if (input.length > MAX_LENGTH) {
    throw new HuffmanError(HuffmanErrorCode.UNSUPPORTED_INPUT, `input of ${input.length} bytes exceeds ${MAX_LENGTH}`);
  }
  const { list, counts, length } = analyzeFrequencies(input);
  list.sort(SortOrder.FREQUENCY);
  const header = writeHeader(list.frequencies(), length);
  // Empty input: the header alone, no tree.
  if (list.size == 0) {
    return header;
  }
  const codes = buildCodes(buildTree(list));
  const payload = packBits(input, codes, packedSize(counts, codes));
  return concatChunks([header, payload]);
}
