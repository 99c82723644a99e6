import type { SymbolFrequency } from "../common/types";

import { ENTRY_SIZE, LENGTH_SIZE, MAX_LENGTH, NUM_SYMBOLS, TERMINATOR_FREQ, TERMINATOR_SYMBOL } from "../common/constants";
import { HuffmanErrorCode, SortOrder } from "../common/types";
import { HuffmanError } from "../common/errors";
import { SymbolList } from "../common/symbol-list";
import { get_uint32, put_uint32 } from "../common/utils";

export interface ArchiveHeader {
  list: SymbolList;
  length: number;
  offset: number;
}

export function headerSize(symbols: number): number {
  return (symbols + 1) * ENTRY_SIZE + LENGTH_SIZE;
}

/**
 * Layout: `(symbol:u8, freq:u32le)*`, then `(0x00, 0)` as terminator, then the
 * symbol count of the uncompressed input as u32le.
 */
export function writeHeader(frequencies: ReadonlyArray<SymbolFrequency>, length: number): Uint8Array {
  if (length < 0 || length > MAX_LENGTH) {
    throw new HuffmanError(HuffmanErrorCode.UNSUPPORTED_INPUT, `length ${length} does not fit the length field`);
  }
  const out = new Uint8Array(headerSize(frequencies.length));
  let pos = 0;
  for (const { symbol, frequency } of frequencies) {
    if (!Number.isInteger(symbol) || symbol < 0 || symbol >= NUM_SYMBOLS) {
      throw new HuffmanError(HuffmanErrorCode.UNSUPPORTED_INPUT, `symbol ${symbol} is not a byte value`);
    }
    if (frequency == TERMINATOR_FREQ) {
      throw new HuffmanError(HuffmanErrorCode.UNSUPPORTED_INPUT, `symbol ${symbol} has no occurrences`);
    }
    out[pos] = symbol;
    put_uint32(out, pos + 1, frequency);
    pos += ENTRY_SIZE;
  }
  out[pos] = TERMINATOR_SYMBOL;
  put_uint32(out, pos + 1, TERMINATOR_FREQ);
  pos += ENTRY_SIZE;
  put_uint32(out, pos, length);
  return out;
}

/**
 * Parses the frequency table and length field. The returned list is sorted by
 * frequency, ready for tree building; `offset` is where the payload starts.
 */
export function readHeader(archive: Uint8Array): ArchiveHeader {
  const list = new SymbolList();
  let offset = 0;
  let total = 0;
  for (;;) {
    if (offset + ENTRY_SIZE > archive.length) {
      throw new HuffmanError(HuffmanErrorCode.MALFORMED_ARCHIVE, "frequency table ends before its terminator");
    }
    const symbol = archive[offset];
    const freq = get_uint32(archive, offset + 1);
    offset += ENTRY_SIZE;
    if (freq == TERMINATOR_FREQ) {
      break;
    }
    if (list.size == NUM_SYMBOLS) {
      throw new HuffmanError(HuffmanErrorCode.MALFORMED_ARCHIVE, `frequency table holds more than ${NUM_SYMBOLS} symbols`);
    }
    if (list.find(symbol) !== undefined) {
      throw new HuffmanError(HuffmanErrorCode.MALFORMED_ARCHIVE, `symbol ${symbol} appears twice in the frequency table`);
    }
    list.append(symbol, freq);
    total += freq;
  }
  if (offset + LENGTH_SIZE > archive.length) {
    throw new HuffmanError(HuffmanErrorCode.MALFORMED_ARCHIVE, "length field is truncated");
  }
  const length = get_uint32(archive, offset);
  offset += LENGTH_SIZE;
  if (total != length) {
    throw new HuffmanError(
      HuffmanErrorCode.MALFORMED_ARCHIVE,
      `length field ${length} does not match the frequency total ${total}`,
    );
  }
  list.sort(SortOrder.FREQUENCY);
  return { list, length, offset };
}
