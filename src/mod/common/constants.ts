export const NUM_SYMBOLS = 256;
export const BYTE_BITS = 8;

export const SYMBOL_SIZE = 1;
export const FREQ_SIZE = 4;
export const ENTRY_SIZE = SYMBOL_SIZE + FREQ_SIZE;
export const LENGTH_SIZE = 4;
export const MAX_LENGTH = 0xffffffff;

export const TERMINATOR_SYMBOL = 0x00;
export const TERMINATOR_FREQ = 0;

export const ARCHIVE_EXTENSION = ".huf";
export const RECOVERED_SUFFIX = "-recovered";

export const DEFAULT_OUT_BUFFER = 64 * 1024;

export const EMPTY_UINT8 = new Uint8Array(0);
