import type { SymbolCode } from "../common/types";

import { BYTE_BITS } from "../common/constants";
import { HuffmanErrorCode } from "../common/types";
import { HuffmanError } from "../common/errors";
import { createCodeTable } from "./codes";

const MIN_BUFFER = 16;

export interface BitWriter {
  _buffer: Uint8Array;
  _pending: number;
  _bit_buffer: number;
  _bit_count: number;
}

export function createBitWriter(size: number = MIN_BUFFER): BitWriter {
  return {
    _buffer: new Uint8Array(Math.max(size, MIN_BUFFER)),
    _pending: 0,
    _bit_buffer: 0,
    _bit_count: 0,
  };
}

export function put_byte(s: BitWriter, c: number): void {
  if (s._pending == s._buffer.length) {
    const grown = new Uint8Array(s._buffer.length * 2);
    grown.set(s._buffer);
    s._buffer = grown;
  }
  s._buffer[s._pending++] = c & 0xff;
}

// The accumulator never holds more than one byte, so code length is unbounded.
export function send_bit(s: BitWriter, bit: number): void {
  s._bit_buffer = (s._bit_buffer << 1) | (bit & 1);
  if (++s._bit_count == BYTE_BITS) {
    put_byte(s, s._bit_buffer);
    s._bit_buffer = 0;
    s._bit_count = 0;
  }
}

export function send_code(s: BitWriter, code: SymbolCode): void {
  for (let i = 0; i < code.length; i++) {
    send_bit(s, code.bits[i]);
  }
}

/** Flushes a partial byte, padding its low bits with zeros. */
export function bi_windup(s: BitWriter): void {
  if (s._bit_count > 0) {
    put_byte(s, s._bit_buffer << (BYTE_BITS - s._bit_count));
  }
  s._bit_buffer = 0;
  s._bit_count = 0;
}

export function packedSize(counts: ArrayLike<number>, codes: ReadonlyArray<SymbolCode>): number {
  let bits = 0;
  for (const code of codes) {
    bits += counts[code.symbol] * code.length;
  }
  return Math.ceil(bits / BYTE_BITS);
}

export function packBits(input: Uint8Array, codes: ReadonlyArray<SymbolCode>, sizeHint?: number): Uint8Array {
  const table = createCodeTable(codes);
  const s = createBitWriter(sizeHint ?? input.length);
  for (let i = 0; i < input.length; i++) {
    const code = table[input[i]];
    if (!code) {
      throw new HuffmanError(HuffmanErrorCode.UNSUPPORTED_INPUT, `no code for symbol ${input[i]} at offset ${i}`);
    }
    send_code(s, code);
  }
  bi_windup(s);
  return s._buffer.subarray(0, s._pending);
}
