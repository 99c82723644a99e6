import { EMPTY_UINT8 } from "./constants";

// Multi-byte fields are little-endian regardless of host.
export function put_uint32(buffer: Uint8Array, index: number, value: number): void {
  buffer[index] = value & 0xff;
  buffer[index + 1] = (value >>> 8) & 0xff;
  buffer[index + 2] = (value >>> 16) & 0xff;
  buffer[index + 3] = (value >>> 24) & 0xff;
}

export function get_uint32(buffer: Uint8Array, index: number): number {
  return (buffer[index] | (buffer[index + 1] << 8) | (buffer[index + 2] << 16) | (buffer[index + 3] << 24)) >>> 0;
}

export function concatChunks(chunks: ReadonlyArray<Uint8Array>): Uint8Array {
  if (chunks.length == 0) {
    return EMPTY_UINT8;
  }
  if (chunks.length == 1) {
    return chunks[0];
  }
  const total = chunks.reduce((sum, chunk) => sum + chunk.length, 0);
  const out = new Uint8Array(total);
  let pos = 0;
  for (const chunk of chunks) {
    out.set(chunk, pos);
    pos += chunk.length;
  }
  return out;
}

export function symbolLabel(symbol: number): string {
  if (symbol > 0x20 && symbol < 0x7f) {
    return String.fromCharCode(symbol);
  }
  return "0x" + symbol.toString(16).padStart(2, "0");
}
