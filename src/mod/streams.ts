import type { ReadableStream, TransformStreamDefaultController, WritableStream } from "node:stream/web";

import { TransformStream } from "node:stream/web";

import { DEFAULT_OUT_BUFFER } from "./common/constants";
import { concatChunks } from "./common/utils";
import { compress } from "./encode/compress";
import { decompress } from "./decode/decompress";

export type HuffmanStreamOptions = { chunkSize?: number };

// The archive starts with a table of the whole input, so both directions
// collect every chunk before producing output.
export function createBufferedHuffmanTransform(
  run: (input: Uint8Array) => Uint8Array,
  options?: HuffmanStreamOptions,
): TransformStream<Uint8Array, Uint8Array> {
  const chunkSize = options && typeof options.chunkSize == "number" ? options.chunkSize : DEFAULT_OUT_BUFFER;
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new RangeError("chunkSize must be a positive integer: " + chunkSize);
  }
  let chunks: Uint8Array[] = [];

  return new TransformStream<Uint8Array, Uint8Array>({
    transform(chunk: Uint8Array): void {
      chunks.push(chunk.slice(0));
    },
    flush(controller: TransformStreamDefaultController<Uint8Array>): void {
      const output = run(concatChunks(chunks));
      chunks = [];
      for (let pos = 0; pos < output.length; pos += chunkSize) {
        controller.enqueue(output.slice(pos, pos + chunkSize));
      }
    },
  });
}

export class HuffmanCompressionStream {
  readonly readable: ReadableStream<Uint8Array>;
  readonly writable: WritableStream<Uint8Array>;

  constructor(options?: HuffmanStreamOptions) {
    const transform = createBufferedHuffmanTransform(compress, options);
    this.writable = transform.writable;
    this.readable = transform.readable;
  }
}

export class HuffmanDecompressionStream {
  readonly readable: ReadableStream<Uint8Array>;
  readonly writable: WritableStream<Uint8Array>;

  constructor(options?: HuffmanStreamOptions) {
    const transform = createBufferedHuffmanTransform(decompress, options);
    this.writable = transform.writable;
    this.readable = transform.readable;
  }
}
