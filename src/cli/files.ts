import { readFile, writeFile } from "node:fs/promises";

import { HuffmanErrorCode } from "../mod/common/types";
import { HuffmanError } from "../mod/common/errors";
import { compress } from "../mod/encode/compress";
import { decompress } from "../mod/decode/decompress";
import { archiveName, recoveredName } from "./paths";
import type { ArchiveNameOptions } from "./paths";

export interface FileResult {
  inputPath: string;
  outputPath: string;
  input: Uint8Array;
  output: Uint8Array;
}

async function readInput(file: string): Promise<Uint8Array> {
  try {
    return await readFile(file);
  } catch (error) {
    throw new HuffmanError(HuffmanErrorCode.INPUT_UNREADABLE, file, { cause: error });
  }
}

export async function compressFile(
  inputPath: string,
  outputPath?: string,
  options?: ArchiveNameOptions,
): Promise<FileResult> {
  const target = outputPath ?? archiveName(inputPath, options);
  const input = await readInput(inputPath);
  const output = compress(input);
  await writeFile(target, output);
  return { inputPath, outputPath: target, input, output };
}

/** Nothing is written unless the whole archive decodes. */
export async function decompressFile(
  inputPath: string,
  outputPath?: string,
  options?: ArchiveNameOptions,
): Promise<FileResult> {
  const target = outputPath ?? recoveredName(inputPath, options);
  const input = await readInput(inputPath);
  const output = decompress(input);
  await writeFile(target, output);
  return { inputPath, outputPath: target, input, output };
}
