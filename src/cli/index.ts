import { parseArgs } from "node:util";

import { HuffmanError } from "../mod/common/errors";
import { inspect } from "../mod/decode/decompress";
import { formatArchive } from "../mod/debug";
import { compressFile, decompressFile } from "./files";

export const USAGE = [
  "Usage: huffpack -c|-d <file> [-o <output>] [-v]",
  "Options -----------------",
  "  -c, --compress     compress file using Huffman codec",
  "  -d, --decompress   decompress a .huf archive",
  "  -o, --output       write to this path instead of the derived name",
  "  -v, --verbose      print the frequency table and codes",
  "  -h, --help         show this text",
].join("\n");

export interface CliOptions {
  logger?: Pick<typeof console, "log" | "error">;
}

function parseCommandLine(argv: string[]) {
  return parseArgs({
    args: argv,
    options: {
      compress: { type: "boolean", short: "c" },
      decompress: { type: "boolean", short: "d" },
      output: { type: "string", short: "o" },
      verbose: { type: "boolean", short: "v" },
      help: { type: "boolean", short: "h" },
    },
    allowPositionals: true,
  });
}

export async function main(argv: string[], options: CliOptions = {}): Promise<number> {
  const logger = options.logger ?? console;

  let parsed: ReturnType<typeof parseCommandLine>;
  try {
    parsed = parseCommandLine(argv);
  } catch (error) {
    logger.error(error instanceof Error ? error.message : String(error));
    logger.error(USAGE);
    return 1;
  }

  const { values, positionals } = parsed;
  if (values.help) {
    logger.log(USAGE);
    return 0;
  }
  if (Boolean(values.compress) == Boolean(values.decompress) || positionals.length != 1) {
    logger.error(USAGE);
    return 1;
  }

  try {
    const result = values.compress
      ? await compressFile(positionals[0], values.output)
      : await decompressFile(positionals[0], values.output);
    logger.log(
      `${result.inputPath} (${result.input.length} bytes) -> ${result.outputPath} (${result.output.length} bytes)`,
    );
    if (values.verbose) {
      logger.log(formatArchive(inspect(values.compress ? result.output : result.input)));
    }
    return 0;
  } catch (error) {
    if (error instanceof HuffmanError) {
      logger.error(error.message);
      return 1;
    }
    throw error;
  }
}
