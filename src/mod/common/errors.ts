import { HuffmanErrorCode } from "./types";

export const ERROR_MESSAGES: Readonly<Record<HuffmanErrorCode, string>> = {
  [HuffmanErrorCode.INPUT_UNREADABLE]: "input unreadable",
  [HuffmanErrorCode.MALFORMED_ARCHIVE]: "malformed archive",
  [HuffmanErrorCode.UNSUPPORTED_INPUT]: "unsupported input",
};

export function ERR_MSG(code: HuffmanErrorCode): string {
  return ERROR_MESSAGES[code] || "huffman error " + String(code);
}

export class HuffmanError extends Error {
  readonly code: HuffmanErrorCode;

  constructor(code: HuffmanErrorCode, detail?: string, options?: { cause?: unknown }) {
    super(detail ? `${ERR_MSG(code)}: ${detail}` : ERR_MSG(code), options);
    this.name = "HuffmanError";
    this.code = code;
  }
}
