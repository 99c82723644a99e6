import path from "node:path";

import { ARCHIVE_EXTENSION, RECOVERED_SUFFIX } from "../mod/common/constants";
import { HuffmanErrorCode } from "../mod/common/types";
import { HuffmanError } from "../mod/common/errors";

export interface ArchiveNameOptions {
  extension?: string;
  suffix?: string;
}

export function archiveName(file: string, options: ArchiveNameOptions = {}): string {
  const { extension = ARCHIVE_EXTENSION } = options;
  return file + extension;
}

export function isArchiveName(file: string, options: ArchiveNameOptions = {}): boolean {
  const { extension = ARCHIVE_EXTENSION } = options;
  return file.length > extension.length && file.endsWith(extension);
}

/**
 * `notes.txt.huf` becomes `notes-recovered.txt`; a name with no extension left
 * after stripping the archive extension gets the suffix appended.
 */
export function recoveredName(file: string, options: ArchiveNameOptions = {}): string {
  const { extension = ARCHIVE_EXTENSION, suffix = RECOVERED_SUFFIX } = options;
  if (!isArchiveName(file, { extension })) {
    throw new HuffmanError(HuffmanErrorCode.MALFORMED_ARCHIVE, `${file} is not a ${extension} archive`);
  }
  const { root, dir, name, ext } = path.parse(file.slice(0, -extension.length));
  return path.format({ root, dir, name: name + suffix, ext });
}
