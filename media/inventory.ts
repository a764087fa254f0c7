/**
 * Media inventory
 *
 * Lists the supported media files of a flat input folder in a stable order.
 */
import fs from "fs/promises";
import path from "path";

import { MissingInputError, NoMediaFoundError } from "../errors";
import log from "../log";
import type { MediaFile } from "./types";

export function toMediaFile(filePath: string): MediaFile {
  const name = path.basename(filePath);
  const rawExtension = path.extname(name);
  return {
    path: filePath,
    name,
    extension: rawExtension.toLowerCase(),
    stem: path.basename(name, rawExtension),
  };
}

/**
 * Scan a directory for supported media files, sorted by path.
 *
 * @throws MissingInputError when the directory does not exist
 * @throws NoMediaFoundError when nothing in it has a supported extension
 */
export async function scanMediaFiles(
  directory: string,
  supportedExtensions: readonly string[],
): Promise<MediaFile[]> {
  const supported = new Set(supportedExtensions.map((ext) => ext.toLowerCase()));

  const entries = await fs
    .readdir(directory, { withFileTypes: true })
    .catch((error: unknown) => {
      if (isMissingDirectory(error)) throw new MissingInputError(directory);
      throw error;
    });

  const files = entries
    .filter((entry) => entry.isFile())
    .map((entry) => toMediaFile(path.join(directory, entry.name)))
    .filter((file) => supported.has(file.extension))
    .sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));

  if (files.length === 0) {
    throw new NoMediaFoundError(directory, supportedExtensions);
  }

  const counts = new Map<string, number>();
  for (const file of files) {
    counts.set(file.extension, (counts.get(file.extension) ?? 0) + 1);
  }
  for (const [extension, count] of [...counts].sort(([a], [b]) => (a < b ? -1 : 1))) {
    log.info(`Found ${count} ${extension} file(s).`, { extension, count });
  }

  warnSharedStems(files);

  return files;
}

/**
 * Files named alike except for the extension map to the same transcript
 * and segment folder; the later file's transcript replaces the earlier one.
 */
function warnSharedStems(files: readonly MediaFile[]): void {
  const byStem = new Map<string, string[]>();
  for (const file of files) {
    byStem.set(file.stem, [...(byStem.get(file.stem) ?? []), file.name]);
  }
  for (const [stem, names] of byStem) {
    if (names.length < 2) continue;
    log.warn(
      `${names.join(", ")} share the name '${stem}'; only the last one's transcript_${stem}.txt is kept`,
      { stem, files: names },
    );
  }
}

function isMissingDirectory(error: unknown): boolean {
  if (!(error instanceof Error) || !("code" in error)) return false;
  return error.code === "ENOENT" || error.code === "ENOTDIR";
}
