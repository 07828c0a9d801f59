import fs, { Dirent } from "node:fs";
import path from "node:path";
import { errorMessage, Logger } from "../observability";
import { DownloadedDocument } from "../types";
import { isImagePath } from "./textExtractor";

export const UNKNOWN_ARCHIVE = "unknown";

/**
 * Every directory under `root` that directly holds image files becomes one
 * document, named after the directory, pages in file-name order. Directories
 * that cannot be read are logged and passed over.
 */
export async function discoverImageDocuments(root: string, logger?: Logger): Promise<DownloadedDocument[]> {
  const documents: DownloadedDocument[] = [];
  const pending = [path.resolve(root)];

  while (pending.length > 0) {
    const directory = pending.shift();
    if (directory === undefined) {
      break;
    }

    let entries: Dirent[];
    try {
      entries = await fs.promises.readdir(directory, { withFileTypes: true });
    } catch (error) {
      logger?.warn("ocr_only_directory_unreadable", { directory, error: errorMessage(error) });
      continue;
    }
    entries.sort((a, b) => a.name.localeCompare(b.name));

    const images = entries
      .filter((entry) => entry.isFile() && isImagePath(entry.name))
      .map((entry) => path.join(directory, entry.name));

    if (images.length > 0) {
      const name = path.basename(directory);
      documents.push({
        archive: UNKNOWN_ARCHIVE,
        reference: name,
        title: name,
        date: "",
        folder: directory,
        imagePaths: images,
      });
    }

    for (const entry of entries) {
      if (entry.isDirectory()) {
        pending.push(path.join(directory, entry.name));
      }
    }
  }

  return documents;
}
