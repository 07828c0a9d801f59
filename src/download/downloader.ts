import fs from "node:fs";
import path from "node:path";
import { ArchiveClient } from "../archive";
import { AppConfig } from "../config";
import { errorMessage, Logger, MetricsRegistry } from "../observability";
import { DownloadedDocument, SearchRecord } from "../types";
import { documentFolderName, prioritizeRecords } from "./prioritize";

interface DownloadManagerDeps {
  clients: ArchiveClient[];
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
}

export interface DownloadSummary {
  documents: DownloadedDocument[];
  considered: number;
  skippedNoClient: number;
  skippedNoImages: number;
  failed: number;
}

export class DownloadManager {
  private readonly clientsByArchive: Map<string, ArchiveClient>;
  private readonly outputDir: string;
  private readonly logger: Logger;
  private readonly metrics: MetricsRegistry;

  constructor(deps: DownloadManagerDeps) {
    this.clientsByArchive = new Map(deps.clients.map((client) => [client.name, client]));
    this.outputDir = path.resolve(deps.config.outputDirs.downloads);
    this.logger = deps.logger;
    this.metrics = deps.metrics;
  }

  async downloadDocuments(records: readonly SearchRecord[], maxDocs: number): Promise<DownloadSummary> {
    this.logger.info("download_start", { recordCount: records.length, maxDocs });
    const summary: DownloadSummary = {
      documents: [],
      considered: 0,
      skippedNoClient: 0,
      skippedNoImages: 0,
      failed: 0,
    };
    const usedFolders = new Set<string>();

    for (const record of prioritizeRecords(records)) {
      if (summary.documents.length >= maxDocs) {
        break;
      }
      summary.considered += 1;

      const client = this.clientsByArchive.get(record.archive);
      if (!client) {
        summary.skippedNoClient += 1;
        this.logger.warn("download_no_client", { archive: record.archive, reference: record.reference });
        continue;
      }

      if (record.imageUrls.length === 0) {
        summary.skippedNoImages += 1;
        this.logger.info("download_no_images", { archive: record.archive, reference: record.reference });
        continue;
      }

      const folder = this.claimFolder(record, usedFolders);
      const document = await this.downloadRecord(client, record, folder);
      if (!document) {
        summary.failed += 1;
        continue;
      }
      summary.documents.push(document);
    }

    const imageCount = summary.documents.reduce((acc, doc) => acc + doc.imagePaths.length, 0);
    this.logger.info("download_complete", {
      documentCount: summary.documents.length,
      imageCount,
      considered: summary.considered,
      skippedNoClient: summary.skippedNoClient,
      skippedNoImages: summary.skippedNoImages,
      failed: summary.failed,
    });
    return summary;
  }

  folderFor(record: Pick<SearchRecord, "archive" | "reference">): string {
    return path.join(this.outputDir, documentFolderName(record.archive, record.reference));
  }

  /** Records that share a folder name (two missing references, say) get `_2`, `_3`, ... appended. */
  private claimFolder(record: SearchRecord, usedFolders: Set<string>): string {
    const base = this.folderFor(record);
    let folder = base;
    for (let n = 2; usedFolders.has(folder); n += 1) {
      folder = `${base}_${n}`;
    }
    usedFolders.add(folder);
    return folder;
  }

  private async downloadRecord(
    client: ArchiveClient,
    record: SearchRecord,
    folder: string,
  ): Promise<DownloadedDocument | undefined> {
    const imagePaths: string[] = [];
    try {
      await fs.promises.mkdir(folder, { recursive: true });
      for (const [index, url] of record.imageUrls.entries()) {
        const outputPath = path.join(folder, `page_${index + 1}.jpg`);
        if (await client.downloadImage(url, outputPath)) {
          imagePaths.push(outputPath);
        }
      }
    } catch (error) {
      this.logger.error("download_document_failed", {
        archive: record.archive,
        reference: record.reference,
        folder,
        error: errorMessage(error),
      });
      return undefined;
    }

    if (imagePaths.length === 0) {
      this.logger.warn("download_document_failed", {
        archive: record.archive,
        reference: record.reference,
        imageCount: record.imageUrls.length,
      });
      return undefined;
    }

    this.metrics.incrementCounter("documents_downloaded", 1);
    this.logger.info("download_document_ok", {
      archive: record.archive,
      reference: record.reference,
      downloaded: imagePaths.length,
      requested: record.imageUrls.length,
    });

    return {
      archive: record.archive,
      reference: record.reference,
      title: record.title,
      date: record.date,
      itemId: record.itemId,
      folder,
      imagePaths,
    };
  }
}
