import fs from "node:fs";
import path from "node:path";
import { analyzeText, joinPageTexts } from "../analysis";
import { AppConfig } from "../config";
import { errorMessage, Logger, MetricsRegistry } from "../observability";
import { DownloadedDocument, PageText, ProcessedDocument } from "../types";
import { isImagePath, TextExtractor } from "./textExtractor";

interface OcrProcessorDeps {
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  textExtractor: TextExtractor;
  /** Image tree mirrored under the OCR directory; the downloads directory unless given. */
  sourceRoot?: string;
}

const POTENTIAL_MATCH_SCORE = 30;

export class OcrProcessor {
  private readonly outputDir: string;
  private readonly sourceRoot: string;
  private readonly logger: Logger;
  private readonly metrics: MetricsRegistry;
  private readonly textExtractor: TextExtractor;

  constructor(deps: OcrProcessorDeps) {
    this.outputDir = path.resolve(deps.config.outputDirs.ocr);
    this.sourceRoot = path.resolve(deps.sourceRoot ?? deps.config.outputDirs.downloads);
    this.logger = deps.logger;
    this.metrics = deps.metrics;
    this.textExtractor = deps.textExtractor;
  }

  get available(): boolean {
    return this.textExtractor.available;
  }

  /**
   * `{ocr}/{image folder relative to the source root}/{image name}.txt`.
   * Images outside the source root fall back to their folder's name.
   */
  textPathFor(imagePath: string): string {
    const imageDir = path.resolve(path.dirname(imagePath));
    const relative = path.relative(this.sourceRoot, imageDir);
    const folder = relative.startsWith("..") || path.isAbsolute(relative) ? path.basename(imageDir) : relative;
    const baseName = path.basename(imagePath, path.extname(imagePath));
    return path.join(this.outputDir, folder, `${baseName}.txt`);
  }

  async processImage(imagePath: string): Promise<PageText> {
    if (!this.textExtractor.available) {
      this.logger.warn("ocr_skipped_unavailable", { imagePath });
      return { imagePath, text: await this.textExtractor.extractText(imagePath) };
    }

    const stopTimer = this.metrics.startTimer("ocr_ms");
    try {
      const text = await this.textExtractor.extractText(imagePath);
      const textPath = this.textPathFor(imagePath);
      await fs.promises.mkdir(path.dirname(textPath), { recursive: true });
      await fs.promises.writeFile(textPath, text, "utf-8");

      const durationMs = stopTimer();
      this.metrics.incrementCounter("pages_ocr_ok", 1);
      this.logger.info("ocr_page_ok", { imagePath, textPath, durationMs, characters: text.length });
      return { imagePath, text };
    } catch (error) {
      const durationMs = stopTimer();
      this.metrics.incrementCounter("pages_ocr_failed", 1);
      this.logger.error("ocr_page_failed", { imagePath, durationMs, error: errorMessage(error) });
      return { imagePath, text: "" };
    }
  }

  async processDocument(document: DownloadedDocument): Promise<ProcessedDocument> {
    const pages: PageText[] = [];
    for (const imagePath of document.imagePaths) {
      if (!isImagePath(imagePath)) {
        this.logger.warn("ocr_unsupported_format", { reference: document.reference, imagePath });
        continue;
      }
      pages.push(await this.processImage(imagePath));
    }

    const processed: ProcessedDocument = { document, pages };
    if (pages.length === 0) {
      return processed;
    }

    processed.analysis = analyzeText(joinPageTexts(processed));
    if (processed.analysis.likelyCorrespondence && processed.analysis.relevanceScore > POTENTIAL_MATCH_SCORE) {
      this.logger.info("ocr_potential_match", {
        archive: document.archive,
        reference: document.reference,
        relevanceScore: processed.analysis.relevanceScore,
      });
    }
    return processed;
  }

  async processDocuments(documents: readonly DownloadedDocument[]): Promise<ProcessedDocument[]> {
    this.logger.info("ocr_start", { documentCount: documents.length });
    const results: ProcessedDocument[] = [];
    for (const document of documents) {
      results.push(await this.processDocument(document));
    }
    this.logger.info("ocr_complete", { documentCount: results.length });
    return results;
  }
}
