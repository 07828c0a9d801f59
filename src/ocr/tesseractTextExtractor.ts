import { execFile } from "node:child_process";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { promisify } from "node:util";
import sharp from "sharp";
import { AppConfig } from "../config";
import { Logger } from "../observability";
import { TextExtractor, UnavailableTextExtractor } from "./textExtractor";

const execFileAsync = promisify(execFile);

const MAX_OCR_OUTPUT_BYTES = 16 * 1024 * 1024;

interface TesseractTextExtractorDeps {
  preprocess?: (imagePath: string, outputPath: string) => Promise<void>;
  runTesseract?: (args: string[]) => Promise<string>;
}

async function preprocessWithSharp(imagePath: string, outputPath: string): Promise<void> {
  await sharp(imagePath).greyscale().normalise().png().toFile(outputPath);
}

/**
 * Runs the `tesseract` executable on a greyscale, contrast-normalised PNG
 * copy of the page.
 */
export class TesseractTextExtractor implements TextExtractor {
  readonly available = true;
  private readonly language: string;
  private readonly preprocess: (imagePath: string, outputPath: string) => Promise<void>;
  private readonly runTesseract: (args: string[]) => Promise<string>;

  constructor(config: AppConfig, deps?: TesseractTextExtractorDeps) {
    this.language = config.ocrLanguage;
    this.preprocess = deps?.preprocess ?? preprocessWithSharp;
    this.runTesseract =
      deps?.runTesseract ??
      (async (args) => {
        const { stdout } = await execFileAsync(config.tesseractPath, args, {
          encoding: "utf-8",
          timeout: config.ocrTimeoutMs,
          maxBuffer: MAX_OCR_OUTPUT_BYTES,
        });
        return stdout;
      });
  }

  async extractText(imagePath: string): Promise<string> {
    const tmpDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), "ocr-"));
    const pngPath = path.join(tmpDir, "page.png");
    try {
      await this.preprocess(imagePath, pngPath);
      const stdout = await this.runTesseract([pngPath, "stdout", "-l", this.language]);
      return stdout.trim();
    } finally {
      await fs.promises.rm(tmpDir, { recursive: true, force: true });
    }
  }
}

export async function probeTesseract(tesseractPath: string): Promise<string | undefined> {
  try {
    const { stdout, stderr } = await execFileAsync(tesseractPath, ["--version"], {
      encoding: "utf-8",
      timeout: 5_000,
    });
    const firstLine = `${stdout}${stderr}`.split("\n")[0]?.trim();
    return firstLine || "unknown";
  } catch {
    return undefined;
  }
}

export async function createTextExtractor(
  config: AppConfig,
  logger: Logger,
  probe: (tesseractPath: string) => Promise<string | undefined> = probeTesseract,
): Promise<TextExtractor> {
  const version = await probe(config.tesseractPath);
  if (!version) {
    logger.warn("ocr_unavailable", {
      tesseractPath: config.tesseractPath,
      hint: "install Tesseract OCR (https://github.com/tesseract-ocr/tesseract) or set TESSERACT_PATH",
    });
    return new UnavailableTextExtractor();
  }

  logger.info("ocr_available", { tesseractPath: config.tesseractPath, version });
  return new TesseractTextExtractor(config);
}
