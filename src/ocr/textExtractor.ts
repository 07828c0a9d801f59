export const OCR_UNAVAILABLE_TEXT = "[OCR UNAVAILABLE - INSTALL REQUIRED DEPENDENCIES]";

export const IMAGE_EXTENSIONS = [".png", ".jpg", ".jpeg", ".tif", ".tiff", ".bmp"];

export interface TextExtractor {
  /** False for the stand-in used when no OCR engine could be found. */
  readonly available: boolean;
  extractText(imagePath: string): Promise<string>;
}

export class UnavailableTextExtractor implements TextExtractor {
  readonly available = false;

  async extractText(_imagePath: string): Promise<string> {
    return OCR_UNAVAILABLE_TEXT;
  }
}

export function isImagePath(filePath: string): boolean {
  const lower = filePath.toLowerCase();
  return IMAGE_EXTENSIONS.some((extension) => lower.endsWith(extension));
}
