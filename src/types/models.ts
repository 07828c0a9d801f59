export interface DateWindow {
  /** YYYY-MM-DD */
  start: string;
  /** YYYY-MM-DD */
  end: string;
}

export interface SearchRecord {
  readonly archive: string;
  readonly reference: string;
  readonly title: string;
  readonly date: string;
  readonly itemId?: string;
  readonly imageUrls: readonly string[];
}

export interface DownloadedDocument {
  archive: string;
  reference: string;
  title: string;
  date: string;
  itemId?: string;
  folder: string;
  imagePaths: string[];
}

export interface PageText {
  imagePath: string;
  text: string;
}

export interface DetectedDate {
  text: string;
  day: number;
  /** 1-12 */
  month: number;
  year: number;
}

export interface Analysis {
  readonly mentionsChurchill: boolean;
  readonly mentionsFairfax: boolean;
  readonly detectedDate?: DetectedDate;
  readonly likelyCorrespondence: boolean;
  readonly relevanceScore: number;
}

export interface ProcessedDocument {
  document: DownloadedDocument;
  pages: PageText[];
  analysis?: Analysis;
}

export type LetterFieldName = "date" | "salutation" | "body" | "signature";

export type LetterFields = Partial<Record<LetterFieldName, string>>;

export interface ExtractedLetter {
  archive: string;
  reference: string;
  title: string;
  date: string;
  fields: LetterFields;
  relevanceScore: number;
  fullText: string;
}

export type PipelineStatus = "success" | "partial" | "failure";
