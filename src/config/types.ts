import { LogLevel } from "../observability/types";
import { DateWindow } from "../types";

export interface ArchiveEndpoints {
  search: string;
  item?: string;
  collection?: string;
}

export interface ArchiveSearchProfile {
  /** Phrasings issued in order; more variants trade requests for recall. */
  queries: string[];
  limit: number;
  /** Sent as the `collection` parameter, never applied client-side. */
  collection?: string;
  useDateWindow: boolean;
}

export interface ArchiveDescriptor {
  name: string;
  shortName: string;
  baseUrl: string;
  endpoints: ArchiveEndpoints;
  collections: string[];
  apiKeyEnv: string;
  search: ArchiveSearchProfile;
}

export interface OutputDirs {
  downloads: string;
  ocr: string;
}

export interface AppConfig {
  userAgent: string;
  ignoreHttpsErrors: boolean;
  requestTimeoutMs: number;
  downloadTimeoutMs: number;
  rateLimitIntervalMs: number;
  maxDownloadAttempts: number;
  retryBaseDelayMs: number;
  searchConcurrency: number;
  defaultMaxDocs: number;
  searchWindow: DateWindow;
  ocrLanguage: string;
  tesseractPath: string;
  ocrTimeoutMs: number;
  logLevel: LogLevel;
  archives: ArchiveDescriptor[];
  outputDirs: OutputDirs;
  storePath: string;
}

export type ConfigOverrides = Partial<Omit<AppConfig, "outputDirs" | "searchWindow">> & {
  outputDirs?: Partial<OutputDirs>;
  searchWindow?: Partial<DateWindow>;
};
