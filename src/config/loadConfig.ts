import fs from "node:fs";
import path from "node:path";
import { isLogLevel } from "../observability/logger";
import { formatValidationErrors } from "../core/validation";
import { validateConfigOverrides } from "./schema";
import { AppConfig, ArchiveDescriptor, ConfigOverrides } from "./types";

const DEFAULT_ARCHIVES: ArchiveDescriptor[] = [
  {
    name: "Churchill Archives Centre",
    shortName: "CAC",
    baseUrl: "https://archives.chu.cam.ac.uk/",
    endpoints: {
      search: "search",
      item: "archives/record",
      collection: "archives/collection",
    },
    collections: ["CHAR", "CHUR"],
    apiKeyEnv: "CHURCHILL_API_KEY",
    search: {
      queries: ["Fairfax Winston Churchill correspondence"],
      limit: 50,
      collection: "CHAR",
      useDateWindow: true,
    },
  },
  {
    name: "Library and Archives Canada",
    shortName: "LAC",
    baseUrl: "https://recherche-collection-search.bac-lac.gc.ca/eng/home/",
    endpoints: {
      search: "record",
      item: "item",
    },
    collections: ["MG30", "RG24"],
    apiKeyEnv: "LAC_API_KEY",
    search: {
      queries: ["Bryan Charles Fairfax Churchill", "Colonel Fairfax correspondence", "Fairfax Winston Churchill"],
      limit: 30,
      useDateWindow: true,
    },
  },
  {
    name: "University of Toronto Archives",
    shortName: "UofT",
    baseUrl: "https://utarms.library.utoronto.ca/",
    endpoints: {
      search: "index.php/informationobject/browse",
    },
    collections: ["B1994-0002", "B2015-0005"],
    apiKeyEnv: "UTARMS_API_KEY",
    search: {
      queries: ["Fairfax Churchill", "Bryan Charles Fairfax correspondence", "Fairfax Winston"],
      limit: 30,
      collection: "B1994-0002",
      useDateWindow: false,
    },
  },
];

const DEFAULT_CONFIG: AppConfig = {
  userAgent: "correspondence-finder/0.1 (archival research)",
  ignoreHttpsErrors: false,
  requestTimeoutMs: 20_000,
  downloadTimeoutMs: 60_000,
  rateLimitIntervalMs: 1_000,
  maxDownloadAttempts: 3,
  retryBaseDelayMs: 2_000,
  searchConcurrency: 1,
  defaultMaxDocs: 5,
  // Churchill's reply is dated 6 December 1946.
  searchWindow: {
    start: "1946-10-01",
    end: "1946-12-05",
  },
  ocrLanguage: "eng",
  tesseractPath: "tesseract",
  ocrTimeoutMs: 30_000,
  logLevel: "info",
  archives: DEFAULT_ARCHIVES,
  outputDirs: {
    downloads: "downloaded_documents",
    ocr: "ocr_results",
  },
  storePath: "data/research.sqlite",
};

function readConfigFile(configPath?: string): ConfigOverrides {
  if (!configPath) {
    return {};
  }

  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw new Error(`Config file not found: ${absolutePath}`);
  }

  const raw = fs.readFileSync(absolutePath, "utf-8");
  const parsed: unknown = JSON.parse(raw);
  if (!validateConfigOverrides(parsed)) {
    throw new Error(`Invalid config file ${absolutePath}: ${formatValidationErrors(validateConfigOverrides.errors)}`);
  }
  return parsed;
}

function toInt(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function toBool(value: string | undefined, fallback: boolean): boolean {
  if (!value) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === "1" || normalized === "true" || normalized === "yes") {
    return true;
  }
  if (normalized === "0" || normalized === "false" || normalized === "no") {
    return false;
  }
  return fallback;
}

export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const fileConfig = readConfigFile(configPath);

  const merged: AppConfig = {
    ...DEFAULT_CONFIG,
    ...fileConfig,
    searchWindow: {
      ...DEFAULT_CONFIG.searchWindow,
      ...(fileConfig.searchWindow ?? {}),
    },
    outputDirs: {
      ...DEFAULT_CONFIG.outputDirs,
      ...(fileConfig.outputDirs ?? {}),
    },
  };

  return {
    ...merged,
    userAgent: env.USER_AGENT ?? merged.userAgent,
    ignoreHttpsErrors: toBool(env.IGNORE_HTTPS_ERRORS, merged.ignoreHttpsErrors),
    requestTimeoutMs: toInt(env.REQUEST_TIMEOUT_MS, merged.requestTimeoutMs),
    downloadTimeoutMs: toInt(env.DOWNLOAD_TIMEOUT_MS, merged.downloadTimeoutMs),
    rateLimitIntervalMs: toInt(env.RATE_LIMIT_INTERVAL_MS, merged.rateLimitIntervalMs),
    maxDownloadAttempts: toInt(env.MAX_DOWNLOAD_ATTEMPTS, merged.maxDownloadAttempts),
    retryBaseDelayMs: toInt(env.RETRY_BASE_DELAY_MS, merged.retryBaseDelayMs),
    searchConcurrency: toInt(env.SEARCH_CONCURRENCY, merged.searchConcurrency),
    ocrLanguage: env.OCR_LANGUAGE ?? merged.ocrLanguage,
    tesseractPath: env.TESSERACT_PATH ?? merged.tesseractPath,
    ocrTimeoutMs: toInt(env.OCR_TIMEOUT_MS, merged.ocrTimeoutMs),
    logLevel: isLogLevel(env.LOG_LEVEL) ? env.LOG_LEVEL : merged.logLevel,
    storePath: env.STORE_PATH ?? merged.storePath,
    outputDirs: {
      downloads: env.OUTPUT_DOWNLOADS_DIR ?? merged.outputDirs.downloads,
      ocr: env.OUTPUT_OCR_DIR ?? merged.outputDirs.ocr,
    },
  };
}

export { DEFAULT_CONFIG };
