import { ajv } from "../core/validation";
import { ConfigOverrides } from "./types";

const isoDate = { type: "string", pattern: "^\\d{4}-\\d{2}-\\d{2}$" };

const archiveSchema = {
  type: "object",
  required: ["name", "shortName", "baseUrl", "endpoints", "apiKeyEnv", "search"],
  properties: {
    name: { type: "string", minLength: 1 },
    shortName: { type: "string", minLength: 1 },
    baseUrl: { type: "string", minLength: 1 },
    endpoints: {
      type: "object",
      required: ["search"],
      properties: {
        search: { type: "string" },
        item: { type: "string" },
        collection: { type: "string" },
      },
    },
    collections: { type: "array", items: { type: "string" }, default: [] },
    apiKeyEnv: { type: "string" },
    search: {
      type: "object",
      required: ["queries"],
      properties: {
        queries: { type: "array", items: { type: "string" }, minItems: 1 },
        limit: { type: "integer", minimum: 1, default: 20 },
        collection: { type: "string" },
        useDateWindow: { type: "boolean", default: false },
      },
    },
  },
};

const configOverridesSchema = {
  type: "object",
  properties: {
    userAgent: { type: "string" },
    ignoreHttpsErrors: { type: "boolean" },
    requestTimeoutMs: { type: "integer", minimum: 1 },
    downloadTimeoutMs: { type: "integer", minimum: 1 },
    rateLimitIntervalMs: { type: "integer", minimum: 0 },
    maxDownloadAttempts: { type: "integer", minimum: 1 },
    retryBaseDelayMs: { type: "integer", minimum: 0 },
    searchConcurrency: { type: "integer", minimum: 1 },
    defaultMaxDocs: { type: "integer", minimum: 1 },
    searchWindow: {
      type: "object",
      properties: { start: isoDate, end: isoDate },
    },
    ocrLanguage: { type: "string" },
    tesseractPath: { type: "string" },
    ocrTimeoutMs: { type: "integer", minimum: 1 },
    logLevel: { enum: ["debug", "info", "warn", "error"] },
    archives: { type: "array", items: archiveSchema },
    outputDirs: {
      type: "object",
      properties: {
        downloads: { type: "string" },
        ocr: { type: "string" },
      },
    },
    storePath: { type: "string" },
  },
};

export const validateConfigOverrides = ajv.compile<ConfigOverrides>(configOverridesSchema);
