export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogFields {
  archive?: string;
  reference?: string;
  url?: string;
  attempt?: number;
  [key: string]: unknown;
}

export const METRIC_COUNTER_NAMES = [
  "searches_ok",
  "searches_failed",
  "records_found",
  "images_ok",
  "images_failed",
  "documents_downloaded",
  "pages_ocr_ok",
  "pages_ocr_failed",
  "letters_extracted",
] as const;

export const METRIC_TIMER_NAMES = ["search_ms", "image_download_ms", "ocr_ms"] as const;

export type MetricCounterName = (typeof METRIC_COUNTER_NAMES)[number];

export type MetricTimerName = (typeof METRIC_TIMER_NAMES)[number];
