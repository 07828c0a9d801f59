import { DateWindow } from "../types";

/** An archive item exactly as it came off the wire; fields are unverified. */
export type RawArchiveItem = Record<string, unknown>;

export type SearchResponse =
  | { status: "ok"; results: RawArchiveItem[] }
  | { status: "error"; error: string; results: [] };

export type DocumentResponse = { status: "ok"; document: RawArchiveItem } | { status: "error"; error: string };

export interface SearchOptions {
  page?: number;
  limit?: number;
  dateRange?: DateWindow;
  collection?: string;
}
