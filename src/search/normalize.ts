import { RawArchiveItem } from "../archive";
import { SearchRecord } from "../types";

export const UNKNOWN_REFERENCE = "Unknown";
export const UNTITLED = "Untitled";

function textField(value: unknown): string | undefined {
  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed === "" ? undefined : trimmed;
  }
  if (typeof value === "number" && Number.isFinite(value)) {
    return String(value);
  }
  return undefined;
}

function imageList(value: unknown): string[] {
  if (!Array.isArray(value)) {
    return [];
  }
  return value.filter((entry): entry is string => typeof entry === "string" && entry.trim() !== "");
}

export function normalizeRecord(archive: string, item: RawArchiveItem): SearchRecord {
  return Object.freeze({
    archive,
    reference: textField(item.reference) ?? UNKNOWN_REFERENCE,
    title: textField(item.title) ?? UNTITLED,
    date: textField(item.date) ?? "",
    itemId: textField(item.id),
    imageUrls: Object.freeze(imageList(item.images)),
  });
}

export function formatLocation(shortName: string, record: SearchRecord): string {
  return `${shortName}: ${record.reference} - ${record.title}, ${record.date}`;
}
