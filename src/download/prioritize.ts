import { SearchRecord } from "../types";

const TARGET_YEAR = "1946";
// "Dec" also covers "December".
const TARGET_MONTH_MARKERS = ["Oct", "Nov", "Dec"];

export function isInTargetWindow(date: string): boolean {
  return date.includes(TARGET_YEAR) && TARGET_MONTH_MARKERS.some((marker) => date.includes(marker));
}

/** Stable partition: in-window records first, accumulation order kept on both sides. */
export function prioritizeRecords(records: readonly SearchRecord[]): SearchRecord[] {
  const matching: SearchRecord[] = [];
  const rest: SearchRecord[] = [];
  for (const record of records) {
    (isInTargetWindow(record.date) ? matching : rest).push(record);
  }
  return [...matching, ...rest];
}

export function sanitizeReference(reference: string): string {
  return reference.replace(/[/\\]/g, "_");
}

export function documentFolderName(archive: string, reference: string): string {
  return `${archive}_${sanitizeReference(reference)}`;
}
