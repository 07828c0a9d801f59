import { DownloadedDocument, ExtractedLetter, PipelineStatus, ProcessedDocument, SearchRecord } from "../types";

export type RunMode = "search" | "full" | "ocr-only";

export interface RunSummary {
  runId: string;
  mode: RunMode;
  status: PipelineStatus | "running";
  reason?: string;
  startedAt: string;
  finishedAt?: string;
  searchRecords: number;
  documents: number;
  analyses: number;
  likelyCorrespondence: number;
  letters: number;
}

export interface ResearchStore {
  startRun(runId: string, mode: RunMode, startedAt: string): Promise<void>;
  finishRun(runId: string, status: PipelineStatus, finishedAt: string, reason?: string): Promise<void>;
  saveSearchRecords(runId: string, records: readonly SearchRecord[]): Promise<void>;
  saveDownloadedDocument(runId: string, document: DownloadedDocument): Promise<void>;
  saveAnalysis(runId: string, processed: ProcessedDocument): Promise<void>;
  saveLetters(runId: string, letters: readonly ExtractedLetter[]): Promise<void>;
  getRunSummary(runId: string): Promise<RunSummary | undefined>;
  close(): Promise<void>;
}
