import { DownloadedDocument, ExtractedLetter, PipelineStatus, ProcessedDocument, SearchRecord } from "../types";
import { ResearchStore, RunMode, RunSummary } from "./types";

interface RunState {
  mode: RunMode;
  status: PipelineStatus | "running";
  reason?: string;
  startedAt: string;
  finishedAt?: string;
  records: SearchRecord[];
  documents: Map<string, DownloadedDocument>;
  analyses: Map<string, ProcessedDocument>;
  letters: ExtractedLetter[];
}

export class InMemoryStore implements ResearchStore {
  private readonly runs = new Map<string, RunState>();

  async startRun(runId: string, mode: RunMode, startedAt: string): Promise<void> {
    this.runs.set(runId, {
      mode,
      status: "running",
      startedAt,
      records: [],
      documents: new Map(),
      analyses: new Map(),
      letters: [],
    });
  }

  async finishRun(runId: string, status: PipelineStatus, finishedAt: string, reason?: string): Promise<void> {
    const run = this.requireRun(runId);
    run.status = status;
    run.finishedAt = finishedAt;
    run.reason = reason;
  }

  async saveSearchRecords(runId: string, records: readonly SearchRecord[]): Promise<void> {
    this.requireRun(runId).records.push(...records);
  }

  async saveDownloadedDocument(runId: string, document: DownloadedDocument): Promise<void> {
    this.requireRun(runId).documents.set(document.folder, document);
  }

  async saveAnalysis(runId: string, processed: ProcessedDocument): Promise<void> {
    this.requireRun(runId).analyses.set(processed.document.folder, processed);
  }

  async saveLetters(runId: string, letters: readonly ExtractedLetter[]): Promise<void> {
    this.requireRun(runId).letters.push(...letters);
  }

  async getRunSummary(runId: string): Promise<RunSummary | undefined> {
    const run = this.runs.get(runId);
    if (!run) {
      return undefined;
    }

    const analyses = [...run.analyses.values()].filter((processed) => processed.analysis !== undefined);
    return {
      runId,
      mode: run.mode,
      status: run.status,
      reason: run.reason,
      startedAt: run.startedAt,
      finishedAt: run.finishedAt,
      searchRecords: run.records.length,
      documents: run.documents.size,
      analyses: analyses.length,
      likelyCorrespondence: analyses.filter((processed) => processed.analysis?.likelyCorrespondence).length,
      letters: run.letters.length,
    };
  }

  async close(): Promise<void> {
    this.runs.clear();
  }

  private requireRun(runId: string): RunState {
    const run = this.runs.get(runId);
    if (!run) {
      throw new Error(`Unknown run: ${runId}`);
    }
    return run;
  }
}
