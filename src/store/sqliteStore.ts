import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { DownloadedDocument, ExtractedLetter, PipelineStatus, ProcessedDocument, SearchRecord } from "../types";
import { ResearchStore, RunMode, RunSummary } from "./types";

type RunRow = {
  runId: string;
  mode: string;
  status: string;
  reason: string | null;
  startedAt: string;
  finishedAt: string | null;
};

type CountRow = {
  count: number;
};

const IN_MEMORY = ":memory:";

function toRunMode(value: string): RunMode {
  return value === "full" || value === "ocr-only" ? value : "search";
}

function toRunStatus(value: string): PipelineStatus | "running" {
  return value === "success" || value === "partial" || value === "failure" ? value : "running";
}

export class SqliteStore implements ResearchStore {
  private readonly db: Database.Database;

  constructor(dbPath: string) {
    if (dbPath === IN_MEMORY) {
      this.db = new Database(IN_MEMORY);
    } else {
      const absolutePath = path.resolve(dbPath);
      fs.mkdirSync(path.dirname(absolutePath), { recursive: true });
      this.db = new Database(absolutePath);
      this.db.pragma("journal_mode = WAL");
    }
    this.initializeSchema();
  }

  async startRun(runId: string, mode: RunMode, startedAt: string): Promise<void> {
    this.db
      .prepare(
        `
        INSERT INTO runs (runId, mode, status, reason, startedAt, finishedAt)
        VALUES (@runId, @mode, 'running', NULL, @startedAt, NULL)
        ON CONFLICT(runId) DO UPDATE SET
          mode = excluded.mode,
          status = 'running',
          reason = NULL,
          startedAt = excluded.startedAt,
          finishedAt = NULL
      `,
      )
      .run({ runId, mode, startedAt });
  }

  async finishRun(runId: string, status: PipelineStatus, finishedAt: string, reason?: string): Promise<void> {
    this.db
      .prepare(
        `
        UPDATE runs
        SET
          status = @status,
          reason = @reason,
          finishedAt = @finishedAt
        WHERE runId = @runId
      `,
      )
      .run({ runId, status, reason: reason ?? null, finishedAt });
  }

  async saveSearchRecords(runId: string, records: readonly SearchRecord[]): Promise<void> {
    const statement = this.db.prepare(`
      INSERT INTO search_records (runId, position, archive, reference, title, date, itemId, imageUrls)
      VALUES (@runId, @position, @archive, @reference, @title, @date, @itemId, @imageUrls)
    `);
    const offset = this.count("SELECT COUNT(*) AS count FROM search_records WHERE runId = ?", runId);

    const insertAll = this.db.transaction((rows: readonly SearchRecord[]) => {
      rows.forEach((record, index) => {
        statement.run({
          runId,
          position: offset + index,
          archive: record.archive,
          reference: record.reference,
          title: record.title,
          date: record.date,
          itemId: record.itemId ?? null,
          imageUrls: JSON.stringify(record.imageUrls),
        });
      });
    });
    insertAll(records);
  }

  async saveDownloadedDocument(runId: string, document: DownloadedDocument): Promise<void> {
    this.db
      .prepare(
        `
        INSERT INTO documents (runId, folder, archive, reference, title, date, itemId, imagePaths)
        VALUES (@runId, @folder, @archive, @reference, @title, @date, @itemId, @imagePaths)
        ON CONFLICT(runId, folder) DO UPDATE SET
          imagePaths = excluded.imagePaths
      `,
      )
      .run({
        runId,
        folder: document.folder,
        archive: document.archive,
        reference: document.reference,
        title: document.title,
        date: document.date,
        itemId: document.itemId ?? null,
        imagePaths: JSON.stringify(document.imagePaths),
      });
  }

  async saveAnalysis(runId: string, processed: ProcessedDocument): Promise<void> {
    const analysis = processed.analysis;
    this.db
      .prepare(
        `
        INSERT INTO analyses (
          runId, folder, pageCount, mentionsChurchill, mentionsFairfax,
          detectedDate, likelyCorrespondence, relevanceScore
        )
        VALUES (
          @runId, @folder, @pageCount, @mentionsChurchill, @mentionsFairfax,
          @detectedDate, @likelyCorrespondence, @relevanceScore
        )
        ON CONFLICT(runId, folder) DO UPDATE SET
          pageCount = excluded.pageCount,
          mentionsChurchill = excluded.mentionsChurchill,
          mentionsFairfax = excluded.mentionsFairfax,
          detectedDate = excluded.detectedDate,
          likelyCorrespondence = excluded.likelyCorrespondence,
          relevanceScore = excluded.relevanceScore
      `,
      )
      .run({
        runId,
        folder: processed.document.folder,
        pageCount: processed.pages.length,
        mentionsChurchill: analysis?.mentionsChurchill ? 1 : 0,
        mentionsFairfax: analysis?.mentionsFairfax ? 1 : 0,
        detectedDate: analysis?.detectedDate?.text ?? null,
        likelyCorrespondence: analysis?.likelyCorrespondence ? 1 : 0,
        relevanceScore: analysis?.relevanceScore ?? null,
      });
  }

  async saveLetters(runId: string, letters: readonly ExtractedLetter[]): Promise<void> {
    const statement = this.db.prepare(`
      INSERT INTO letters (runId, position, archive, reference, title, date, fields, relevanceScore, fullText)
      VALUES (@runId, @position, @archive, @reference, @title, @date, @fields, @relevanceScore, @fullText)
    `);
    const offset = this.count("SELECT COUNT(*) AS count FROM letters WHERE runId = ?", runId);

    const insertAll = this.db.transaction((rows: readonly ExtractedLetter[]) => {
      rows.forEach((letter, index) => {
        statement.run({
          runId,
          position: offset + index,
          archive: letter.archive,
          reference: letter.reference,
          title: letter.title,
          date: letter.date,
          fields: JSON.stringify(letter.fields),
          relevanceScore: letter.relevanceScore,
          fullText: letter.fullText,
        });
      });
    });
    insertAll(letters);
  }

  async getRunSummary(runId: string): Promise<RunSummary | undefined> {
    const run = this.db.prepare<[string], RunRow>("SELECT * FROM runs WHERE runId = ?").get(runId);
    if (!run) {
      return undefined;
    }

    return {
      runId: run.runId,
      mode: toRunMode(run.mode),
      status: toRunStatus(run.status),
      reason: run.reason ?? undefined,
      startedAt: run.startedAt,
      finishedAt: run.finishedAt ?? undefined,
      searchRecords: this.count("SELECT COUNT(*) AS count FROM search_records WHERE runId = ?", runId),
      documents: this.count("SELECT COUNT(*) AS count FROM documents WHERE runId = ?", runId),
      analyses: this.count(
        "SELECT COUNT(*) AS count FROM analyses WHERE runId = ? AND relevanceScore IS NOT NULL",
        runId,
      ),
      likelyCorrespondence: this.count(
        "SELECT COUNT(*) AS count FROM analyses WHERE runId = ? AND likelyCorrespondence = 1",
        runId,
      ),
      letters: this.count("SELECT COUNT(*) AS count FROM letters WHERE runId = ?", runId),
    };
  }

  async close(): Promise<void> {
    this.db.close();
  }

  private count(sql: string, runId: string): number {
    return this.db.prepare<[string], CountRow>(sql).get(runId)?.count ?? 0;
  }

  private initializeSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS runs (
        runId TEXT PRIMARY KEY,
        mode TEXT NOT NULL,
        status TEXT NOT NULL,
        reason TEXT NULL,
        startedAt TEXT NOT NULL,
        finishedAt TEXT NULL
      );

      CREATE TABLE IF NOT EXISTS search_records (
        runId TEXT NOT NULL,
        position INTEGER NOT NULL,
        archive TEXT NOT NULL,
        reference TEXT NOT NULL,
        title TEXT NOT NULL,
        date TEXT NOT NULL,
        itemId TEXT NULL,
        imageUrls TEXT NOT NULL,
        PRIMARY KEY (runId, position)
      );

      CREATE TABLE IF NOT EXISTS documents (
        runId TEXT NOT NULL,
        folder TEXT NOT NULL,
        archive TEXT NOT NULL,
        reference TEXT NOT NULL,
        title TEXT NOT NULL,
        date TEXT NOT NULL,
        itemId TEXT NULL,
        imagePaths TEXT NOT NULL,
        PRIMARY KEY (runId, folder)
      );

      CREATE TABLE IF NOT EXISTS analyses (
        runId TEXT NOT NULL,
        folder TEXT NOT NULL,
        pageCount INTEGER NOT NULL,
        mentionsChurchill INTEGER NOT NULL,
        mentionsFairfax INTEGER NOT NULL,
        detectedDate TEXT NULL,
        likelyCorrespondence INTEGER NOT NULL,
        relevanceScore INTEGER NULL,
        PRIMARY KEY (runId, folder)
      );

      CREATE TABLE IF NOT EXISTS letters (
        runId TEXT NOT NULL,
        position INTEGER NOT NULL,
        archive TEXT NOT NULL,
        reference TEXT NOT NULL,
        title TEXT NOT NULL,
        date TEXT NOT NULL,
        fields TEXT NOT NULL,
        relevanceScore INTEGER NOT NULL,
        fullText TEXT NOT NULL,
        PRIMARY KEY (runId, position)
      );

      CREATE INDEX IF NOT EXISTS idx_letters_score ON letters(runId, relevanceScore DESC);
    `);
  }
}
