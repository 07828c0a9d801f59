import fs from "node:fs";
import { extractLetters } from "../analysis";
import { ArchiveClient } from "../archive";
import { AppConfig } from "../config";
import { DownloadManager } from "../download";
import { Logger, MetricsRegistry } from "../observability";
import { discoverImageDocuments, OcrProcessor, TextExtractor } from "../ocr";
import { generateResearchPlan, likelyLetterTopics, ResearchPlan } from "../plan";
import { SearchAggregator } from "../search";
import { ResearchStore, RunMode } from "../store";
import { DateWindow, ExtractedLetter, PipelineStatus, ProcessedDocument } from "../types";

export interface CommandContext {
  runId: string;
  config: AppConfig;
  store: ResearchStore;
  logger: Logger;
  metrics: MetricsRegistry;
  clients: ArchiveClient[];
  textExtractor: TextExtractor;
}

export interface SearchCommandOptions {
  window: DateWindow;
  query?: string;
}

export interface FullSearchOptions extends SearchCommandOptions {
  maxDocs: number;
}

export interface SearchReport {
  status: PipelineStatus;
  searchResultsCount: number;
  mostLikelyLocations: string[];
  researchPlan: ResearchPlan;
  likelyTopics: string[];
}

export interface PipelineResult {
  status: PipelineStatus;
  reason?: string;
  searchResultsCount: number;
  documentsProcessed: number;
  potentialLettersFound: number;
  topMatches: ExtractedLetter[];
  researchPlan: ResearchPlan;
  mostLikelyLocations: string[];
}

export interface OcrReport {
  status: PipelineStatus;
  reason?: string;
  documentsProcessed: number;
  imageCount: number;
  letters: ExtractedLetter[];
}

const TOP_MATCHES = 3;
const BODY_EXCERPT_LENGTH = 150;

function createAggregator(ctx: CommandContext): SearchAggregator {
  return new SearchAggregator({
    clients: ctx.clients,
    config: ctx.config,
    logger: ctx.logger.child("search"),
    metrics: ctx.metrics,
  });
}

function createOcrProcessor(ctx: CommandContext, sourceRoot?: string): OcrProcessor {
  return new OcrProcessor({
    config: ctx.config,
    sourceRoot,
    logger: ctx.logger.child("ocr"),
    metrics: ctx.metrics,
    textExtractor: ctx.textExtractor,
  });
}

async function withRun<T extends { status: PipelineStatus; reason?: string }>(
  ctx: CommandContext,
  mode: RunMode,
  body: () => Promise<T>,
): Promise<T> {
  await ctx.store.startRun(ctx.runId, mode, new Date().toISOString());
  try {
    const result = await body();
    await ctx.store.finishRun(ctx.runId, result.status, new Date().toISOString(), result.reason);
    return result;
  } catch (error) {
    await ctx.store.finishRun(ctx.runId, "failure", new Date().toISOString(), "unexpected error");
    throw error;
  }
}

async function analyzeAndExtract(ctx: CommandContext, processed: ProcessedDocument[]): Promise<ExtractedLetter[]> {
  for (const document of processed) {
    await ctx.store.saveAnalysis(ctx.runId, document);
  }

  ctx.logger.info("letters_extract_start", { documentCount: processed.length });
  const letters = extractLetters(processed);
  await ctx.store.saveLetters(ctx.runId, letters);
  ctx.metrics.incrementCounter("letters_extracted", letters.length);
  ctx.logger.info("letters_extract_complete", { letterCount: letters.length });
  return letters;
}

export function bodyExcerpt(body: string, maxLength = BODY_EXCERPT_LENGTH): string {
  return body.length > maxLength ? `${body.slice(0, maxLength)}...` : body;
}

export function logLetterCandidates(logger: Logger, letters: readonly ExtractedLetter[]): void {
  letters.forEach((letter, index) => {
    logger.info("letter_candidate", {
      rank: index + 1,
      relevanceScore: letter.relevanceScore,
      archive: letter.archive,
      reference: letter.reference,
      title: letter.title,
      catalogDate: letter.date,
      letterDate: letter.fields.date,
      salutation: letter.fields.salutation,
      bodyExcerpt: letter.fields.body !== undefined ? bodyExcerpt(letter.fields.body) : undefined,
      signature: letter.fields.signature,
    });
  });
}

export async function runBasicSearch(ctx: CommandContext, options: SearchCommandOptions): Promise<SearchReport> {
  return withRun<SearchReport>(ctx, "search", async () => {
    ctx.logger.info("basic_search_start", { window: options.window, query: options.query });
    const aggregated = await createAggregator(ctx).searchAll({ window: options.window, extraQuery: options.query });
    await ctx.store.saveSearchRecords(ctx.runId, aggregated.records);

    const researchPlan = generateResearchPlan(ctx.config.archives);
    const likelyTopics = likelyLetterTopics();

    aggregated.locations.forEach((location, index) => {
      ctx.logger.info("likely_location", { rank: index + 1, location });
    });
    likelyTopics.forEach((topic) => ctx.logger.info("likely_topic", { topic }));
    researchPlan.searchStrategy.forEach((step, index) => ctx.logger.info("next_step", { step: index + 1, action: step }));

    const report: SearchReport = {
      status: aggregated.records.length > 0 ? "success" : "failure",
      searchResultsCount: aggregated.records.length,
      mostLikelyLocations: aggregated.locations,
      researchPlan,
      likelyTopics,
    };
    ctx.logger.info("basic_search_complete", {
      status: report.status,
      searchResultsCount: report.searchResultsCount,
    });
    return report;
  });
}

export async function runFullSearch(ctx: CommandContext, options: FullSearchOptions): Promise<PipelineResult> {
  return withRun<PipelineResult>(ctx, "full", async () => {
    ctx.logger.info("pipeline_start", { window: options.window, query: options.query, maxDocs: options.maxDocs });
    const researchPlan = generateResearchPlan(ctx.config.archives);

    const aggregated = await createAggregator(ctx).searchAll({ window: options.window, extraQuery: options.query });
    await ctx.store.saveSearchRecords(ctx.runId, aggregated.records);
    const base = {
      searchResultsCount: aggregated.records.length,
      researchPlan,
      mostLikelyLocations: aggregated.locations,
    };

    if (aggregated.records.length === 0) {
      ctx.logger.error("pipeline_no_search_results");
      return {
        ...base,
        status: "failure",
        reason: "No search results found",
        documentsProcessed: 0,
        potentialLettersFound: 0,
        topMatches: [],
      };
    }

    const downloader = new DownloadManager({
      clients: ctx.clients,
      config: ctx.config,
      logger: ctx.logger.child("download"),
      metrics: ctx.metrics,
    });
    const downloads = await downloader.downloadDocuments(aggregated.records, options.maxDocs);
    for (const document of downloads.documents) {
      await ctx.store.saveDownloadedDocument(ctx.runId, document);
    }

    if (downloads.documents.length === 0) {
      ctx.logger.error("pipeline_no_downloads");
      return {
        ...base,
        status: "partial",
        reason: "No documents could be downloaded",
        documentsProcessed: 0,
        potentialLettersFound: 0,
        topMatches: [],
      };
    }

    const processed = await createOcrProcessor(ctx).processDocuments(downloads.documents);
    const letters = await analyzeAndExtract(ctx, processed);

    const result: PipelineResult = {
      ...base,
      status: letters.length > 0 ? "success" : "partial",
      reason: letters.length > 0 ? undefined : "No letter candidates extracted",
      documentsProcessed: processed.length,
      potentialLettersFound: letters.length,
      topMatches: letters.slice(0, TOP_MATCHES),
    };

    logLetterCandidates(ctx.logger, result.topMatches);
    ctx.logger.info("pipeline_complete", {
      status: result.status,
      searchResultsCount: result.searchResultsCount,
      documentsProcessed: result.documentsProcessed,
      potentialLettersFound: result.potentialLettersFound,
    });
    return result;
  });
}

export async function runOcrOnly(ctx: CommandContext, directory: string): Promise<OcrReport | undefined> {
  if (!fs.existsSync(directory) || !fs.statSync(directory).isDirectory()) {
    ctx.logger.error("ocr_only_directory_missing", { directory });
    return undefined;
  }

  const documents = await discoverImageDocuments(directory, ctx.logger.child("ocr"));
  if (documents.length === 0) {
    ctx.logger.error("ocr_only_no_images", { directory });
    return undefined;
  }

  return withRun<OcrReport>(ctx, "ocr-only", async () => {
    const imageCount = documents.reduce((acc, doc) => acc + doc.imagePaths.length, 0);
    ctx.logger.info("ocr_only_start", { directory, documentCount: documents.length, imageCount });
    for (const document of documents) {
      await ctx.store.saveDownloadedDocument(ctx.runId, document);
    }

    const processed = await createOcrProcessor(ctx, directory).processDocuments(documents);
    const letters = await analyzeAndExtract(ctx, processed);
    logLetterCandidates(ctx.logger, letters);

    const report: OcrReport = {
      status: letters.length > 0 ? "success" : "partial",
      reason: letters.length > 0 ? undefined : "No letter candidates extracted",
      documentsProcessed: processed.length,
      imageCount,
      letters,
    };
    ctx.logger.info("ocr_only_complete", {
      documentsProcessed: report.documentsProcessed,
      imageCount,
      letterCount: letters.length,
    });
    return report;
  });
}
