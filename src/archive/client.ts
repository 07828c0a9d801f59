import fs from "node:fs";
import path from "node:path";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import { AppConfig, ArchiveDescriptor } from "../config";
import { Clock, RateLimiter, systemClock } from "../core/clock";
import { defaultFetch, FetchFn, fetchWithTimeout, getFetchDispatcher } from "../core/fetch";
import { errorMessage, Logger, MetricsRegistry } from "../observability";
import { parseDocumentBody, parseSearchBody } from "./responseParser";
import { DocumentResponse, SearchOptions, SearchResponse } from "./types";

export interface ArchiveClientDeps {
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  apiKey?: string;
  fetchFn?: FetchFn;
  clock?: Clock;
}

type AttemptOutcome = { ok: true; statusCode: number; bytes: number } | { ok: false; statusCode: number };

function isRetriableStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

export function joinUrl(baseUrl: string, ...segments: string[]): string {
  const trimmedBase = baseUrl.replace(/\/+$/, "");
  const trimmedSegments = segments.map((segment) => segment.replace(/^\/+|\/+$/g, "")).filter(Boolean);
  return [trimmedBase, ...trimmedSegments].join("/");
}

export function buildSearchParams(query: string, options: SearchOptions = {}): URLSearchParams {
  const params = new URLSearchParams({
    q: query,
    page: String(options.page ?? 1),
    limit: String(options.limit ?? 20),
  });

  if (options.dateRange) {
    params.set("date_from", options.dateRange.start);
    params.set("date_to", options.dateRange.end);
  }

  if (options.collection) {
    params.set("collection", options.collection);
  }

  return params;
}

export function resolveApiKey(archive: ArchiveDescriptor, env: NodeJS.ProcessEnv = process.env): string | undefined {
  const value = env[archive.apiKeyEnv];
  return value && value.trim() !== "" ? value.trim() : undefined;
}

/**
 * HTTP access to one archive. Each instance has its own pacing budget, so
 * archives never wait on each other. Nothing here throws: search and item
 * lookups come back error-tagged, downloads come back `false`.
 */
export class ArchiveClient {
  readonly archive: ArchiveDescriptor;
  private readonly config: AppConfig;
  private readonly logger: Logger;
  private readonly metrics: MetricsRegistry;
  private readonly apiKey?: string;
  private readonly fetchFn: FetchFn;
  private readonly clock: Clock;
  private readonly rateLimiter: RateLimiter;

  constructor(archive: ArchiveDescriptor, deps: ArchiveClientDeps) {
    this.archive = archive;
    this.config = deps.config;
    this.logger = deps.logger;
    this.metrics = deps.metrics;
    this.apiKey = deps.apiKey;
    this.fetchFn = deps.fetchFn ?? defaultFetch;
    this.clock = deps.clock ?? systemClock;
    this.rateLimiter = new RateLimiter(deps.config.rateLimitIntervalMs, this.clock);
  }

  get name(): string {
    return this.archive.name;
  }

  get authenticated(): boolean {
    return this.apiKey !== undefined;
  }

  buildSearchUrl(query: string, options: SearchOptions = {}): string {
    return `${joinUrl(this.archive.baseUrl, this.archive.endpoints.search)}?${buildSearchParams(query, options).toString()}`;
  }

  async search(query: string, options: SearchOptions = {}): Promise<SearchResponse> {
    await this.rateLimiter.acquire();
    const url = this.buildSearchUrl(query, options);
    this.logger.info("archive_search_start", { archive: this.name, query, url });
    const stopTimer = this.metrics.startTimer("search_ms");

    let result: SearchResponse;
    try {
      result = await fetchWithTimeout(
        this.fetchFn,
        url,
        {
          method: "GET",
          headers: this.headers("application/json, text/html;q=0.9"),
          dispatcher: getFetchDispatcher(this.config.ignoreHttpsErrors),
        },
        this.config.requestTimeoutMs,
        async (response): Promise<SearchResponse> => {
          if (!response.ok) {
            return { status: "error", error: `HTTP ${response.status}`, results: [] };
          }
          const body = await response.text();
          return parseSearchBody(body, response.headers.get("content-type"), url);
        },
      );
    } catch (error) {
      result = { status: "error", error: errorMessage(error), results: [] };
    }

    const durationMs = stopTimer();
    if (result.status === "error") {
      this.metrics.incrementCounter("searches_failed", 1);
      this.logger.error("archive_search_failed", { archive: this.name, query, url, durationMs, error: result.error });
    } else {
      this.metrics.incrementCounter("searches_ok", 1);
      this.logger.info("archive_search_complete", {
        archive: this.name,
        query,
        durationMs,
        resultCount: result.results.length,
      });
    }
    return result;
  }

  async getDocument(docId: string): Promise<DocumentResponse> {
    await this.rateLimiter.acquire();
    const itemEndpoint = this.archive.endpoints.item;
    if (!itemEndpoint) {
      this.logger.warn("archive_item_endpoint_missing", { archive: this.name, docId });
      return { status: "error", error: `${this.name} has no item endpoint` };
    }

    const url = joinUrl(this.archive.baseUrl, itemEndpoint, encodeURIComponent(docId));
    this.logger.info("archive_document_start", { archive: this.name, docId, url });

    try {
      const result = await fetchWithTimeout(
        this.fetchFn,
        url,
        {
          method: "GET",
          headers: this.headers("application/json"),
          dispatcher: getFetchDispatcher(this.config.ignoreHttpsErrors),
        },
        this.config.requestTimeoutMs,
        async (response): Promise<DocumentResponse> => {
          if (!response.ok) {
            return { status: "error", error: `HTTP ${response.status}` };
          }
          return parseDocumentBody(await response.text());
        },
      );
      if (result.status === "error") {
        this.logger.error("archive_document_failed", { archive: this.name, docId, url, error: result.error });
      }
      return result;
    } catch (error) {
      const message = errorMessage(error);
      this.logger.error("archive_document_failed", { archive: this.name, docId, url, error: message });
      return { status: "error", error: message };
    }
  }

  async downloadImage(url: string, destination: string): Promise<boolean> {
    const maxAttempts = this.config.maxDownloadAttempts;
    let attemptsMade = 0;

    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      attemptsMade = attempt;
      // Every attempt is a request, so retries are paced like any other call.
      await this.rateLimiter.acquire();
      const stopTimer = this.metrics.startTimer("image_download_ms");
      this.logger.info("download_image_attempt_start", { archive: this.name, url, attempt });

      try {
        const outcome = await this.downloadAttempt(url, destination);
        const durationMs = stopTimer();

        if (outcome.ok) {
          this.metrics.incrementCounter("images_ok", 1);
          this.logger.info("download_image_ok", {
            archive: this.name,
            url,
            attempt,
            durationMs,
            bytes: outcome.bytes,
            destination,
          });
          return true;
        }

        if (!isRetriableStatus(outcome.statusCode)) {
          this.logger.warn("download_image_failed_http", {
            archive: this.name,
            url,
            attempt,
            durationMs,
            statusCode: outcome.statusCode,
          });
          break;
        }

        this.logger.warn("download_image_retry_http", {
          archive: this.name,
          url,
          attempt,
          durationMs,
          statusCode: outcome.statusCode,
        });
      } catch (error) {
        const durationMs = stopTimer();
        this.logger.warn("download_image_error", {
          archive: this.name,
          url,
          attempt,
          durationMs,
          error: errorMessage(error),
        });
      }

      if (attempt < maxAttempts) {
        await this.clock.sleep(attempt * this.config.retryBaseDelayMs);
      }
    }

    this.metrics.incrementCounter("images_failed", 1);
    this.logger.error("download_image_gave_up", { archive: this.name, url, attempts: attemptsMade });
    return false;
  }

  private async downloadAttempt(url: string, destination: string): Promise<AttemptOutcome> {
    return fetchWithTimeout(
      this.fetchFn,
      url,
      {
        method: "GET",
        headers: this.headers("image/*,*/*"),
        dispatcher: getFetchDispatcher(this.config.ignoreHttpsErrors),
        redirect: "follow",
      },
      this.config.downloadTimeoutMs,
      async (response): Promise<AttemptOutcome> => {
        if (!response.ok) {
          return { ok: false, statusCode: response.status };
        }
        if (!response.body) {
          return { ok: false, statusCode: 502 };
        }

        await fs.promises.mkdir(path.dirname(destination), { recursive: true });
        const tempPath = `${destination}.part`;
        let bytes = 0;

        const readable = Readable.fromWeb(response.body);
        readable.on("data", (chunk: Buffer) => {
          bytes += chunk.length;
        });

        try {
          await pipeline(readable, fs.createWriteStream(tempPath, { flags: "w" }));
          await fs.promises.rename(tempPath, destination);
        } catch (error) {
          await fs.promises.rm(tempPath, { force: true });
          throw error;
        }

        return { ok: true, statusCode: response.status, bytes };
      },
    );
  }

  private headers(accept: string): Record<string, string> {
    const headers: Record<string, string> = {
      "user-agent": this.config.userAgent,
      accept,
    };
    if (this.apiKey) {
      headers.authorization = `Bearer ${this.apiKey}`;
    }
    return headers;
  }
}

export function createArchiveClients(
  deps: Omit<ArchiveClientDeps, "apiKey">,
  env: NodeJS.ProcessEnv = process.env,
): ArchiveClient[] {
  return deps.config.archives.map(
    (archive) =>
      new ArchiveClient(archive, {
        ...deps,
        logger: deps.logger.child(`archive:${archive.shortName}`),
        apiKey: resolveApiKey(archive, env),
      }),
  );
}
