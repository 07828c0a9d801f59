import { ArchiveClient, SearchOptions } from "../archive";
import { AppConfig } from "../config";
import { processWithConcurrency } from "../core/concurrency";
import { errorMessage, Logger, MetricsRegistry } from "../observability";
import { DateWindow, SearchRecord } from "../types";
import { formatLocation, normalizeRecord } from "./normalize";

export interface SearchAggregatorDeps {
  clients: ArchiveClient[];
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
}

export interface AggregateOptions {
  window: DateWindow;
  /** Issued first on every archive, ahead of the archive's own variants. */
  extraQuery?: string;
}

export interface ArchiveSearchOutcome {
  records: SearchRecord[];
  locations: string[];
}

export interface AggregatedSearch extends ArchiveSearchOutcome {
  byArchive: Record<string, number>;
}

export class SearchAggregator {
  private readonly clients: ArchiveClient[];
  private readonly config: AppConfig;
  private readonly logger: Logger;
  private readonly metrics: MetricsRegistry;

  constructor(deps: SearchAggregatorDeps) {
    this.clients = deps.clients;
    this.config = deps.config;
    this.logger = deps.logger;
    this.metrics = deps.metrics;
  }

  async searchAll(options: AggregateOptions): Promise<AggregatedSearch> {
    // One slot per archive; the merge below is the only writer of the result.
    const slots: ArchiveSearchOutcome[] = this.clients.map(() => ({ records: [], locations: [] }));

    await processWithConcurrency(this.clients, this.config.searchConcurrency, async (client, index) => {
      slots[index] = await this.searchArchive(client, options);
    });

    const byArchive: Record<string, number> = {};
    this.clients.forEach((client, index) => {
      byArchive[client.name] = slots[index].records.length;
    });

    const aggregated: AggregatedSearch = {
      records: slots.flatMap((slot) => slot.records),
      locations: slots.flatMap((slot) => slot.locations),
      byArchive,
    };

    this.logger.info("aggregate_search_complete", {
      recordCount: aggregated.records.length,
      byArchive,
    });
    return aggregated;
  }

  async searchArchive(client: ArchiveClient, options: AggregateOptions): Promise<ArchiveSearchOutcome> {
    const profile = client.archive.search;
    const queries = buildQueryVariants(profile.queries, options.extraQuery);
    const searchOptions: SearchOptions = {
      limit: profile.limit,
      collection: profile.collection,
      dateRange: profile.useDateWindow ? options.window : undefined,
    };

    const outcome: ArchiveSearchOutcome = { records: [], locations: [] };
    for (const query of queries) {
      try {
        const response = await client.search(query, searchOptions);
        if (response.status === "error") {
          continue;
        }

        for (const item of response.results) {
          const record = normalizeRecord(client.name, item);
          outcome.records.push(record);
          outcome.locations.push(formatLocation(client.archive.shortName, record));
        }
      } catch (error) {
        this.logger.error("aggregate_query_failed", {
          archive: client.name,
          query,
          error: errorMessage(error),
        });
      }
    }

    this.metrics.incrementCounter("records_found", outcome.records.length);
    if (outcome.records.length === 0) {
      this.logger.warn("aggregate_archive_no_results", { archive: client.name, queryCount: queries.length });
    } else {
      this.logger.info("aggregate_archive_complete", {
        archive: client.name,
        queryCount: queries.length,
        recordCount: outcome.records.length,
      });
    }
    return outcome;
  }
}

export function buildQueryVariants(profileQueries: readonly string[], extraQuery?: string): string[] {
  const trimmed = extraQuery?.trim();
  if (!trimmed) {
    return [...profileQueries];
  }
  return [trimmed, ...profileQueries.filter((query) => query !== trimmed)];
}
