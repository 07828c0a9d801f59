import { Response } from "undici";
import { ArchiveClient } from "../src/archive";
import { AppConfig, ArchiveDescriptor } from "../src/config";
import { MetricsRegistry } from "../src/observability";
import { buildQueryVariants, formatLocation, normalizeRecord, SearchAggregator } from "../src/search";
import { FakeClock, jsonResponse, testArchive, testConfig, testLogger } from "./helpers";

const WINDOW = { start: "1946-10-01", end: "1946-12-05" };

function queryOf(url: string): string | null {
  return new URL(url).searchParams.get("q");
}

describe("normalizeRecord", () => {
  it("fills in defaults for missing fields", () => {
    const record = normalizeRecord("Archive A", {});
    expect(record).toEqual({
      archive: "Archive A",
      reference: "Unknown",
      title: "Untitled",
      date: "",
      itemId: undefined,
      imageUrls: [],
    });
    expect(Object.isFrozen(record)).toBe(true);
  });

  it("treats blank strings as missing and keeps only string image urls", () => {
    expect(
      normalizeRecord("Archive A", {
        reference: "  ",
        title: "Letter",
        date: "12 November 1946",
        id: 42,
        images: ["https://a.test/1.jpg", 7, "", "https://a.test/2.jpg"],
      }),
    ).toEqual({
      archive: "Archive A",
      reference: "Unknown",
      title: "Letter",
      date: "12 November 1946",
      itemId: "42",
      imageUrls: ["https://a.test/1.jpg", "https://a.test/2.jpg"],
    });
  });

  it("formats a location line", () => {
    const record = normalizeRecord("Archive A", { reference: "CHAR 20/138", title: "Letter", date: "1946" });
    expect(formatLocation("CAC", record)).toBe("CAC: CHAR 20/138 - Letter, 1946");
  });
});

describe("buildQueryVariants", () => {
  it("puts the extra query first and drops its duplicate", () => {
    expect(buildQueryVariants(["a", "b"], " b ")).toEqual(["b", "a"]);
    expect(buildQueryVariants(["a", "b"], "c")).toEqual(["c", "a", "b"]);
    expect(buildQueryVariants(["a", "b"], "  ")).toEqual(["a", "b"]);
  });
});

describe("SearchAggregator", () => {
  let config: AppConfig;
  let metrics: MetricsRegistry;

  beforeEach(() => {
    config = testConfig("/tmp/unused");
    metrics = new MetricsRegistry();
  });

  function clientFor(archive: ArchiveDescriptor, fetchFn: (url: string) => Promise<Response>): ArchiveClient {
    return new ArchiveClient(archive, {
      config,
      logger: testLogger(),
      metrics,
      fetchFn,
      clock: new FakeClock(),
    });
  }

  it("merges every archive's records in archive order even when one archive fails", async () => {
    const archiveA = testArchive({
      search: { queries: ["q1", "q2"], limit: 50, collection: "CHAR", useDateWindow: true },
    });
    const archiveB = testArchive({
      name: "Archive B",
      shortName: "B",
      baseUrl: "https://archive-b.test/",
      search: { queries: ["b1"], limit: 30, useDateWindow: false },
    });
    const archiveC = testArchive({
      name: "Archive C",
      shortName: "C",
      baseUrl: "https://archive-c.test/",
      search: { queries: ["c1"], limit: 30, useDateWindow: false },
    });

    const urlsA: string[] = [];
    const clientA = clientFor(archiveA, async (url) => {
      urlsA.push(url);
      if (queryOf(url) === "q2") {
        throw new Error("socket hang up");
      }
      return jsonResponse({
        results: [{ reference: "CHAR 20/138", title: "Letter", date: "12 November 1946", id: 7, images: ["https://a.test/1.jpg"] }],
      });
    });
    const urlsB: string[] = [];
    const clientB = clientFor(archiveB, async (url) => {
      urlsB.push(url);
      return new Response("down", { status: 500 });
    });
    const clientC = clientFor(archiveC, async () => jsonResponse([{ title: "Fairfax papers" }]));

    const aggregator = new SearchAggregator({
      clients: [clientA, clientB, clientC],
      config,
      logger: testLogger(),
      metrics,
    });
    const result = await aggregator.searchAll({ window: WINDOW });

    expect(result.records).toEqual([
      {
        archive: "Archive A",
        reference: "CHAR 20/138",
        title: "Letter",
        date: "12 November 1946",
        itemId: "7",
        imageUrls: ["https://a.test/1.jpg"],
      },
      {
        archive: "Archive C",
        reference: "Unknown",
        title: "Fairfax papers",
        date: "",
        itemId: undefined,
        imageUrls: [],
      },
    ]);
    expect(result.locations).toEqual(["A: CHAR 20/138 - Letter, 12 November 1946", "C: Unknown - Fairfax papers, "]);
    expect(result.byArchive).toEqual({ "Archive A": 1, "Archive B": 0, "Archive C": 1 });
    expect(metrics.getCounter("records_found")).toBe(2);

    expect(urlsA.map(queryOf)).toEqual(["q1", "q2"]);
    expect(new URL(urlsA[0]).searchParams.get("date_from")).toBe("1946-10-01");
    expect(new URL(urlsA[0]).searchParams.get("collection")).toBe("CHAR");
    expect(new URL(urlsB[0]).searchParams.has("date_from")).toBe(false);
    expect(new URL(urlsB[0]).searchParams.get("limit")).toBe("30");
  });

  it("issues the extra query first on every archive", async () => {
    const queries: Array<string | null> = [];
    const client = clientFor(testArchive({ search: { queries: ["q1"], limit: 20, useDateWindow: false } }), async (url) => {
      queries.push(queryOf(url));
      return jsonResponse([]);
    });

    const aggregator = new SearchAggregator({ clients: [client], config, logger: testLogger(), metrics });
    const result = await aggregator.searchAll({ window: WINDOW, extraQuery: "Fairfax Toronto" });

    expect(queries).toEqual(["Fairfax Toronto", "q1"]);
    expect(result.records).toEqual([]);
  });

  it("keeps archive order when archives run concurrently", async () => {
    const slow = clientFor(testArchive({ search: { queries: ["slow"], limit: 20, useDateWindow: false } }), async () => {
      await new Promise((resolve) => setTimeout(resolve, 20));
      return jsonResponse([{ reference: "SLOW-1" }]);
    });
    const fast = clientFor(
      testArchive({ name: "Archive B", shortName: "B", search: { queries: ["fast"], limit: 20, useDateWindow: false } }),
      async () => jsonResponse([{ reference: "FAST-1" }]),
    );

    const aggregator = new SearchAggregator({
      clients: [slow, fast],
      config: { ...config, searchConcurrency: 2 },
      logger: testLogger(),
      metrics,
    });
    const result = await aggregator.searchAll({ window: WINDOW });

    expect(result.records.map((record) => record.reference)).toEqual(["SLOW-1", "FAST-1"]);
  });
});
