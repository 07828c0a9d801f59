import fs from "node:fs";
import path from "node:path";
import { Response } from "undici";
import { ArchiveClient } from "../src/archive";
import { AppConfig } from "../src/config";
import { bodyExcerpt, CommandContext, runBasicSearch, runFullSearch, runOcrOnly } from "../src/core/commands";
import { MetricsRegistry } from "../src/observability";
import { InMemoryStore } from "../src/store";
import { ExtractedLetter } from "../src/types";
import {
  FakeClock,
  FakeTextExtractor,
  imageResponse,
  jsonResponse,
  makeTempDir,
  removeDir,
  testArchive,
  testConfig,
  testLogger,
} from "./helpers";

const SEARCH_URL = "https://archive-a.test/api/search";

const GOOD_ITEM = {
  reference: "GOOD-1",
  title: "Letter from Colonel Fairfax",
  date: "12 November 1946",
  id: "g1",
  images: ["https://archive-a.test/img/good-1.jpg"],
};

const NO_FAIRFAX_ITEM = {
  reference: "NOFF-1",
  title: "Office letter",
  date: "14 November 1946",
  images: ["https://archive-a.test/img/noff-1.jpg"],
};

const GOOD_TEXT = "12 November 1946\nDear Winston,\nIt was good to see you in Toronto.\nYours sincerely,\nBryan Fairfax";
const NO_FAIRFAX_TEXT =
  "14 November 1946\nDear Mr Churchill,\nThe Prime Minister's office acknowledges your note.\nYours faithfully,\nSecretary";

class FailingLetterStore extends InMemoryStore {
  async saveLetters(_runId: string, _letters: readonly ExtractedLetter[]): Promise<void> {
    throw new Error("disk full");
  }
}

describe("commands", () => {
  let root: string;
  let config: AppConfig;
  let metrics: MetricsRegistry;
  let store: InMemoryStore;
  let fetched: string[];

  beforeEach(() => {
    root = makeTempDir();
    config = testConfig(root);
    metrics = new MetricsRegistry();
    store = new InMemoryStore();
    fetched = [];
  });

  afterEach(() => {
    removeDir(root);
  });

  function contextWith(options: {
    searchResults?: unknown[];
    imageStatus?: number;
    pages?: Record<string, string | Error>;
    store?: InMemoryStore;
  }): CommandContext {
    const client = new ArchiveClient(testArchive(), {
      config,
      logger: testLogger(),
      metrics,
      clock: new FakeClock(),
      fetchFn: async (url) => {
        fetched.push(url);
        if (url.startsWith(SEARCH_URL)) {
          return jsonResponse({ results: options.searchResults ?? [GOOD_ITEM, NO_FAIRFAX_ITEM] });
        }
        const status = options.imageStatus ?? 200;
        return status === 200 ? imageResponse() : new Response("nope", { status });
      },
    });

    return {
      runId: "run-1",
      config,
      store: options.store ?? store,
      logger: testLogger(),
      metrics,
      clients: [client],
      textExtractor: new FakeTextExtractor(options.pages ?? { "GOOD-1": GOOD_TEXT, "NOFF-1": NO_FAIRFAX_TEXT }),
    };
  }

  describe("runFullSearch", () => {
    it("finds the letter and never reports the document without a Fairfax mention", async () => {
      const result = await runFullSearch(contextWith({}), { window: config.searchWindow, maxDocs: 5 });

      expect(result.status).toBe("success");
      expect(result.reason).toBeUndefined();
      expect(result.searchResultsCount).toBe(2);
      expect(result.documentsProcessed).toBe(2);
      expect(result.potentialLettersFound).toBe(1);
      expect(result.mostLikelyLocations).toEqual([
        "A: GOOD-1 - Letter from Colonel Fairfax, 12 November 1946",
        "A: NOFF-1 - Office letter, 14 November 1946",
      ]);
      expect(result.topMatches).toEqual([
        {
          archive: "Archive A",
          reference: "GOOD-1",
          title: "Letter from Colonel Fairfax",
          date: "12 November 1946",
          fields: {
            date: "12 November 1946",
            salutation: "Dear Winston,",
            body: "It was good to see you in Toronto.",
            signature: "Yours sincerely,",
          },
          relevanceScore: 50,
          fullText: GOOD_TEXT,
        },
      ]);
      expect(result.researchPlan.primaryArchives.map((archive) => archive.name)).toEqual(["Archive A"]);

      expect(fs.readFileSync(path.join(root, "ocr", "Archive A_GOOD-1", "page_1.txt"), "utf-8")).toBe(GOOD_TEXT);
      expect(await store.getRunSummary("run-1")).toEqual(
        expect.objectContaining({
          mode: "full",
          status: "success",
          searchRecords: 2,
          documents: 2,
          analyses: 2,
          likelyCorrespondence: 1,
          letters: 1,
        }),
      );
      expect(metrics.getCounter("letters_extracted")).toBe(1);
    });

    it("fails when no archive returns anything", async () => {
      const result = await runFullSearch(contextWith({ searchResults: [] }), {
        window: config.searchWindow,
        maxDocs: 5,
      });

      expect(result).toEqual(
        expect.objectContaining({
          status: "failure",
          reason: "No search results found",
          searchResultsCount: 0,
          documentsProcessed: 0,
          potentialLettersFound: 0,
          topMatches: [],
        }),
      );
      expect(fetched).toHaveLength(1);
      expect(await store.getRunSummary("run-1")).toEqual(
        expect.objectContaining({ status: "failure", reason: "No search results found" }),
      );
    });

    it("is partial when no document downloads", async () => {
      const result = await runFullSearch(contextWith({ imageStatus: 403 }), { window: config.searchWindow, maxDocs: 5 });

      expect(result.status).toBe("partial");
      expect(result.reason).toBe("No documents could be downloaded");
      expect(result.searchResultsCount).toBe(2);
      expect(result.documentsProcessed).toBe(0);
    });

    it("is partial when nothing reads like the letter", async () => {
      const result = await runFullSearch(contextWith({ pages: { "GOOD-1": NO_FAIRFAX_TEXT, "NOFF-1": NO_FAIRFAX_TEXT } }), {
        window: config.searchWindow,
        maxDocs: 5,
      });

      expect(result.status).toBe("partial");
      expect(result.reason).toBe("No letter candidates extracted");
      expect(result.documentsProcessed).toBe(2);
      expect(result.topMatches).toEqual([]);
    });

    it("only downloads up to maxDocs documents", async () => {
      const result = await runFullSearch(contextWith({}), { window: config.searchWindow, maxDocs: 1 });

      expect(result.documentsProcessed).toBe(1);
      expect(fetched.filter((url) => url.includes("/img/"))).toEqual(["https://archive-a.test/img/good-1.jpg"]);
    });

    it("marks the run failed and rethrows on an unexpected error", async () => {
      const failing = new FailingLetterStore();

      await expect(
        runFullSearch(contextWith({ store: failing }), { window: config.searchWindow, maxDocs: 5 }),
      ).rejects.toThrow("disk full");
      expect(await failing.getRunSummary("run-1")).toEqual(
        expect.objectContaining({ status: "failure", reason: "unexpected error" }),
      );
    });
  });

  describe("runBasicSearch", () => {
    it("reports locations and the research plan without downloading", async () => {
      const report = await runBasicSearch(contextWith({}), { window: config.searchWindow, query: "Fairfax Toronto" });

      expect(report.status).toBe("success");
      expect(report.searchResultsCount).toBe(4);
      expect(report.mostLikelyLocations).toHaveLength(4);
      expect(report.likelyTopics).toHaveLength(7);
      expect(fetched.map((url) => new URL(url).searchParams.get("q"))).toEqual(["Fairfax Toronto", "Fairfax Churchill"]);
      expect(await store.getRunSummary("run-1")).toEqual(
        expect.objectContaining({ mode: "search", status: "success", searchRecords: 4, documents: 0 }),
      );
    });

    it("fails when nothing is found", async () => {
      const report = await runBasicSearch(contextWith({ searchResults: [] }), { window: config.searchWindow });
      expect(report.status).toBe("failure");
      expect(report.mostLikelyLocations).toEqual([]);
    });
  });

  describe("runOcrOnly", () => {
    it("processes every image directory under the given root", async () => {
      const scans = path.join(root, "scans");
      fs.mkdirSync(path.join(scans, "GOOD-1"), { recursive: true });
      fs.mkdirSync(path.join(scans, "NOFF-1"), { recursive: true });
      fs.writeFileSync(path.join(scans, "GOOD-1", "page_1.jpg"), "x");
      fs.writeFileSync(path.join(scans, "NOFF-1", "page_1.jpg"), "x");

      const report = await runOcrOnly(contextWith({}), scans);

      expect(report?.status).toBe("success");
      expect(report?.documentsProcessed).toBe(2);
      expect(report?.imageCount).toBe(2);
      expect(report?.letters.map((letter) => [letter.archive, letter.reference, letter.relevanceScore])).toEqual([
        ["unknown", "GOOD-1", 50],
      ]);
      expect(fetched).toEqual([]);
      expect(await store.getRunSummary("run-1")).toEqual(
        expect.objectContaining({ mode: "ocr-only", documents: 2, letters: 1 }),
      );
    });

    it("returns nothing for a missing directory or one without images", async () => {
      expect(await runOcrOnly(contextWith({}), path.join(root, "absent"))).toBeUndefined();

      fs.mkdirSync(path.join(root, "empty"));
      expect(await runOcrOnly(contextWith({}), path.join(root, "empty"))).toBeUndefined();
      expect(await store.getRunSummary("run-1")).toBeUndefined();
    });
  });

  it("shortens long bodies for the candidate log", () => {
    expect(bodyExcerpt("x".repeat(151))).toBe(`${"x".repeat(150)}...`);
    expect(bodyExcerpt("short")).toBe("short");
  });
});
