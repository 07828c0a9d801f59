import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { Response } from "undici";
import { AppConfig, ArchiveDescriptor, DEFAULT_CONFIG } from "../src/config";
import { Clock } from "../src/core/clock";
import { Logger } from "../src/observability";
import { TextExtractor } from "../src/ocr";

export class FakeClock implements Clock {
  current = 0;
  readonly sleeps: number[] = [];

  now(): number {
    return this.current;
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.current += ms;
  }
}

/** Text keyed by a substring of the image path; a key mapped to an Error makes that page fail. */
export class FakeTextExtractor implements TextExtractor {
  readonly available = true;
  readonly calls: string[] = [];

  constructor(private readonly pages: Record<string, string | Error>) {}

  async extractText(imagePath: string): Promise<string> {
    this.calls.push(imagePath);
    const key = Object.keys(this.pages).find((candidate) => imagePath.includes(candidate));
    if (key === undefined) {
      return "";
    }
    const page = this.pages[key];
    if (page instanceof Error) {
      throw page;
    }
    return page;
  }
}

export function testLogger(): Logger {
  return new Logger({ component: "test", runId: "test-run", minLevel: "error" });
}

export function makeTempDir(prefix = "finder-test-"): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export function testArchive(overrides: Partial<ArchiveDescriptor> = {}): ArchiveDescriptor {
  return {
    name: "Archive A",
    shortName: "A",
    baseUrl: "https://archive-a.test/api/",
    endpoints: { search: "search", item: "records" },
    collections: ["CHAR"],
    apiKeyEnv: "ARCHIVE_A_KEY",
    search: {
      queries: ["Fairfax Churchill"],
      limit: 50,
      collection: "CHAR",
      useDateWindow: true,
    },
    ...overrides,
  };
}

export function testConfig(root: string, overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    ...DEFAULT_CONFIG,
    archives: [testArchive()],
    outputDirs: {
      downloads: path.join(root, "downloads"),
      ocr: path.join(root, "ocr"),
    },
    storePath: ":memory:",
    ...overrides,
  };
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" },
  });
}

export function htmlResponse(body: string): Response {
  return new Response(body, {
    status: 200,
    headers: { "content-type": "text/html; charset=utf-8" },
  });
}

export function imageResponse(bytes = "fake-jpeg-bytes"): Response {
  return new Response(bytes, {
    status: 200,
    headers: { "content-type": "image/jpeg" },
  });
}
