import { load } from "cheerio";
import { ajv, formatValidationErrors } from "../core/validation";
import { errorMessage } from "../observability";
import { DocumentResponse, RawArchiveItem, SearchResponse } from "./types";

interface SearchEnvelope {
  results?: RawArchiveItem[];
  error?: string;
}

const validateItemList = ajv.compile<RawArchiveItem[]>({
  type: "array",
  items: { type: "object" },
});

const validateSearchEnvelope = ajv.compile<SearchEnvelope>({
  type: "object",
  properties: {
    results: { type: "array", items: { type: "object" } },
    error: { type: "string" },
  },
});

const validateItem = ajv.compile<RawArchiveItem>({ type: "object" });

function errorResult(error: string): SearchResponse {
  return { status: "error", error, results: [] };
}

function looksLikeHtml(body: string, contentType: string | null): boolean {
  if (contentType && /html/i.test(contentType)) {
    return true;
  }
  return body.trimStart().startsWith("<");
}

function parseJson(body: string): { ok: true; value: unknown } | { ok: false; error: string } {
  try {
    return { ok: true, value: JSON.parse(body) };
  } catch (error) {
    return { ok: false, error: `invalid JSON response: ${errorMessage(error)}` };
  }
}

/** A link the page gets wrong is dropped; the rest of the item still counts. */
function resolveUrl(href: string | undefined, pageUrl: string): URL | undefined {
  if (!href) {
    return undefined;
  }
  try {
    return new URL(href, pageUrl);
  } catch (error) {
    if (error instanceof TypeError) {
      return undefined;
    }
    throw error;
  }
}

function collapseWhitespace(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}

/**
 * Reads an AtoM-style "browse" results page. Only fields present on the page
 * are set, so missing ones fall through to the aggregator's defaults.
 */
export function parseBrowsePage(html: string, pageUrl: string): RawArchiveItem[] {
  const $ = load(html);
  const items: RawArchiveItem[] = [];

  $(".search-result").each((_, element) => {
    const result = $(element);
    const item: RawArchiveItem = {};

    const reference = collapseWhitespace(result.find(".reference-code").first().text());
    if (reference) {
      item.reference = reference;
    }

    const titleLink = result.find(".title a").first();
    const title = collapseWhitespace(titleLink.text());
    if (title) {
      item.title = title;
    }

    const link = resolveUrl(titleLink.attr("href"), pageUrl);
    if (link) {
      const slug = link.pathname.split("/").filter(Boolean).pop();
      if (slug) {
        item.id = slug;
      }
    }

    const date = collapseWhitespace(result.find(".dates").first().text());
    if (date) {
      item.date = date;
    }

    const images: string[] = [];
    result.find(".search-result-preview img").each((__, img) => {
      const src = resolveUrl($(img).attr("src"), pageUrl);
      if (src) {
        images.push(src.toString());
      }
    });
    if (images.length > 0) {
      item.images = images;
    }

    items.push(item);
  });

  return items;
}

export function parseSearchBody(body: string, contentType: string | null, pageUrl: string): SearchResponse {
  if (looksLikeHtml(body, contentType)) {
    return { status: "ok", results: parseBrowsePage(body, pageUrl) };
  }

  const parsed = parseJson(body);
  if (!parsed.ok) {
    return errorResult(parsed.error);
  }

  if (validateItemList(parsed.value)) {
    return { status: "ok", results: parsed.value };
  }

  if (!validateSearchEnvelope(parsed.value)) {
    return errorResult(`unexpected search response: ${formatValidationErrors(validateSearchEnvelope.errors)}`);
  }

  if (parsed.value.error !== undefined) {
    return errorResult(parsed.value.error);
  }

  return { status: "ok", results: parsed.value.results ?? [] };
}

export function parseDocumentBody(body: string): DocumentResponse {
  const parsed = parseJson(body);
  if (!parsed.ok) {
    return { status: "error", error: parsed.error };
  }

  if (!validateItem(parsed.value)) {
    return { status: "error", error: "unexpected document response: expected an object" };
  }

  const error = parsed.value.error;
  if (typeof error === "string") {
    return { status: "error", error };
  }

  return { status: "ok", document: parsed.value };
}
