import { ExtractedLetter, LetterFields, ProcessedDocument } from "../types";

type ExtractorState = "SEEKING" | "IN_BODY";

const LOOSE_DATE_LINE = /\d{1,2}\s+\w+\s+\d{4}/;
const SIGN_OFF_MARKERS = ["Sincerely", "Yours"];
const MIN_FIELDS = 2;

/**
 * Segments letter text into date / salutation / body / signature. Lines
 * outside a salutation-to-sign-off span are dropped unless they are the
 * first date line.
 */
export function extractLetterFields(lines: readonly string[]): LetterFields {
  const fields: LetterFields = {};
  const bodyLines: string[] = [];
  let state: ExtractorState = "SEEKING";

  for (const rawLine of lines) {
    const line = rawLine.trim();
    if (!line) {
      continue;
    }

    if (state === "IN_BODY") {
      if (SIGN_OFF_MARKERS.some((marker) => line.includes(marker))) {
        fields.signature = line;
        state = "SEEKING";
      } else {
        bodyLines.push(line);
      }
      continue;
    }

    if (fields.date === undefined && LOOSE_DATE_LINE.test(line)) {
      fields.date = line;
    } else if (fields.salutation === undefined && line.startsWith("Dear")) {
      fields.salutation = line;
      state = "IN_BODY";
    }
  }

  if (bodyLines.length > 0) {
    fields.body = bodyLines.join("\n");
  }
  return fields;
}

export function joinPageTexts(document: ProcessedDocument): string {
  return document.pages.map((page) => page.text).join("\n\n");
}

export function extractLetters(documents: readonly ProcessedDocument[]): ExtractedLetter[] {
  const letters: ExtractedLetter[] = [];

  for (const processed of documents) {
    const analysis = processed.analysis;
    if (!analysis || !analysis.likelyCorrespondence) {
      continue;
    }

    const fullText = joinPageTexts(processed);
    const fields = extractLetterFields(fullText.split("\n"));
    if (Object.keys(fields).length < MIN_FIELDS) {
      continue;
    }

    const { document } = processed;
    letters.push({
      archive: document.archive,
      reference: document.reference,
      title: document.title,
      date: document.date,
      fields,
      relevanceScore: analysis.relevanceScore,
      fullText,
    });
  }

  return letters.sort((a, b) => b.relevanceScore - a.relevanceScore);
}
