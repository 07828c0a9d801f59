import { Analysis, DetectedDate } from "../types";

export const MONTH_NAMES = [
  "January",
  "February",
  "March",
  "April",
  "May",
  "June",
  "July",
  "August",
  "September",
  "October",
  "November",
  "December",
] as const;

export interface CorrespondenceProfile {
  churchillPatterns: RegExp[];
  fairfaxPatterns: RegExp[];
  mentionScore: number;
  targetYear: number;
  /** 1-12 */
  targetMonths: number[];
  dateScore: number;
  threshold: number;
}

export const DEFAULT_PROFILE: CorrespondenceProfile = {
  churchillPatterns: [/\bchurchill\b/i, /\bwinston\b/i, /\bprime\s+minister\b/i],
  fairfaxPatterns: [/\bfairfax\b/i, /\bbryan\b/i, /\bcolonel\b/i],
  mentionScore: 10,
  targetYear: 1946,
  targetMonths: [10, 11, 12],
  dateScore: 30,
  threshold: 20,
};

const DATE_PATTERN = new RegExp(`\\b(\\d{1,2})\\s+(${MONTH_NAMES.join("|")})\\s+(\\d{4})\\b`);

function mentionsAny(text: string, patterns: readonly RegExp[]): boolean {
  return patterns.some((pattern) => pattern.test(text));
}

function monthNumber(name: string): number | undefined {
  const index = MONTH_NAMES.findIndex((month) => month === name);
  return index >= 0 ? index + 1 : undefined;
}

/** First "D Month YYYY" in the text; a capture that is not a real day/month yields nothing. */
export function detectDate(text: string): DetectedDate | undefined {
  const match = DATE_PATTERN.exec(text);
  if (!match) {
    return undefined;
  }

  const [, dayText, monthName, yearText] = match;
  const day = Number.parseInt(dayText, 10);
  const month = monthNumber(monthName);
  const year = Number.parseInt(yearText, 10);
  if (month === undefined || !Number.isInteger(day) || day < 1 || day > 31 || !Number.isInteger(year)) {
    return undefined;
  }

  return { text: `${day} ${monthName} ${year}`, day, month, year };
}

export function analyzeText(text: string, profile: CorrespondenceProfile = DEFAULT_PROFILE): Analysis {
  let relevanceScore = 0;

  const mentionsChurchill = mentionsAny(text, profile.churchillPatterns);
  if (mentionsChurchill) {
    relevanceScore += profile.mentionScore;
  }

  const mentionsFairfax = mentionsAny(text, profile.fairfaxPatterns);
  if (mentionsFairfax) {
    relevanceScore += profile.mentionScore;
  }

  const detectedDate = detectDate(text);
  if (detectedDate && detectedDate.year === profile.targetYear && profile.targetMonths.includes(detectedDate.month)) {
    relevanceScore += profile.dateScore;
  }

  return Object.freeze({
    mentionsChurchill,
    mentionsFairfax,
    detectedDate,
    likelyCorrespondence: mentionsChurchill && mentionsFairfax && relevanceScore >= profile.threshold,
    relevanceScore,
  });
}
