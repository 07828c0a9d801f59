import { analyzeText, DEFAULT_PROFILE, detectDate } from "../src/analysis";

describe("detectDate", () => {
  it("returns the first day-month-year date in the text", () => {
    expect(detectDate("Received 3 March 1947, written 15 November 1946")).toEqual({
      text: "3 March 1947",
      day: 3,
      month: 3,
      year: 1947,
    });
  });

  it("ignores lowercase month names and two-digit years", () => {
    expect(detectDate("15 november 1946")).toBeUndefined();
    expect(detectDate("15 November 46")).toBeUndefined();
  });

  it("treats an impossible day as no date", () => {
    expect(detectDate("45 November 1946")).toBeUndefined();
  });
});

describe("analyzeText", () => {
  it("adds the date bonus only for October to December 1946", () => {
    expect(analyzeText("15 November 1946").relevanceScore).toBe(30);
    expect(analyzeText("15 November 1945").relevanceScore).toBe(0);
    expect(analyzeText("15 March 1946").relevanceScore).toBe(0);
  });

  it("marks a text naming both correspondents as likely correspondence", () => {
    const analysis = analyzeText("My dear Winston, ... Bryan Fairfax");
    expect(analysis).toEqual({
      mentionsChurchill: true,
      mentionsFairfax: true,
      detectedDate: undefined,
      likelyCorrespondence: true,
      relevanceScore: 20,
    });
  });

  it("never marks a text without a Fairfax mention as likely", () => {
    const analysis = analyzeText("12 November 1946\nDear Prime Minister, Churchill writes.");
    expect(analysis.mentionsChurchill).toBe(true);
    expect(analysis.mentionsFairfax).toBe(false);
    expect(analysis.relevanceScore).toBe(40);
    expect(analysis.likelyCorrespondence).toBe(false);
  });

  it("matches whole words case-insensitively", () => {
    expect(analyzeText("COLONEL and CHURCHILL").likelyCorrespondence).toBe(true);
    expect(analyzeText("Churchillian prose by Fairfaxes").relevanceScore).toBe(0);
  });

  it("scores the full letter at 50", () => {
    const analysis = analyzeText("6 December 1946\nDear Winston,\nYours, Colonel Fairfax");
    expect(analysis.relevanceScore).toBe(50);
    expect(analysis.detectedDate?.month).toBe(12);
    expect(analysis.likelyCorrespondence).toBe(true);
  });

  it("applies a custom profile", () => {
    const analysis = analyzeText("Winston and Fairfax", { ...DEFAULT_PROFILE, threshold: 30 });
    expect(analysis.relevanceScore).toBe(20);
    expect(analysis.likelyCorrespondence).toBe(false);
  });

  it("returns a frozen analysis", () => {
    expect(Object.isFrozen(analyzeText("anything"))).toBe(true);
  });
});
