export * from "./letterExtractor";
export * from "./relevanceScorer";
