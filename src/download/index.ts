export * from "./downloader";
export * from "./prioritize";
