export * from "./aggregator";
export * from "./normalize";
