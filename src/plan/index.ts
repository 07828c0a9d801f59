export * from "./researchPlan";
