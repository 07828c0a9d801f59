export function createRunId(now = new Date(), random: () => number = Math.random): string {
  const suffix = random().toString(36).slice(2, 8);
  return `search_${now.toISOString().replace(/[:.]/g, "-")}_${suffix}`;
}
