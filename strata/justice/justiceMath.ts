export type JusticeTrajectory = "insufficient_data" | "rising" | "falling" | "stable";

export function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

/** Geometric mean of the two sides; zero whenever either side is empty. */
export function baseTension(claimTotal: number, structureTotal: number): number {
  return Math.sqrt(claimTotal * structureTotal);
}

/**
 * Value at index floor(n × p) of the ascending-sorted input; 0 for no values.
 */
export function percentile(values: readonly number[], p: number): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const idx = Math.min(Math.floor(sorted.length * p), sorted.length - 1);
  return sorted[idx];
}

/**
 * Compares the mean of the first and last third of `values` (already in turn
 * order). A third is floor(n / 3) values, at least one.
 */
export function classifyTrajectory(
  values: readonly number[],
  options: { ratio: number; minSites: number }
): JusticeTrajectory {
  if (values.length < options.minSites) return "insufficient_data";
  const third = Math.max(Math.floor(values.length / 3), 1);
  const mean = (slice: readonly number[]) => slice.reduce((s, v) => s + v, 0) / third;

  const firstMean = mean(values.slice(0, third));
  const lastMean = mean(values.slice(values.length - third));

  if (lastMean > firstMean * options.ratio) return "rising";
  if (firstMean > lastMean * options.ratio) return "falling";
  return "stable";
}
