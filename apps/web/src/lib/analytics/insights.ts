import type { PeakReading, ReadingSummary } from "./types";

export const NO_READINGS_INSIGHT = "No readings available in the selected range.";

export const buildInsights = (
  summary: Pick<ReadingSummary, "points" | "avg_power_w">,
  peak: PeakReading | null
): string[] => {
  if (summary.points === 0) {
    return [NO_READINGS_INSIGHT];
  }

  const insights: string[] = [];
  if (summary.avg_power_w !== null) {
    insights.push(`Average power over the range: ${summary.avg_power_w.toFixed(1)} W.`);
  }

  if (peak) {
    insights.push(`Peak power: ${peak.power_w.toFixed(1)} W at ${peak.ts}.`);
  }

  return insights;
};
