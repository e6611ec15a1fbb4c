export type ReadingSummary = {
  points: number;
  avg_power_w: number | null;
  max_power_w: number | null;
  min_power_w: number | null;
  energy_wh_delta: number | null;
};

export type TimeseriesPoint = {
  bucket_start: string;
  points: number;
  avg_power_w: number | null;
  max_power_w: number | null;
  min_power_w: number | null;
};

export type PeakReading = {
  ts: string;
  power_w: number;
};
