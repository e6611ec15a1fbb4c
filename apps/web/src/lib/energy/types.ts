export const READING_METRICS = ["power_w", "voltage_v", "current_a", "energy_wh"] as const;

export type ReadingMetric = (typeof READING_METRICS)[number];

export type ReadingRecord = {
  id: string;
  device_id: string;
  ts: string;
  power_w: number | null;
  voltage_v: number | null;
  current_a: number | null;
  energy_wh: number | null;
  source: string;
  created_at: string;
};

export type LatestReadingRecord = {
  device_id: string;
  ts: string | null;
  power_w: number | null;
  voltage_v: number | null;
  current_a: number | null;
  energy_wh: number | null;
  source: string | null;
};

export type IngestReadingInput = {
  ts: Date;
  power_w?: number | null;
  voltage_v?: number | null;
  current_a?: number | null;
  energy_wh?: number | null;
  source?: string;
};
