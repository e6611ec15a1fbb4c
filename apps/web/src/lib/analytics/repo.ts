import { getDbPool } from "@/lib/db/pool";

import type { PeakReading, ReadingSummary, TimeseriesPoint } from "./types";

type TimestampValue = Date | string;

type TimeseriesRow = {
  bucket_start: TimestampValue;
  points: number;
  avg_power_w: number | null;
  max_power_w: number | null;
  min_power_w: number | null;
};

type PeakRow = {
  ts: TimestampValue;
  power_w: number;
};

export const DEFAULT_BUCKET_SECONDS = 300;
export const MIN_BUCKET_SECONDS = 60;
export const MAX_BUCKET_SECONDS = 86400;

const EMPTY_SUMMARY: ReadingSummary = {
  points: 0,
  avg_power_w: null,
  max_power_w: null,
  min_power_w: null,
  energy_wh_delta: null
};

const toIsoString = (value: TimestampValue): string => {
  if (value instanceof Date) {
    return value.toISOString();
  }

  return value;
};

export const getReadingSummary = async (
  ownerId: string,
  deviceId: string,
  start: Date,
  end: Date
): Promise<ReadingSummary> => {
  const pool = getDbPool();
  const { rows } = await pool.query<ReadingSummary>(
    `
      SELECT
        COUNT(*)::int AS points,
        AVG(power_w) AS avg_power_w,
        MAX(power_w) AS max_power_w,
        MIN(power_w) AS min_power_w,
        (MAX(energy_wh) - MIN(energy_wh)) AS energy_wh_delta
      FROM energy_readings
      WHERE user_id = $1
        AND device_id = $2
        AND ts >= $3
        AND ts <= $4
    `,
    [ownerId, deviceId, start.toISOString(), end.toISOString()]
  );

  return rows[0] ?? EMPTY_SUMMARY;
};

/**
 * Buckets readings with `date_bin`, anchoring bucket boundaries at the range start.
 */
export const getReadingTimeseries = async (
  ownerId: string,
  deviceId: string,
  start: Date,
  end: Date,
  bucketSeconds: number = DEFAULT_BUCKET_SECONDS
): Promise<TimeseriesPoint[]> => {
  const pool = getDbPool();
  const { rows } = await pool.query<TimeseriesRow>(
    `
      SELECT
        date_bin(make_interval(secs => $1), ts, $2::timestamptz) AS bucket_start,
        COUNT(*)::int AS points,
        AVG(power_w) AS avg_power_w,
        MAX(power_w) AS max_power_w,
        MIN(power_w) AS min_power_w
      FROM energy_readings
      WHERE user_id = $3
        AND device_id = $4
        AND ts >= $2
        AND ts <= $5
      GROUP BY 1
      ORDER BY 1 ASC
    `,
    [bucketSeconds, start.toISOString(), ownerId, deviceId, end.toISOString()]
  );

  return rows.map((row) => ({
    bucket_start: toIsoString(row.bucket_start),
    points: row.points,
    avg_power_w: row.avg_power_w,
    max_power_w: row.max_power_w,
    min_power_w: row.min_power_w
  }));
};

export const getPeakReading = async (
  ownerId: string,
  deviceId: string,
  start: Date,
  end: Date
): Promise<PeakReading | null> => {
  const pool = getDbPool();
  const { rows } = await pool.query<PeakRow>(
    `
      SELECT ts, power_w
      FROM energy_readings
      WHERE user_id = $1
        AND device_id = $2
        AND ts >= $3
        AND ts <= $4
        AND power_w IS NOT NULL
      ORDER BY power_w DESC, ts ASC
      LIMIT 1
    `,
    [ownerId, deviceId, start.toISOString(), end.toISOString()]
  );

  const row = rows[0];
  return row ? { ts: toIsoString(row.ts), power_w: row.power_w } : null;
};
