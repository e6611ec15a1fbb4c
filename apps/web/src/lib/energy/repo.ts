import type { Pool } from "pg";

import { getDbPool } from "@/lib/db/pool";

import type { IngestReadingInput, LatestReadingRecord, ReadingRecord } from "./types";

type TimestampValue = Date | string;

type ReadingRow = {
  id: string;
  device_id: string;
  ts: TimestampValue;
  power_w: number | null;
  voltage_v: number | null;
  current_a: number | null;
  energy_wh: number | null;
  source: string;
  created_at: TimestampValue;
};

type LatestReadingRow = Omit<ReadingRow, "id" | "device_id" | "created_at">;

export const DEFAULT_RANGE_LIMIT = 5000;
export const MAX_RANGE_LIMIT = 20000;

const READING_COLUMNS = `
  id,
  device_id,
  ts,
  power_w,
  voltage_v,
  current_a,
  energy_wh,
  source,
  created_at
`;

const toIsoString = (value: TimestampValue): string => {
  if (value instanceof Date) {
    return value.toISOString();
  }

  return value;
};

const toReadingRecord = (row: ReadingRow): ReadingRecord => {
  return {
    id: String(row.id),
    device_id: row.device_id,
    ts: toIsoString(row.ts),
    power_w: row.power_w,
    voltage_v: row.voltage_v,
    current_a: row.current_a,
    energy_wh: row.energy_wh,
    source: row.source,
    created_at: toIsoString(row.created_at)
  };
};

/**
 * Inserts a reading, replacing the measurements of an existing reading at the same
 * `(device_id, ts)`.
 */
export const upsertReading = async (
  ownerId: string,
  deviceId: string,
  input: IngestReadingInput
): Promise<ReadingRecord> => {
  const pool = getDbPool();
  const { rows } = await pool.query<ReadingRow>(
    `
      INSERT INTO energy_readings (
        user_id,
        device_id,
        ts,
        power_w,
        voltage_v,
        current_a,
        energy_wh,
        source
      )
      VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
      ON CONFLICT (device_id, ts)
      DO UPDATE SET
        power_w = EXCLUDED.power_w,
        voltage_v = EXCLUDED.voltage_v,
        current_a = EXCLUDED.current_a,
        energy_wh = EXCLUDED.energy_wh,
        source = EXCLUDED.source
      RETURNING ${READING_COLUMNS}
    `,
    [
      ownerId,
      deviceId,
      input.ts.toISOString(),
      input.power_w ?? null,
      input.voltage_v ?? null,
      input.current_a ?? null,
      input.energy_wh ?? null,
      input.source ?? "device"
    ]
  );

  const row = rows[0];
  if (!row) {
    throw new Error("Reading upsert returned no row.");
  }

  return toReadingRecord(row);
};

export const getLatestReading = async (
  ownerId: string,
  deviceId: string,
  pool: Pool = getDbPool()
): Promise<LatestReadingRecord | null> => {
  const { rows } = await pool.query<LatestReadingRow>(
    `
      SELECT ts, power_w, voltage_v, current_a, energy_wh, source
      FROM energy_readings
      WHERE user_id = $1
        AND device_id = $2
      ORDER BY ts DESC
      LIMIT 1
    `,
    [ownerId, deviceId]
  );

  const row = rows[0];
  if (!row) {
    return null;
  }

  return {
    device_id: deviceId,
    ts: toIsoString(row.ts),
    power_w: row.power_w,
    voltage_v: row.voltage_v,
    current_a: row.current_a,
    energy_wh: row.energy_wh,
    source: row.source
  };
};

export const emptyLatestReading = (deviceId: string): LatestReadingRecord => ({
  device_id: deviceId,
  ts: null,
  power_w: null,
  voltage_v: null,
  current_a: null,
  energy_wh: null,
  source: null
});

export const listReadingsInRange = async (
  ownerId: string,
  deviceId: string,
  start: Date,
  end: Date,
  limit: number = DEFAULT_RANGE_LIMIT
): Promise<ReadingRecord[]> => {
  const pool = getDbPool();
  const { rows } = await pool.query<ReadingRow>(
    `
      SELECT ${READING_COLUMNS}
      FROM energy_readings
      WHERE user_id = $1
        AND device_id = $2
        AND ts >= $3
        AND ts <= $4
      ORDER BY ts ASC
      LIMIT $5
    `,
    [ownerId, deviceId, start.toISOString(), end.toISOString(), limit]
  );

  return rows.map((row) => toReadingRecord(row));
};
