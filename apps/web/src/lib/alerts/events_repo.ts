import type { PoolClient } from "pg";

import { getDbPool } from "@/lib/db/pool";

import {
  ALERT_EVENT_STATUSES,
  type AlertEventRecord,
  type AlertEventStatus,
  type InsertTriggeredAlertEventInput,
  type ListAlertEventsInput
} from "./types";

type TimestampValue = Date | string;

type AlertEventRow = {
  id: string;
  user_id: string;
  alert_id: string;
  device_id: string;
  ts: TimestampValue;
  status: string;
  message: string | null;
  metric_value: number | null;
  acknowledged_at: TimestampValue | null;
  resolved_at: TimestampValue | null;
  created_at: TimestampValue;
};

export const DEFAULT_EVENTS_LIMIT = 200;
export const MAX_EVENTS_LIMIT = 1000;

const STATUS_SET = new Set<string>(ALERT_EVENT_STATUSES);

const ALERT_EVENT_COLUMNS = `
  id,
  user_id,
  alert_id,
  device_id,
  ts,
  status,
  message,
  metric_value,
  acknowledged_at,
  resolved_at,
  created_at
`;

const toIsoString = (value: TimestampValue): string => {
  if (value instanceof Date) {
    return value.toISOString();
  }

  return value;
};

const toNullableIsoString = (value: TimestampValue | null): string | null => {
  return value === null ? null : toIsoString(value);
};

const isEventStatus = (value: string): value is AlertEventStatus => STATUS_SET.has(value);

const toAlertEventRecord = (row: AlertEventRow): AlertEventRecord => {
  if (!isEventStatus(row.status)) {
    throw new Error(`status is invalid: ${row.status}`);
  }

  return {
    id: String(row.id),
    user_id: row.user_id,
    alert_id: row.alert_id,
    device_id: row.device_id,
    ts: toIsoString(row.ts),
    status: row.status,
    message: row.message,
    metric_value: row.metric_value,
    acknowledged_at: toNullableIsoString(row.acknowledged_at),
    resolved_at: toNullableIsoString(row.resolved_at),
    created_at: toIsoString(row.created_at)
  };
};

const normalizeLimit = (value: number | null | undefined): number => {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    return DEFAULT_EVENTS_LIMIT;
  }

  const rounded = Math.floor(value);
  if (rounded < 1) {
    return DEFAULT_EVENTS_LIMIT;
  }

  return Math.min(rounded, MAX_EVENTS_LIMIT);
};

/**
 * Latest event for one (owner, rule, device) triple among `statuses`. Runs on the
 * caller's client so it shares the transaction holding the pair lock.
 */
export const findMostRecentAlertEvent = async (
  client: PoolClient,
  ownerId: string,
  alertId: string,
  deviceId: string,
  statuses: readonly AlertEventStatus[]
): Promise<AlertEventRecord | null> => {
  const { rows } = await client.query<AlertEventRow>(
    `
      SELECT ${ALERT_EVENT_COLUMNS}
      FROM alert_events
      WHERE user_id = $1
        AND alert_id = $2
        AND device_id = $3
        AND status = ANY($4::text[])
      ORDER BY ts DESC, id DESC
      LIMIT 1
    `,
    [ownerId, alertId, deviceId, [...statuses]]
  );

  const row = rows[0];
  return row ? toAlertEventRecord(row) : null;
};

export const insertTriggeredAlertEvent = async (
  client: PoolClient,
  input: InsertTriggeredAlertEventInput
): Promise<AlertEventRecord> => {
  const { rows } = await client.query<AlertEventRow>(
    `
      INSERT INTO alert_events (
        user_id,
        alert_id,
        device_id,
        ts,
        status,
        message,
        metric_value
      )
      VALUES ($1, $2, $3, $4, 'triggered', $5, $6)
      RETURNING ${ALERT_EVENT_COLUMNS}
    `,
    [
      input.user_id,
      input.alert_id,
      input.device_id,
      input.ts.toISOString(),
      input.message,
      input.metric_value
    ]
  );

  const row = rows[0];
  if (!row) {
    throw new Error("Alert event insert returned no row.");
  }

  return toAlertEventRecord(row);
};

/**
 * Moves an owned event to `acknowledged`. Rows already acknowledged do not match,
 * so a second acknowledgement returns false.
 */
export const acknowledgeAlertEvent = async (
  ownerId: string,
  eventId: string,
  now: Date = new Date()
): Promise<boolean> => {
  const pool = getDbPool();
  const result = await pool.query(
    `
      UPDATE alert_events
      SET status = 'acknowledged',
          acknowledged_at = $3
      WHERE id = $1
        AND user_id = $2
        AND status <> 'acknowledged'
    `,
    [eventId, ownerId, now.toISOString()]
  );

  return (result.rowCount ?? 0) > 0;
};

export const listAlertEvents = async (
  ownerId: string,
  input: ListAlertEventsInput = {}
): Promise<AlertEventRecord[]> => {
  const pool = getDbPool();
  const values: unknown[] = [ownerId];
  const filters = ["user_id = $1"];

  if (input.device_id) {
    values.push(input.device_id);
    filters.push(`device_id = $${values.length}`);
  }

  if (input.alert_id) {
    values.push(input.alert_id);
    filters.push(`alert_id = $${values.length}`);
  }

  values.push(normalizeLimit(input.limit));

  const { rows } = await pool.query<AlertEventRow>(
    `
      SELECT ${ALERT_EVENT_COLUMNS}
      FROM alert_events
      WHERE ${filters.join(" AND ")}
      ORDER BY ts DESC, id DESC
      LIMIT $${values.length}
    `,
    values
  );

  return rows.map((row) => toAlertEventRecord(row));
};
