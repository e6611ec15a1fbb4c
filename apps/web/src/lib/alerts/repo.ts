import type { Pool } from "pg";

import { getDbPool } from "@/lib/db/pool";
import { isDeviceOwnedBy } from "@/lib/devices/repo";
import { AppError, isUniqueViolation } from "@/lib/errors";

import {
  ALERT_COMPARISONS,
  ALERT_SEVERITIES,
  ALERT_TYPES,
  type AlertComparison,
  type AlertRuleRecord,
  type AlertSeverity,
  type AlertType,
  type CreateAlertRuleInput,
  type UpdateAlertRuleInput
} from "./types";

type TimestampValue = Date | string;

type AlertRuleRow = {
  id: string;
  user_id: string;
  device_id: string | null;
  name: string;
  alert_type: string;
  metric: string;
  comparison: string;
  threshold: number | null;
  window_seconds: number | null;
  severity: string;
  is_enabled: boolean;
  cooldown_seconds: number;
  created_at: TimestampValue;
  updated_at: TimestampValue;
};

export type AlertRuleColumnAssignment = {
  column: string;
  value: string | number | boolean | null;
};

const ALERT_TYPE_SET = new Set<string>(ALERT_TYPES);
const COMPARISON_SET = new Set<string>(ALERT_COMPARISONS);
const SEVERITY_SET = new Set<string>(ALERT_SEVERITIES);

const ALERT_RULE_COLUMNS = `
  id,
  user_id,
  device_id,
  name,
  alert_type,
  metric,
  comparison,
  threshold,
  window_seconds,
  severity,
  is_enabled,
  cooldown_seconds,
  created_at,
  updated_at
`;

const toIsoString = (value: TimestampValue): string => {
  if (value instanceof Date) {
    return value.toISOString();
  }

  return value;
};

const isAlertType = (value: string): value is AlertType => ALERT_TYPE_SET.has(value);

const isComparison = (value: string): value is AlertComparison => COMPARISON_SET.has(value);

const isSeverity = (value: string): value is AlertSeverity => SEVERITY_SET.has(value);

const toAlertRuleRecord = (row: AlertRuleRow): AlertRuleRecord => {
  if (!isAlertType(row.alert_type)) {
    throw new Error(`alert_type is invalid: ${row.alert_type}`);
  }
  if (!isComparison(row.comparison)) {
    throw new Error(`comparison is invalid: ${row.comparison}`);
  }
  if (!isSeverity(row.severity)) {
    throw new Error(`severity is invalid: ${row.severity}`);
  }

  return {
    id: row.id,
    user_id: row.user_id,
    device_id: row.device_id,
    name: row.name,
    alert_type: row.alert_type,
    metric: row.metric,
    comparison: row.comparison,
    threshold: row.threshold,
    window_seconds: row.window_seconds,
    severity: row.severity,
    is_enabled: row.is_enabled,
    cooldown_seconds: row.cooldown_seconds,
    created_at: toIsoString(row.created_at),
    updated_at: toIsoString(row.updated_at)
  };
};

export const alertNotFound = (): AppError =>
  new AppError("alert_not_found", 404, "Alert not found");

const alertNameExists = (): AppError =>
  new AppError("alert_name_exists", 409, "Alert name already exists");

export const requiresThreshold = (alertType: AlertType): boolean => alertType !== "offline";

const assertThresholdPresent = (alertType: AlertType, threshold: number | null | undefined): void => {
  if (requiresThreshold(alertType) && (threshold === null || threshold === undefined)) {
    throw new AppError(
      "threshold_required",
      400,
      `threshold is required for ${alertType} alerts.`
    );
  }
};

const assertDeviceScopeOwned = async (
  ownerId: string,
  deviceId: string | null | undefined
): Promise<void> => {
  if (!deviceId) {
    return;
  }

  if (!(await isDeviceOwnedBy(ownerId, deviceId))) {
    throw new AppError("device_not_found", 404, "Device not found");
  }
};

const isAlertNameTaken = async (
  ownerId: string,
  name: string,
  excludeAlertId: string | null
): Promise<boolean> => {
  const pool = getDbPool();
  const values: unknown[] = [ownerId, name];
  let exclusion = "";
  if (excludeAlertId) {
    values.push(excludeAlertId);
    exclusion = `AND id <> $${values.length}`;
  }

  const { rows } = await pool.query<{ id: string }>(
    `
      SELECT id
      FROM alerts
      WHERE user_id = $1
        AND name = $2
        ${exclusion}
      LIMIT 1
    `,
    values
  );

  return rows.length > 0;
};

/**
 * Builds the SET list for a partial rule update. Only fields present on the input
 * produce a column; an explicit `null` produces a column set to NULL.
 */
export const buildAlertRulePatch = (input: UpdateAlertRuleInput): AlertRuleColumnAssignment[] => {
  const assignments: AlertRuleColumnAssignment[] = [];

  if (input.name !== undefined) {
    assignments.push({ column: "name", value: input.name });
  }
  if (input.alert_type !== undefined) {
    assignments.push({ column: "alert_type", value: input.alert_type });
  }
  if (input.device_id !== undefined) {
    assignments.push({ column: "device_id", value: input.device_id });
  }
  if (input.metric !== undefined) {
    assignments.push({ column: "metric", value: input.metric });
  }
  if (input.comparison !== undefined) {
    assignments.push({ column: "comparison", value: input.comparison });
  }
  if (input.threshold !== undefined) {
    assignments.push({ column: "threshold", value: input.threshold });
  }
  if (input.window_seconds !== undefined) {
    assignments.push({ column: "window_seconds", value: input.window_seconds });
  }
  if (input.severity !== undefined) {
    assignments.push({ column: "severity", value: input.severity });
  }
  if (input.is_enabled !== undefined) {
    assignments.push({ column: "is_enabled", value: input.is_enabled });
  }
  if (input.cooldown_seconds !== undefined) {
    assignments.push({ column: "cooldown_seconds", value: input.cooldown_seconds });
  }

  return assignments;
};

export const listAlertRules = async (ownerId: string): Promise<AlertRuleRecord[]> => {
  const pool = getDbPool();
  const { rows } = await pool.query<AlertRuleRow>(
    `
      SELECT ${ALERT_RULE_COLUMNS}
      FROM alerts
      WHERE user_id = $1
      ORDER BY created_at DESC, id DESC
    `,
    [ownerId]
  );

  return rows.map((row) => toAlertRuleRecord(row));
};

export const listEnabledAlertRules = async (
  ownerId: string,
  pool: Pool = getDbPool()
): Promise<AlertRuleRecord[]> => {
  const { rows } = await pool.query<AlertRuleRow>(
    `
      SELECT ${ALERT_RULE_COLUMNS}
      FROM alerts
      WHERE user_id = $1
        AND is_enabled = TRUE
      ORDER BY created_at ASC, id ASC
    `,
    [ownerId]
  );

  return rows.map((row) => toAlertRuleRecord(row));
};

export const listOwnersWithEnabledRules = async (): Promise<string[]> => {
  const pool = getDbPool();
  const { rows } = await pool.query<{ user_id: string }>(
    `
      SELECT DISTINCT user_id
      FROM alerts
      WHERE is_enabled = TRUE
      ORDER BY user_id ASC
    `
  );

  return rows.map((row) => row.user_id);
};

export const getAlertRuleById = async (
  ownerId: string,
  alertId: string
): Promise<AlertRuleRecord | null> => {
  const pool = getDbPool();
  const { rows } = await pool.query<AlertRuleRow>(
    `
      SELECT ${ALERT_RULE_COLUMNS}
      FROM alerts
      WHERE id = $1
        AND user_id = $2
    `,
    [alertId, ownerId]
  );

  const row = rows[0];
  return row ? toAlertRuleRecord(row) : null;
};

export const createAlertRule = async (
  ownerId: string,
  input: CreateAlertRuleInput
): Promise<AlertRuleRecord> => {
  assertThresholdPresent(input.alert_type, input.threshold);
  await assertDeviceScopeOwned(ownerId, input.device_id);

  if (await isAlertNameTaken(ownerId, input.name, null)) {
    throw alertNameExists();
  }

  const pool = getDbPool();
  try {
    const { rows } = await pool.query<AlertRuleRow>(
      `
        INSERT INTO alerts (
          user_id,
          device_id,
          name,
          alert_type,
          metric,
          comparison,
          threshold,
          window_seconds,
          severity,
          is_enabled,
          cooldown_seconds
        )
        VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11)
        RETURNING ${ALERT_RULE_COLUMNS}
      `,
      [
        ownerId,
        input.device_id ?? null,
        input.name,
        input.alert_type,
        input.metric ?? "power_w",
        input.comparison ?? "gt",
        input.threshold ?? null,
        input.window_seconds ?? null,
        input.severity ?? "medium",
        input.is_enabled ?? true,
        input.cooldown_seconds ?? 300
      ]
    );

    const row = rows[0];
    if (!row) {
      throw new Error("Alert insert returned no row.");
    }

    return toAlertRuleRecord(row);
  } catch (error) {
    if (isUniqueViolation(error)) {
      throw alertNameExists();
    }

    throw error;
  }
};

export const updateAlertRule = async (
  ownerId: string,
  alertId: string,
  input: UpdateAlertRuleInput
): Promise<AlertRuleRecord> => {
  const current = await getAlertRuleById(ownerId, alertId);
  if (!current) {
    throw alertNotFound();
  }

  const assignments = buildAlertRulePatch(input);
  if (assignments.length === 0) {
    return current;
  }

  assertThresholdPresent(
    input.alert_type ?? current.alert_type,
    input.threshold !== undefined ? input.threshold : current.threshold
  );

  if (input.device_id !== undefined) {
    await assertDeviceScopeOwned(ownerId, input.device_id);
  }

  if (input.name !== undefined && (await isAlertNameTaken(ownerId, input.name, alertId))) {
    throw alertNameExists();
  }

  const values: unknown[] = [];
  const setClauses = assignments.map((assignment) => {
    values.push(assignment.value);
    return `${assignment.column} = $${values.length}`;
  });
  values.push(alertId, ownerId);

  const pool = getDbPool();
  try {
    const { rows } = await pool.query<AlertRuleRow>(
      `
        UPDATE alerts
        SET ${setClauses.join(", ")}, updated_at = NOW()
        WHERE id = $${values.length - 1}
          AND user_id = $${values.length}
        RETURNING ${ALERT_RULE_COLUMNS}
      `,
      values
    );

    const row = rows[0];
    if (!row) {
      throw alertNotFound();
    }

    return toAlertRuleRecord(row);
  } catch (error) {
    if (isUniqueViolation(error)) {
      throw alertNameExists();
    }

    throw error;
  }
};

export const deleteAlertRule = async (ownerId: string, alertId: string): Promise<boolean> => {
  const pool = getDbPool();
  const result = await pool.query(
    `
      DELETE FROM alerts
      WHERE id = $1
        AND user_id = $2
    `,
    [alertId, ownerId]
  );

  return (result.rowCount ?? 0) > 0;
};
