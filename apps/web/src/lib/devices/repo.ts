import type { Pool } from "pg";

import { getDbPool } from "@/lib/db/pool";
import { AppError, isUniqueViolation } from "@/lib/errors";

import type { CreateDeviceInput, DeviceRecord, UpdateDeviceInput } from "./types";

type TimestampValue = Date | string;

type DeviceRow = {
  id: string;
  name: string;
  location: string | null;
  model: string | null;
  manufacturer: string | null;
  serial_number: string | null;
  external_device_id: string | null;
  timezone: string;
  is_active: boolean;
  created_at: TimestampValue;
  updated_at: TimestampValue;
};

type DeviceColumnAssignment = {
  column: string;
  value: string | boolean | null;
};

const DEVICE_COLUMNS = `
  id,
  name,
  location,
  model,
  manufacturer,
  serial_number,
  external_device_id,
  timezone,
  is_active,
  created_at,
  updated_at
`;

const toIsoString = (value: TimestampValue): string => {
  if (value instanceof Date) {
    return value.toISOString();
  }

  return value;
};

const toDeviceRecord = (row: DeviceRow): DeviceRecord => {
  return {
    id: row.id,
    name: row.name,
    location: row.location,
    model: row.model,
    manufacturer: row.manufacturer,
    serial_number: row.serial_number,
    external_device_id: row.external_device_id,
    timezone: row.timezone,
    is_active: row.is_active,
    created_at: toIsoString(row.created_at),
    updated_at: toIsoString(row.updated_at)
  };
};

const deviceNameExists = (): AppError =>
  new AppError("device_name_exists", 409, "Device name already exists");

export const deviceNotFound = (): AppError =>
  new AppError("device_not_found", 404, "Device not found");

const isDeviceNameTaken = async (
  ownerId: string,
  name: string,
  excludeDeviceId: string | null
): Promise<boolean> => {
  const pool = getDbPool();
  const values: unknown[] = [ownerId, name];
  let exclusion = "";
  if (excludeDeviceId) {
    values.push(excludeDeviceId);
    exclusion = `AND id <> $${values.length}`;
  }

  const { rows } = await pool.query<{ id: string }>(
    `
      SELECT id
      FROM devices
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
 * Builds the SET list for a partial device update from the fields that are present.
 */
export const buildDevicePatch = (input: UpdateDeviceInput): DeviceColumnAssignment[] => {
  const assignments: DeviceColumnAssignment[] = [];

  if (input.name !== undefined) {
    assignments.push({ column: "name", value: input.name });
  }
  if (input.location !== undefined) {
    assignments.push({ column: "location", value: input.location });
  }
  if (input.model !== undefined) {
    assignments.push({ column: "model", value: input.model });
  }
  if (input.manufacturer !== undefined) {
    assignments.push({ column: "manufacturer", value: input.manufacturer });
  }
  if (input.serial_number !== undefined) {
    assignments.push({ column: "serial_number", value: input.serial_number });
  }
  if (input.external_device_id !== undefined) {
    assignments.push({ column: "external_device_id", value: input.external_device_id });
  }
  if (input.timezone !== undefined) {
    assignments.push({ column: "timezone", value: input.timezone });
  }
  if (input.is_active !== undefined) {
    assignments.push({ column: "is_active", value: input.is_active });
  }

  return assignments;
};

export const listDevices = async (ownerId: string): Promise<DeviceRecord[]> => {
  const pool = getDbPool();
  const { rows } = await pool.query<DeviceRow>(
    `
      SELECT ${DEVICE_COLUMNS}
      FROM devices
      WHERE user_id = $1
      ORDER BY created_at DESC, id DESC
    `,
    [ownerId]
  );

  return rows.map((row) => toDeviceRecord(row));
};

export const listActiveDevices = async (
  ownerId: string,
  pool: Pool = getDbPool()
): Promise<DeviceRecord[]> => {
  const { rows } = await pool.query<DeviceRow>(
    `
      SELECT ${DEVICE_COLUMNS}
      FROM devices
      WHERE user_id = $1
        AND is_active = TRUE
      ORDER BY created_at ASC, id ASC
    `,
    [ownerId]
  );

  return rows.map((row) => toDeviceRecord(row));
};

export const getDeviceById = async (
  ownerId: string,
  deviceId: string
): Promise<DeviceRecord | null> => {
  const pool = getDbPool();
  const { rows } = await pool.query<DeviceRow>(
    `
      SELECT ${DEVICE_COLUMNS}
      FROM devices
      WHERE id = $1
        AND user_id = $2
    `,
    [deviceId, ownerId]
  );

  const row = rows[0];
  return row ? toDeviceRecord(row) : null;
};

export const isDeviceOwnedBy = async (ownerId: string, deviceId: string): Promise<boolean> => {
  const pool = getDbPool();
  const { rows } = await pool.query<{ id: string }>(
    `
      SELECT id
      FROM devices
      WHERE id = $1
        AND user_id = $2
    `,
    [deviceId, ownerId]
  );

  return rows.length > 0;
};

export const assertDeviceOwned = async (ownerId: string, deviceId: string): Promise<void> => {
  if (!(await isDeviceOwnedBy(ownerId, deviceId))) {
    throw deviceNotFound();
  }
};

export const createDevice = async (
  ownerId: string,
  input: CreateDeviceInput
): Promise<DeviceRecord> => {
  if (await isDeviceNameTaken(ownerId, input.name, null)) {
    throw deviceNameExists();
  }

  const pool = getDbPool();
  try {
    const { rows } = await pool.query<DeviceRow>(
      `
        INSERT INTO devices (
          user_id,
          name,
          location,
          model,
          manufacturer,
          serial_number,
          external_device_id,
          timezone
        )
        VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
        RETURNING ${DEVICE_COLUMNS}
      `,
      [
        ownerId,
        input.name,
        input.location ?? null,
        input.model ?? null,
        input.manufacturer ?? null,
        input.serial_number ?? null,
        input.external_device_id ?? null,
        input.timezone ?? "UTC"
      ]
    );

    const row = rows[0];
    if (!row) {
      throw new Error("Device insert returned no row.");
    }

    return toDeviceRecord(row);
  } catch (error) {
    if (isUniqueViolation(error)) {
      throw deviceNameExists();
    }

    throw error;
  }
};

export const updateDevice = async (
  ownerId: string,
  deviceId: string,
  input: UpdateDeviceInput
): Promise<DeviceRecord> => {
  const current = await getDeviceById(ownerId, deviceId);
  if (!current) {
    throw deviceNotFound();
  }

  const assignments = buildDevicePatch(input);
  if (assignments.length === 0) {
    return current;
  }

  if (input.name !== undefined && (await isDeviceNameTaken(ownerId, input.name, deviceId))) {
    throw deviceNameExists();
  }

  const values: unknown[] = [];
  const setClauses = assignments.map((assignment) => {
    values.push(assignment.value);
    return `${assignment.column} = $${values.length}`;
  });
  values.push(deviceId, ownerId);

  const pool = getDbPool();
  try {
    const { rows } = await pool.query<DeviceRow>(
      `
        UPDATE devices
        SET ${setClauses.join(", ")}, updated_at = NOW()
        WHERE id = $${values.length - 1}
          AND user_id = $${values.length}
        RETURNING ${DEVICE_COLUMNS}
      `,
      values
    );

    const row = rows[0];
    if (!row) {
      throw deviceNotFound();
    }

    return toDeviceRecord(row);
  } catch (error) {
    if (isUniqueViolation(error)) {
      throw deviceNameExists();
    }

    throw error;
  }
};

export const deleteDevice = async (ownerId: string, deviceId: string): Promise<boolean> => {
  const pool = getDbPool();
  const result = await pool.query(
    `
      DELETE FROM devices
      WHERE id = $1
        AND user_id = $2
    `,
    [deviceId, ownerId]
  );

  return (result.rowCount ?? 0) > 0;
};
