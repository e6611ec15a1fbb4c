import type { Pool } from "pg";

import { getDbPool } from "@/lib/db/pool";
import { listActiveDevices } from "@/lib/devices/repo";
import { getLatestReading } from "@/lib/energy/repo";

import { findMostRecentAlertEvent, insertTriggeredAlertEvent } from "./events_repo";
import { listEnabledAlertRules } from "./repo";
import type {
  AlertEventRecord,
  AlertEventStatus,
  AlertRuleRecord,
  InsertTriggeredAlertEventInput
} from "./types";

export type EvaluationReading = {
  ts: string;
  power_w: number | null;
  voltage_v: number | null;
  current_a: number | null;
  energy_wh: number | null;
};

export type AlertPairKey = {
  owner_id: string;
  alert_id: string;
  device_id: string;
};

/**
 * Event log operations scoped to one locked (owner, rule, device) pair.
 */
export interface AlertPairEventLog {
  findMostRecentEvent(statuses: readonly AlertEventStatus[]): Promise<AlertEventRecord | null>;
  insertTriggeredEvent(
    input: Omit<InsertTriggeredAlertEventInput, "user_id" | "alert_id" | "device_id">
  ): Promise<AlertEventRecord>;
}

export interface AlertEvaluationStores {
  listEnabledRules(ownerId: string): Promise<AlertRuleRecord[]>;
  listActiveDeviceIds(ownerId: string): Promise<string[]>;
  getLatestReading(ownerId: string, deviceId: string): Promise<EvaluationReading | null>;
  withPairLock<T>(key: AlertPairKey, work: (events: AlertPairEventLog) => Promise<T>): Promise<T>;
}

export const pairLockKey = (key: AlertPairKey): string => {
  return `${key.owner_id}:${key.alert_id}:${key.device_id}`;
};

/**
 * Stores backed by PostgreSQL. Each pair runs in its own transaction holding a
 * transaction-scoped advisory lock, so concurrent passes for the same owner see
 * each other's events before deciding on cooldown.
 */
export const createPostgresAlertStores = (pool: Pool = getDbPool()): AlertEvaluationStores => ({
  listEnabledRules: (ownerId) => listEnabledAlertRules(ownerId, pool),

  async listActiveDeviceIds(ownerId) {
    const devices = await listActiveDevices(ownerId, pool);
    return devices.map((device) => device.id);
  },

  async getLatestReading(ownerId, deviceId) {
    const latest = await getLatestReading(ownerId, deviceId, pool);
    if (!latest || latest.ts === null) {
      return null;
    }

    return {
      ts: latest.ts,
      power_w: latest.power_w,
      voltage_v: latest.voltage_v,
      current_a: latest.current_a,
      energy_wh: latest.energy_wh
    };
  },

  async withPairLock<T>(
    key: AlertPairKey,
    work: (events: AlertPairEventLog) => Promise<T>
  ): Promise<T> {
    const client = await pool.connect();

    try {
      await client.query("BEGIN");
      await client.query("SELECT pg_advisory_xact_lock(hashtextextended($1, 0))", [
        pairLockKey(key)
      ]);

      const result = await work({
        findMostRecentEvent: (statuses) =>
          findMostRecentAlertEvent(client, key.owner_id, key.alert_id, key.device_id, statuses),
        insertTriggeredEvent: (input) =>
          insertTriggeredAlertEvent(client, {
            ...input,
            user_id: key.owner_id,
            alert_id: key.alert_id,
            device_id: key.device_id
          })
      });

      await client.query("COMMIT");
      return result;
    } catch (error) {
      await client.query("ROLLBACK");
      throw error;
    } finally {
      client.release();
    }
  }
});
