import { beforeEach, describe, expect, it, vi } from "vitest";
import type { Pool } from "pg";

const mocks = vi.hoisted(() => ({
  query: vi.fn(),
  connect: vi.fn(),
  release: vi.fn(),
  clientQuery: vi.fn(),
  getDbPool: vi.fn(),
  getLatestReading: vi.fn(),
  listActiveDevices: vi.fn(),
  listEnabledAlertRules: vi.fn()
}));

vi.mock("@/lib/db/pool", () => ({
  getDbPool: mocks.getDbPool
}));

vi.mock("@/lib/energy/repo", () => ({
  getLatestReading: (...args: unknown[]) => mocks.getLatestReading(...args)
}));

vi.mock("@/lib/devices/repo", () => ({
  listActiveDevices: (...args: unknown[]) => mocks.listActiveDevices(...args)
}));

vi.mock("./repo", () => ({
  listEnabledAlertRules: (...args: unknown[]) => mocks.listEnabledAlertRules(...args)
}));

import { runAlertEvaluation } from "./engine";
import { createPostgresAlertStores, pairLockKey } from "./stores";
import type { AlertRuleRecord } from "./types";

const KEY = { owner_id: "user-1", alert_id: "rule-1", device_id: "device-1" };

const EVENT_ROW = {
  id: "7",
  user_id: "user-1",
  alert_id: "rule-1",
  device_id: "device-1",
  ts: new Date("2026-03-01T12:00:01.000Z"),
  status: "triggered",
  message: "power_w gt 1000",
  metric_value: 1500,
  acknowledged_at: null,
  resolved_at: null,
  created_at: new Date("2026-03-01T12:00:01.000Z")
};

type QueryResult = { rows: unknown[] };

type QueryablePool = {
  query: (sql: string, values?: unknown[]) => Promise<QueryResult>;
};

// Hands out at most `size` clients; further callers wait for a release.
const createCappedPool = (size: number, respond: (sql: string) => QueryResult) => {
  let available = size;
  const waiters: Array<() => void> = [];

  const acquire = async (): Promise<void> => {
    if (available > 0) {
      available -= 1;
      return;
    }

    await new Promise<void>((resolve) => waiters.push(resolve));
  };

  const releaseSlot = (): void => {
    const next = waiters.shift();
    if (next) {
      next();
    } else {
      available += 1;
    }
  };

  return {
    async query(sql: string): Promise<QueryResult> {
      await acquire();
      try {
        return respond(sql);
      } finally {
        releaseSlot();
      }
    },
    async connect() {
      await acquire();
      return {
        query: async (sql: string): Promise<QueryResult> => respond(sql),
        release: releaseSlot
      };
    }
  };
};

const buildRule = (ownerId: string): AlertRuleRecord => ({
  id: `rule-${ownerId}`,
  user_id: ownerId,
  device_id: `device-${ownerId}`,
  name: "High load",
  alert_type: "threshold",
  metric: "power_w",
  comparison: "gt",
  threshold: 1000,
  window_seconds: null,
  severity: "medium",
  is_enabled: true,
  cooldown_seconds: 300,
  created_at: "2026-02-01T00:00:00.000Z",
  updated_at: "2026-02-01T00:00:00.000Z"
});

const buildPool = (): Pool => {
  const pool = { query: mocks.query, connect: mocks.connect };
  mocks.getDbPool.mockReturnValue(pool);
  return mocks.getDbPool();
};

describe("createPostgresAlertStores", () => {
  beforeEach(() => {
    vi.clearAllMocks();
    mocks.connect.mockResolvedValue({ query: mocks.clientQuery, release: mocks.release });
  });

  it("serializes a pair behind a transaction-scoped advisory lock", async () => {
    mocks.clientQuery.mockImplementation(async (sql: string) => {
      if (sql.includes("INSERT INTO alert_events")) {
        return { rows: [EVENT_ROW] };
      }

      return { rows: [] };
    });

    const stores = createPostgresAlertStores(buildPool());
    const event = await stores.withPairLock(KEY, async (events) => {
      expect(await events.findMostRecentEvent(["triggered", "suppressed"])).toBeNull();
      return events.insertTriggeredEvent({
        ts: new Date("2026-03-01T12:00:01.000Z"),
        message: "power_w gt 1000",
        metric_value: 1500
      });
    });

    expect(event.id).toBe("7");
    expect(event.ts).toBe("2026-03-01T12:00:01.000Z");

    const statements = mocks.clientQuery.mock.calls.map(([sql]) => String(sql).trim());
    expect(statements[0]).toBe("BEGIN");
    expect(statements[1]).toBe("SELECT pg_advisory_xact_lock(hashtextextended($1, 0))");
    expect(mocks.clientQuery.mock.calls[1]?.[1]).toEqual(["user-1:rule-1:device-1"]);
    expect(statements[2]).toContain("status = ANY($4::text[])");
    expect(mocks.clientQuery.mock.calls[2]?.[1]).toEqual([
      "user-1",
      "rule-1",
      "device-1",
      ["triggered", "suppressed"]
    ]);
    expect(statements[3]).toContain("INSERT INTO alert_events");
    expect(mocks.clientQuery.mock.calls[3]?.[1]).toEqual([
      "user-1",
      "rule-1",
      "device-1",
      "2026-03-01T12:00:01.000Z",
      "power_w gt 1000",
      1500
    ]);
    expect(statements[4]).toBe("COMMIT");
    expect(mocks.release).toHaveBeenCalledTimes(1);
  });

  it("rolls back and releases the client when the work fails", async () => {
    mocks.clientQuery.mockResolvedValue({ rows: [] });

    const stores = createPostgresAlertStores(buildPool());
    await expect(
      stores.withPairLock(KEY, async () => {
        throw new Error("reading lookup failed");
      })
    ).rejects.toThrowError("reading lookup failed");

    const statements = mocks.clientQuery.mock.calls.map(([sql]) => String(sql).trim());
    expect(statements).toContain("ROLLBACK");
    expect(statements).not.toContain("COMMIT");
    expect(mocks.release).toHaveBeenCalledTimes(1);
  });

  it("maps the latest reading and treats an empty device as no reading", async () => {
    mocks.getLatestReading
      .mockResolvedValueOnce({
        device_id: "device-1",
        ts: "2026-03-01T12:00:00.000Z",
        power_w: 1500,
        voltage_v: 230,
        current_a: null,
        energy_wh: null,
        source: "device"
      })
      .mockResolvedValueOnce(null);

    const stores = createPostgresAlertStores(buildPool());

    await expect(stores.getLatestReading("user-1", "device-1")).resolves.toEqual({
      ts: "2026-03-01T12:00:00.000Z",
      power_w: 1500,
      voltage_v: 230,
      current_a: null,
      energy_wh: null
    });
    await expect(stores.getLatestReading("user-1", "device-2")).resolves.toBeNull();
  });

  it("lists active device ids for the owner", async () => {
    mocks.listActiveDevices.mockResolvedValue([{ id: "device-1" }, { id: "device-2" }]);

    const stores = createPostgresAlertStores(buildPool());

    await expect(stores.listActiveDeviceIds("user-1")).resolves.toEqual(["device-1", "device-2"]);
    expect(mocks.listActiveDevices).toHaveBeenCalledWith("user-1", mocks.getDbPool());
  });

  it("builds one lock key per owner, rule and device", () => {
    expect(pairLockKey(KEY)).toBe("user-1:rule-1:device-1");
  });
});

describe("concurrent evaluation passes", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("finish on a pool smaller than the number of passes holding pair locks", async () => {
    const pool = createCappedPool(2, (sql) =>
      sql.includes("INSERT INTO alert_events") ? { rows: [EVENT_ROW] } : { rows: [] }
    );
    mocks.getDbPool.mockReturnValue(pool);

    mocks.listEnabledAlertRules.mockImplementation(
      async (ownerId: string, db: QueryablePool) => {
        await db.query("SELECT rules");
        return [buildRule(ownerId)];
      }
    );
    mocks.getLatestReading.mockImplementation(
      async (_ownerId: string, deviceId: string, db: QueryablePool) => {
        await db.query("SELECT latest reading");
        return {
          device_id: deviceId,
          ts: "2026-03-01T12:00:00.000Z",
          power_w: 1500,
          voltage_v: null,
          current_a: null,
          energy_wh: null,
          source: "device"
        };
      }
    );

    const stores = createPostgresAlertStores(mocks.getDbPool());
    const now = new Date("2026-03-01T12:00:01.000Z");
    const passes = Promise.all(
      ["owner-a", "owner-b", "owner-c"].map((ownerId) =>
        runAlertEvaluation({ owner_id: ownerId, now, stores })
      )
    );

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<"timed_out">((resolve) => {
      timer = setTimeout(() => resolve("timed_out"), 2000);
    });
    const outcome = await Promise.race([passes.then(() => "finished" as const), timeout]);
    clearTimeout(timer);

    expect(outcome).toBe("finished");
    const results = await passes;
    expect(results.map((result) => result.triggered_count)).toEqual([1, 1, 1]);
    expect(mocks.getLatestReading).toHaveBeenCalledWith("owner-a", "device-owner-a", pool);
  });
});
