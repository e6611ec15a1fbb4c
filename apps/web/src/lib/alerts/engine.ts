import { toStoreError } from "@/lib/errors";
import { logger } from "@/lib/logger";

import {
  createPostgresAlertStores,
  type AlertEvaluationStores,
  type EvaluationReading
} from "./stores";
import type {
  AlertComparison,
  AlertEventStatus,
  AlertRuleRecord,
  AlertType
} from "./types";

export const DEFAULT_OFFLINE_WINDOW_SECONDS = 900;

const COOLDOWN_STATUSES: readonly AlertEventStatus[] = ["triggered", "suppressed"];

export type AlertPairOutcome =
  | "triggered"
  | "cooldown"
  | "no_reading"
  | "no_threshold"
  | "no_metric_value"
  | "condition_not_met"
  | "reading_fresh";

export type AlertRuleEvaluation =
  | {
      triggered: true;
      outcome: "triggered";
      message: string;
      metric_value: number | null;
    }
  | {
      triggered: false;
      outcome: Exclude<AlertPairOutcome, "triggered" | "cooldown">;
      message: null;
      metric_value: number | null;
    };

export type EvaluatedAlertPair = {
  rule_id: string;
  rule_name: string;
  alert_type: AlertType;
  device_id: string;
  outcome: AlertPairOutcome;
  message: string | null;
  metric_value: number | null;
  event_id: string | null;
};

export type RunAlertEvaluationInput = {
  owner_id: string;
  now?: Date;
  dry_run?: boolean;
  stores?: AlertEvaluationStores;
};

export type RunAlertEvaluationResult = {
  owner_id: string;
  dry_run: boolean;
  evaluated_rules: number;
  evaluated_pairs: number;
  triggered_count: number;
  results: EvaluatedAlertPair[];
};

export const compareMetric = (
  value: number,
  comparison: AlertComparison,
  threshold: number
): boolean => {
  switch (comparison) {
    case "gt":
      return value > threshold;
    case "gte":
      return value >= threshold;
    case "lt":
      return value < threshold;
    case "lte":
      return value <= threshold;
    // Exact float equality: readings that differ in the last bit do not match.
    case "eq":
      return value === threshold;
    case "neq":
      return value !== threshold;
    default:
      return false;
  }
};

export const readMetricValue = (reading: EvaluationReading, metric: string): number | null => {
  switch (metric) {
    case "power_w":
      return reading.power_w;
    case "voltage_v":
      return reading.voltage_v;
    case "current_a":
      return reading.current_a;
    case "energy_wh":
      return reading.energy_wh;
    default:
      return null;
  }
};

const toEpochMs = (value: Date | string): number => {
  return value instanceof Date ? value.getTime() : Date.parse(value);
};

export const isWithinCooldown = (
  lastEventTs: Date | string | null,
  cooldownSeconds: number,
  now: Date
): boolean => {
  if (lastEventTs === null) {
    return false;
  }

  return now.getTime() - toEpochMs(lastEventTs) < cooldownSeconds * 1000;
};

const skipped = (
  outcome: Exclude<AlertPairOutcome, "triggered" | "cooldown">,
  metricValue: number | null = null
): AlertRuleEvaluation => ({
  triggered: false,
  outcome,
  message: null,
  metric_value: metricValue
});

const evaluateOfflineRule = (
  rule: AlertRuleRecord,
  reading: EvaluationReading | null,
  now: Date
): AlertRuleEvaluation => {
  const windowSeconds = rule.window_seconds ?? DEFAULT_OFFLINE_WINDOW_SECONDS;
  const stale = !reading || now.getTime() - toEpochMs(reading.ts) > windowSeconds * 1000;
  if (!stale) {
    return skipped("reading_fresh");
  }

  return {
    triggered: true,
    outcome: "triggered",
    message: `Device offline (no reading within ${windowSeconds}s)`,
    metric_value: null
  };
};

const evaluateThresholdRule = (
  rule: AlertRuleRecord,
  reading: EvaluationReading | null
): AlertRuleEvaluation => {
  if (!reading) {
    return skipped("no_reading");
  }

  if (rule.threshold === null) {
    return skipped("no_threshold");
  }

  const value = readMetricValue(reading, rule.metric);
  if (value === null) {
    return skipped("no_metric_value");
  }

  if (!compareMetric(value, rule.comparison, rule.threshold)) {
    return skipped("condition_not_met", value);
  }

  return {
    triggered: true,
    outcome: "triggered",
    message: `${rule.metric} ${rule.comparison} ${rule.threshold}`,
    metric_value: value
  };
};

/**
 * Applies a rule to the latest reading of one device. Cooldown is not considered here.
 */
export const evaluateAlertRule = (
  rule: AlertRuleRecord,
  reading: EvaluationReading | null,
  now: Date
): AlertRuleEvaluation => {
  switch (rule.alert_type) {
    case "offline":
      return evaluateOfflineRule(rule, reading, now);
    // Placeholder: anomaly detection shares the threshold comparison until it has its own model.
    case "anomaly":
    case "threshold":
      return evaluateThresholdRule(rule, reading);
  }
};

export const runAlertEvaluation = async (
  input: RunAlertEvaluationInput
): Promise<RunAlertEvaluationResult> => {
  const ownerId = input.owner_id;
  const now = input.now ?? new Date();
  const dryRun = Boolean(input.dry_run);
  const stores = input.stores ?? createPostgresAlertStores();
  const log = logger.child({ owner_id: ownerId, dry_run: dryRun });

  const results: EvaluatedAlertPair[] = [];
  let evaluatedRules = 0;
  let triggeredCount = 0;
  let activeDeviceIds: string[] | null = null;

  const resolveTargetDevices = async (rule: AlertRuleRecord): Promise<string[]> => {
    if (rule.device_id) {
      return [rule.device_id];
    }

    if (!activeDeviceIds) {
      activeDeviceIds = await stores.listActiveDeviceIds(ownerId);
    }

    return activeDeviceIds;
  };

  try {
    const rules = await stores.listEnabledRules(ownerId);

    for (const rule of rules) {
      evaluatedRules += 1;
      const deviceIds = await resolveTargetDevices(rule);

      for (const deviceId of deviceIds) {
        // Read outside the lock: the pair transaction holds a pool client.
        const reading = await stores.getLatestReading(ownerId, deviceId);
        const pair = await stores.withPairLock(
          { owner_id: ownerId, alert_id: rule.id, device_id: deviceId },
          async (events): Promise<EvaluatedAlertPair> => {
            const base = {
              rule_id: rule.id,
              rule_name: rule.name,
              alert_type: rule.alert_type,
              device_id: deviceId
            };

            const lastEvent = await events.findMostRecentEvent(COOLDOWN_STATUSES);
            if (lastEvent && isWithinCooldown(lastEvent.ts, rule.cooldown_seconds, now)) {
              return {
                ...base,
                outcome: "cooldown",
                message: null,
                metric_value: null,
                event_id: null
              };
            }

            const evaluation = evaluateAlertRule(rule, reading, now);
            if (!evaluation.triggered || dryRun) {
              return {
                ...base,
                outcome: evaluation.outcome,
                message: evaluation.message,
                metric_value: evaluation.metric_value,
                event_id: null
              };
            }

            const event = await events.insertTriggeredEvent({
              ts: now,
              message: evaluation.message,
              metric_value: evaluation.metric_value
            });

            return {
              ...base,
              outcome: evaluation.outcome,
              message: evaluation.message,
              metric_value: evaluation.metric_value,
              event_id: event.id
            };
          }
        );

        if (pair.outcome === "triggered") {
          triggeredCount += 1;
        }

        results.push(pair);
      }
    }
  } catch (error) {
    const storeError = toStoreError(error);
    log.warn(
      {
        code: storeError.code,
        evaluated_rules: evaluatedRules,
        triggered_count: triggeredCount,
        error
      },
      "alert evaluation aborted"
    );
    throw storeError;
  }

  log.info(
    {
      evaluated_rules: evaluatedRules,
      evaluated_pairs: results.length,
      triggered_count: triggeredCount
    },
    "alert evaluation finished"
  );

  return {
    owner_id: ownerId,
    dry_run: dryRun,
    evaluated_rules: evaluatedRules,
    evaluated_pairs: results.length,
    triggered_count: triggeredCount,
    results
  };
};
