import { z } from "zod";

import { ALERT_COMPARISONS, ALERT_SEVERITIES, ALERT_TYPES } from "./types";

const ruleName = z.string().trim().min(1).max(255);
const metricName = z.string().trim().min(1).max(64);
const deviceScope = z.string().trim().uuid().nullable();

export const createAlertRuleSchema = z.object({
  name: ruleName,
  alert_type: z.enum(ALERT_TYPES),
  device_id: deviceScope.optional(),
  metric: metricName.default("power_w"),
  comparison: z.enum(ALERT_COMPARISONS).default("gt"),
  threshold: z.number().finite().nullable().optional(),
  window_seconds: z.number().int().min(1).nullable().optional(),
  severity: z.enum(ALERT_SEVERITIES).default("medium"),
  is_enabled: z.boolean().default(true),
  cooldown_seconds: z.number().int().min(0).default(300)
});

export const updateAlertRuleSchema = z.object({
  name: ruleName.optional(),
  alert_type: z.enum(ALERT_TYPES).optional(),
  device_id: deviceScope.optional(),
  metric: metricName.optional(),
  comparison: z.enum(ALERT_COMPARISONS).optional(),
  threshold: z.number().finite().nullable().optional(),
  window_seconds: z.number().int().min(1).nullable().optional(),
  severity: z.enum(ALERT_SEVERITIES).optional(),
  is_enabled: z.boolean().optional(),
  cooldown_seconds: z.number().int().min(0).optional()
});
