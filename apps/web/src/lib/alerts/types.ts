export const ALERT_TYPES = ["threshold", "anomaly", "offline"] as const;

export const ALERT_COMPARISONS = ["gt", "gte", "lt", "lte", "eq", "neq"] as const;

export const ALERT_SEVERITIES = ["low", "medium", "high", "critical"] as const;

export const ALERT_EVENT_STATUSES = ["triggered", "acknowledged", "resolved", "suppressed"] as const;

export type AlertType = (typeof ALERT_TYPES)[number];
export type AlertComparison = (typeof ALERT_COMPARISONS)[number];
export type AlertSeverity = (typeof ALERT_SEVERITIES)[number];
export type AlertEventStatus = (typeof ALERT_EVENT_STATUSES)[number];

export type AlertRuleRecord = {
  id: string;
  user_id: string;
  device_id: string | null;
  name: string;
  alert_type: AlertType;
  metric: string;
  comparison: AlertComparison;
  threshold: number | null;
  window_seconds: number | null;
  severity: AlertSeverity;
  is_enabled: boolean;
  cooldown_seconds: number;
  created_at: string;
  updated_at: string;
};

export type AlertEventRecord = {
  id: string;
  user_id: string;
  alert_id: string;
  device_id: string;
  ts: string;
  status: AlertEventStatus;
  message: string | null;
  metric_value: number | null;
  acknowledged_at: string | null;
  resolved_at: string | null;
  created_at: string;
};

export type CreateAlertRuleInput = {
  name: string;
  alert_type: AlertType;
  device_id?: string | null;
  metric?: string;
  comparison?: AlertComparison;
  threshold?: number | null;
  window_seconds?: number | null;
  severity?: AlertSeverity;
  is_enabled?: boolean;
  cooldown_seconds?: number;
};

/**
 * Fields absent from the object are left unchanged. `null` clears a nullable column,
 * so `device_id: null` widens a rule to every active device.
 */
export type UpdateAlertRuleInput = {
  name?: string;
  alert_type?: AlertType;
  device_id?: string | null;
  metric?: string;
  comparison?: AlertComparison;
  threshold?: number | null;
  window_seconds?: number | null;
  severity?: AlertSeverity;
  is_enabled?: boolean;
  cooldown_seconds?: number;
};

export type ListAlertEventsInput = {
  device_id?: string | null;
  alert_id?: string | null;
  limit?: number | null;
};

export type InsertTriggeredAlertEventInput = {
  user_id: string;
  alert_id: string;
  device_id: string;
  ts: Date;
  message: string;
  metric_value: number | null;
};
