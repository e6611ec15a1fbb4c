export type AppErrorCode =
  | "alert_not_found"
  | "device_not_found"
  | "event_not_found"
  | "alert_name_exists"
  | "device_name_exists"
  | "invalid_payload"
  | "invalid_range"
  | "threshold_required"
  | "store_unavailable"
  | "configuration_error"
  | "unauthorized"
  | "user_inactive"
  | "internal_error";

export class AppError extends Error {
  code: AppErrorCode;
  status: number;
  detail: string | null;

  constructor(code: AppErrorCode, status: number, detail?: string | null) {
    super(detail ?? code);
    this.name = "AppError";
    this.code = code;
    this.status = status;
    this.detail = detail ?? null;
  }
}

type PgError = {
  code?: string;
};

export const isUniqueViolation = (error: unknown): boolean => {
  return Boolean(error && typeof error === "object" && (error as PgError).code === "23505");
};

/**
 * Leaves application errors untouched and reports everything else as an
 * unavailable store, so a failed evaluation pass can be retried as a whole.
 */
export const toStoreError = (error: unknown): AppError => {
  if (error instanceof AppError) {
    return error;
  }

  const detail = error instanceof Error ? error.message : String(error);
  return new AppError("store_unavailable", 503, detail);
};
