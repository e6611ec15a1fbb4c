import { NextResponse } from "next/server";
import type { ZodType, ZodTypeDef } from "zod";

import { AppError } from "@/lib/errors";
import { logger } from "@/lib/logger";
import { requestContext } from "@/lib/logger_context";
import { normalizeString, parseIntegerParam } from "@/lib/utils/strings";

const UUID_RE = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;
const EVENT_ID_RE = /^[1-9]\d{0,18}$/;

export type RouteContext<TParams extends Record<string, string>> = {
  params: Promise<TParams> | TParams;
};

export type TimeRange = {
  start: Date;
  end: Date;
};

export const resolveParams = async <TParams extends Record<string, string>>(
  params: RouteContext<TParams>["params"]
): Promise<TParams> => {
  return Promise.resolve(params);
};

export const isUuid = (value: string): boolean => UUID_RE.test(value);

const MAX_BIGINT = 9223372036854775807n;

export const isEventId = (value: string): boolean =>
  EVENT_ID_RE.test(value) && BigInt(value) <= MAX_BIGINT;

/**
 * Reads an optional UUID filter from the query string.
 */
export const parseUuidFilter = (searchParams: URLSearchParams, name: string): string | null => {
  const value = normalizeString(searchParams.get(name));
  if (value === null) {
    return null;
  }

  if (!isUuid(value)) {
    throw new AppError("invalid_payload", 400, `${name} must be a UUID.`);
  }

  return value;
};

export const errorResponse = (request: Request, error: unknown): Response => {
  if (error instanceof AppError) {
    if (error.status >= 500) {
      logger.error({ ...requestContext(request), code: error.code, error }, "request failed");
    }

    return NextResponse.json(
      { error: error.code, detail: error.detail },
      { status: error.status }
    );
  }

  logger.error({ ...requestContext(request), error }, "unhandled route error");
  return NextResponse.json({ error: "internal_error", detail: null }, { status: 500 });
};

export const readJsonBody = async <TOutput>(
  request: Request,
  schema: ZodType<TOutput, ZodTypeDef, unknown>
): Promise<TOutput> => {
  let body: unknown;
  try {
    body = await request.json();
  } catch {
    throw new AppError("invalid_payload", 400, "Request body must be valid JSON.");
  }

  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const path = issue?.path.join(".") ?? "";
    const message = issue?.message ?? "Invalid payload.";
    throw new AppError("invalid_payload", 400, path ? `${path}: ${message}` : message);
  }

  return parsed.data;
};

const parseTimestampParam = (searchParams: URLSearchParams, name: string): Date => {
  const raw = normalizeString(searchParams.get(name));
  if (!raw) {
    throw new AppError("invalid_payload", 400, `${name} is required.`);
  }

  const parsed = new Date(raw);
  if (Number.isNaN(parsed.getTime())) {
    throw new AppError("invalid_payload", 400, `${name} must be an ISO-8601 timestamp.`);
  }

  return parsed;
};

export const parseTimeRange = (searchParams: URLSearchParams): TimeRange => {
  const start = parseTimestampParam(searchParams, "start");
  const end = parseTimestampParam(searchParams, "end");
  if (end.getTime() < start.getTime()) {
    throw new AppError("invalid_range", 400, "end must be >= start");
  }

  return { start, end };
};

export const parseBoundedInteger = (
  searchParams: URLSearchParams,
  name: string,
  options: { fallback: number; min: number; max: number }
): number => {
  const parsed = parseIntegerParam(searchParams.get(name));
  if (parsed === null) {
    return options.fallback;
  }

  if (parsed === undefined || parsed < options.min || parsed > options.max) {
    throw new AppError(
      "invalid_payload",
      400,
      `${name} must be an integer between ${options.min} and ${options.max}.`
    );
  }

  return parsed;
};
