import { getDbPool } from "@/lib/db/pool";
import { AppError } from "@/lib/errors";
import { isUuid } from "@/lib/http/route_helpers";

import { readBearerToken, verifyAccessToken } from "./access_token";

type TimestampValue = Date | string;

type AppUserRow = {
  id: string;
  email: string;
  full_name: string | null;
  is_active: boolean;
  created_at: TimestampValue;
};

export type CurrentUser = {
  id: string;
  email: string;
  full_name: string | null;
  is_active: boolean;
  created_at: string;
};

const toIsoString = (value: TimestampValue): string => {
  if (value instanceof Date) {
    return value.toISOString();
  }

  return value;
};

/**
 * Resolves the bearer token on the request to an active `app_users` row.
 * Every owner-scoped route calls this before touching owner data.
 */
export const requireCurrentUser = async (request: Request): Promise<CurrentUser> => {
  const token = readBearerToken(request);
  if (!token) {
    throw new AppError("unauthorized", 401, "Not authenticated");
  }

  const claims = await verifyAccessToken(token);
  if (!isUuid(claims.sub)) {
    throw new AppError("unauthorized", 401, "Invalid token subject");
  }

  const pool = getDbPool();
  const { rows } = await pool.query<AppUserRow>(
    `
      SELECT id, email, full_name, is_active, created_at
      FROM app_users
      WHERE id = $1
    `,
    [claims.sub]
  );

  const row = rows[0];
  if (!row) {
    throw new AppError("unauthorized", 401, "User not found");
  }

  if (!row.is_active) {
    throw new AppError("user_inactive", 403, "User is inactive");
  }

  return {
    id: row.id,
    email: row.email,
    full_name: row.full_name,
    is_active: row.is_active,
    created_at: toIsoString(row.created_at)
  };
};
