import { Pool } from "pg";

import { env } from "@/lib/env";
import { AppError } from "@/lib/errors";

let pool: Pool | null = null;

export const hasDatabaseUrl = (): boolean => Boolean(env.DATABASE_URL);

export const getDbPool = (): Pool => {
  const connectionString = env.DATABASE_URL;
  if (!connectionString) {
    throw new AppError(
      "configuration_error",
      500,
      "DATABASE_URL is required before using the database."
    );
  }

  if (!pool) {
    pool = new Pool({ connectionString });
  }

  return pool;
};
