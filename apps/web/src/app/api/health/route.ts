import { NextResponse } from "next/server";

import { hasDatabaseUrl } from "@/lib/db/pool";
import { env } from "@/lib/env";
import { normalizeString } from "@/lib/utils/strings";

export const GET = async (): Promise<Response> => {
  const commitSha = normalizeString(env.COMMIT_SHA);
  const payload: Record<string, string | boolean> = {
    message: "Healthy",
    server_time: new Date().toISOString(),
    database_configured: hasDatabaseUrl()
  };

  if (commitSha) {
    payload.commit_sha = commitSha;
  }

  return NextResponse.json(payload);
};
