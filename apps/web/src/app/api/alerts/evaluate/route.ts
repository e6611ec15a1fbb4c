import { NextResponse } from "next/server";

import { runAlertEvaluation } from "@/lib/alerts/engine";
import { requireCurrentUser } from "@/lib/auth/current_user";
import { errorResponse } from "@/lib/http/route_helpers";
import { parseBoolean } from "@/lib/utils/strings";

export const POST = async (request: Request): Promise<Response> => {
  try {
    const user = await requireCurrentUser(request);
    const dryRun = parseBoolean(new URL(request.url).searchParams.get("dry_run")) ?? false;
    const result = await runAlertEvaluation({ owner_id: user.id, dry_run: dryRun });

    return NextResponse.json({
      message: `Evaluated alerts. Triggered ${result.triggered_count} events.`,
      result
    });
  } catch (error) {
    return errorResponse(request, error);
  }
};
