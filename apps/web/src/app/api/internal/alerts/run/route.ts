import { NextResponse } from "next/server";

import { runAlertEvaluation, type RunAlertEvaluationResult } from "@/lib/alerts/engine";
import { listOwnersWithEnabledRules } from "@/lib/alerts/repo";
import { env } from "@/lib/env";
import { errorResponse, isUuid } from "@/lib/http/route_helpers";
import { logger } from "@/lib/logger";
import { normalizeString, parseBoolean } from "@/lib/utils/strings";

const isAuthorizedRunner = (request: Request): boolean => {
  const expectedSecret = normalizeString(env.ALERTS_RUNNER_SECRET);
  const providedSecret = normalizeString(request.headers.get("x-alerts-runner-secret"));

  if (!expectedSecret || !providedSecret) {
    return false;
  }

  return providedSecret === expectedSecret;
};

/**
 * Scheduler entry point. Runs one pass per owner, sequentially, for a single
 * `owner_id` or for every owner with at least one enabled rule.
 */
export const POST = async (request: Request): Promise<Response> => {
  if (!isAuthorizedRunner(request)) {
    return NextResponse.json(
      { error: "unauthorized", detail: "Invalid runner secret." },
      { status: 401 }
    );
  }

  const searchParams = new URL(request.url).searchParams;
  const ownerId = normalizeString(searchParams.get("owner_id"));
  const dryRun = parseBoolean(searchParams.get("dry_run")) ?? false;

  if (ownerId && !isUuid(ownerId)) {
    return NextResponse.json(
      { error: "invalid_payload", detail: "owner_id must be a UUID." },
      { status: 400 }
    );
  }

  try {
    const ownerIds = ownerId ? [ownerId] : await listOwnersWithEnabledRules();
    const passes: RunAlertEvaluationResult[] = [];
    for (const owner of ownerIds) {
      passes.push(await runAlertEvaluation({ owner_id: owner, dry_run: dryRun }));
    }

    const triggeredCount = passes.reduce((total, pass) => total + pass.triggered_count, 0);
    logger.info(
      { owners: passes.length, triggered_count: triggeredCount, dry_run: dryRun },
      "alerts runner finished"
    );

    return NextResponse.json({
      owners: passes.length,
      triggered_count: triggeredCount,
      dry_run: dryRun,
      passes
    });
  } catch (error) {
    return errorResponse(request, error);
  }
};
