import { NextResponse } from "next/server";

import { createAlertRule, listAlertRules } from "@/lib/alerts/repo";
import { createAlertRuleSchema } from "@/lib/alerts/schemas";
import { requireCurrentUser } from "@/lib/auth/current_user";
import { errorResponse, readJsonBody } from "@/lib/http/route_helpers";

export const GET = async (request: Request): Promise<Response> => {
  try {
    const user = await requireCurrentUser(request);
    const rules = await listAlertRules(user.id);
    return NextResponse.json(rules);
  } catch (error) {
    return errorResponse(request, error);
  }
};

export const POST = async (request: Request): Promise<Response> => {
  try {
    const user = await requireCurrentUser(request);
    const payload = await readJsonBody(request, createAlertRuleSchema);
    const rule = await createAlertRule(user.id, payload);
    return NextResponse.json(rule, { status: 201 });
  } catch (error) {
    return errorResponse(request, error);
  }
};
