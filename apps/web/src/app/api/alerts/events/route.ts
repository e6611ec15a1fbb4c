import { NextResponse } from "next/server";

import {
  DEFAULT_EVENTS_LIMIT,
  MAX_EVENTS_LIMIT,
  listAlertEvents
} from "@/lib/alerts/events_repo";
import { requireCurrentUser } from "@/lib/auth/current_user";
import {
  errorResponse,
  parseBoundedInteger,
  parseUuidFilter
} from "@/lib/http/route_helpers";

export const GET = async (request: Request): Promise<Response> => {
  try {
    const user = await requireCurrentUser(request);
    const searchParams = new URL(request.url).searchParams;
    const events = await listAlertEvents(user.id, {
      device_id: parseUuidFilter(searchParams, "device_id"),
      alert_id: parseUuidFilter(searchParams, "alert_id"),
      limit: parseBoundedInteger(searchParams, "limit", {
        fallback: DEFAULT_EVENTS_LIMIT,
        min: 1,
        max: MAX_EVENTS_LIMIT
      })
    });

    return NextResponse.json(events);
  } catch (error) {
    return errorResponse(request, error);
  }
};
