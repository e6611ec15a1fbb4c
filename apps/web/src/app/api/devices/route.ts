import { NextResponse } from "next/server";

import { requireCurrentUser } from "@/lib/auth/current_user";
import { createDevice, listDevices } from "@/lib/devices/repo";
import { createDeviceSchema } from "@/lib/devices/schemas";
import { errorResponse, readJsonBody } from "@/lib/http/route_helpers";

export const GET = async (request: Request): Promise<Response> => {
  try {
    const user = await requireCurrentUser(request);
    return NextResponse.json(await listDevices(user.id));
  } catch (error) {
    return errorResponse(request, error);
  }
};

export const POST = async (request: Request): Promise<Response> => {
  try {
    const user = await requireCurrentUser(request);
    const input = await readJsonBody(request, createDeviceSchema);
    const device = await createDevice(user.id, input);
    return NextResponse.json(device, { status: 201 });
  } catch (error) {
    return errorResponse(request, error);
  }
};
