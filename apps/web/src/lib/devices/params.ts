import { isUuid, resolveParams, type RouteContext } from "@/lib/http/route_helpers";

import { assertDeviceOwned, deviceNotFound } from "./repo";

export type DeviceRouteContext = RouteContext<{ device_id: string }>;

export const resolveDeviceId = async (context: DeviceRouteContext): Promise<string> => {
  const { device_id: deviceId } = await resolveParams(context.params);
  if (!isUuid(deviceId)) {
    throw deviceNotFound();
  }

  return deviceId;
};

/**
 * Resolves the path device id and checks it belongs to the caller. Devices of other
 * owners are reported as missing.
 */
export const resolveOwnedDeviceId = async (
  context: DeviceRouteContext,
  ownerId: string
): Promise<string> => {
  const deviceId = await resolveDeviceId(context);
  await assertDeviceOwned(ownerId, deviceId);
  return deviceId;
};
