import { beforeEach, describe, expect, it, vi } from "vitest";

const mocks = vi.hoisted(() => ({
  requireCurrentUser: vi.fn(),
  listDevices: vi.fn(),
  createDevice: vi.fn()
}));

vi.mock("@/lib/auth/current_user", () => ({
  requireCurrentUser: (...args: unknown[]) => mocks.requireCurrentUser(...args)
}));

vi.mock("@/lib/devices/repo", () => ({
  listDevices: (...args: unknown[]) => mocks.listDevices(...args),
  createDevice: (...args: unknown[]) => mocks.createDevice(...args)
}));

import { AppError } from "@/lib/errors";

import { GET, POST } from "./route";

const OWNER_ID = "7f1e2d3c-4b5a-4968-8776-655443322110";

const postRequest = (body: unknown): Request =>
  new Request("https://example.com/api/devices", {
    method: "POST",
    headers: { "content-type": "application/json" },
    body: JSON.stringify(body)
  });

describe("/api/devices", () => {
  beforeEach(() => {
    vi.clearAllMocks();
    mocks.requireCurrentUser.mockResolvedValue({ id: OWNER_ID });
  });

  it("lists the caller's devices", async () => {
    mocks.listDevices.mockResolvedValue([{ id: "device-1", name: "Main meter" }]);

    const response = await GET(new Request("https://example.com/api/devices"));

    expect(response.status).toBe(200);
    expect(mocks.listDevices).toHaveBeenCalledWith(OWNER_ID);
    await expect(response.json()).resolves.toEqual([{ id: "device-1", name: "Main meter" }]);
  });

  it("creates a device with the default timezone", async () => {
    mocks.createDevice.mockResolvedValue({ id: "device-1", name: "Main meter" });

    const response = await POST(postRequest({ name: "Main meter", location: "Garage" }));

    expect(response.status).toBe(201);
    expect(mocks.createDevice).toHaveBeenCalledWith(OWNER_ID, {
      name: "Main meter",
      location: "Garage",
      timezone: "UTC"
    });
  });

  it("rejects a blank name", async () => {
    const response = await POST(postRequest({ name: "   " }));

    expect(response.status).toBe(400);
    expect(mocks.createDevice).not.toHaveBeenCalled();
  });

  it("rejects a body that is not JSON", async () => {
    const response = await POST(
      new Request("https://example.com/api/devices", { method: "POST", body: "{" })
    );

    expect(response.status).toBe(400);
    await expect(response.json()).resolves.toEqual({
      error: "invalid_payload",
      detail: "Request body must be valid JSON."
    });
  });

  it("returns 409 for duplicate names", async () => {
    mocks.createDevice.mockRejectedValue(
      new AppError("device_name_exists", 409, "Device name already exists")
    );

    const response = await POST(postRequest({ name: "Main meter" }));

    expect(response.status).toBe(409);
    await expect(response.json()).resolves.toEqual({
      error: "device_name_exists",
      detail: "Device name already exists"
    });
  });
});
