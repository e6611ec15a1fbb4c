import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { readBearerToken, signAccessToken, verifyAccessToken } from "./access_token";

const ORIGINAL_SECRET = process.env.JWT_SECRET;
const ORIGINAL_EXPIRES = process.env.JWT_ACCESS_TOKEN_EXPIRES_MINUTES;
const MUTABLE_ENV = process.env as Record<string, string | undefined>;

const setEnv = (key: string, value: string | undefined): void => {
  if (value === undefined) {
    delete MUTABLE_ENV[key];
    return;
  }

  MUTABLE_ENV[key] = value;
};

describe("access tokens", () => {
  beforeEach(() => {
    setEnv("JWT_SECRET", "test-secret");
    setEnv("JWT_ACCESS_TOKEN_EXPIRES_MINUTES", undefined);
  });

  afterEach(() => {
    setEnv("JWT_SECRET", ORIGINAL_SECRET);
    setEnv("JWT_ACCESS_TOKEN_EXPIRES_MINUTES", ORIGINAL_EXPIRES);
  });

  it("round-trips the subject", async () => {
    const token = await signAccessToken("user-1");

    await expect(verifyAccessToken(token)).resolves.toEqual({ sub: "user-1" });
  });

  it("rejects an expired token", async () => {
    const token = await signAccessToken("user-1", new Date("2020-01-01T00:00:00.000Z"));

    await expect(verifyAccessToken(token)).rejects.toMatchObject({
      code: "unauthorized",
      status: 401,
      detail: "Token expired"
    });
  });

  it("rejects a token signed with another secret", async () => {
    setEnv("JWT_SECRET", "other-secret");
    const token = await signAccessToken("user-1");
    setEnv("JWT_SECRET", "test-secret");

    await expect(verifyAccessToken(token)).rejects.toMatchObject({
      code: "unauthorized",
      detail: "Invalid token"
    });
  });

  it("rejects malformed tokens", async () => {
    await expect(verifyAccessToken("not-a-jwt")).rejects.toMatchObject({
      code: "unauthorized",
      detail: "Invalid token"
    });
  });

  it("reports a missing secret as a configuration error", async () => {
    setEnv("JWT_SECRET", undefined);

    await expect(signAccessToken("user-1")).rejects.toMatchObject({
      code: "configuration_error",
      status: 500
    });
  });
});

describe("readBearerToken", () => {
  it("extracts the token from the authorization header", () => {
    const request = new Request("https://example.com/api/alerts", {
      headers: { authorization: "Bearer abc.def.ghi" }
    });

    expect(readBearerToken(request)).toBe("abc.def.ghi");
  });

  it("returns null for other schemes or a missing header", () => {
    expect(readBearerToken(new Request("https://example.com/api/alerts"))).toBeNull();
    expect(
      readBearerToken(
        new Request("https://example.com/api/alerts", {
          headers: { authorization: "Basic dXNlcjpwYXNz" }
        })
      )
    ).toBeNull();
  });
});
