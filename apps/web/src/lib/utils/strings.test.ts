import { describe, expect, it } from "vitest";

import { normalizeString, parseBoolean, parseIntegerParam } from "./strings";

describe("normalizeString", () => {
  it("returns null for non-string types", () => {
    expect(normalizeString(null)).toBeNull();
    expect(normalizeString(undefined)).toBeNull();
    expect(normalizeString(42)).toBeNull();
    expect(normalizeString({})).toBeNull();
  });

  it("returns null for whitespace-only string", () => {
    expect(normalizeString("")).toBeNull();
    expect(normalizeString(" \t\n")).toBeNull();
  });

  it("trims and returns valid strings", () => {
    expect(normalizeString("  device-1  ")).toBe("device-1");
  });
});

describe("parseBoolean", () => {
  it("recognises truthy and falsy spellings", () => {
    expect(parseBoolean("true")).toBe(true);
    expect(parseBoolean(" YES ")).toBe(true);
    expect(parseBoolean("1")).toBe(true);
    expect(parseBoolean("off")).toBe(false);
    expect(parseBoolean("0")).toBe(false);
  });

  it("returns undefined for empty or unknown input", () => {
    expect(parseBoolean(null)).toBeUndefined();
    expect(parseBoolean("")).toBeUndefined();
    expect(parseBoolean("maybe")).toBeUndefined();
  });
});

describe("parseIntegerParam", () => {
  it("returns null when the parameter is absent", () => {
    expect(parseIntegerParam(null)).toBeNull();
    expect(parseIntegerParam("  ")).toBeNull();
  });

  it("parses signed integers", () => {
    expect(parseIntegerParam("200")).toBe(200);
    expect(parseIntegerParam("-3")).toBe(-3);
  });

  it("returns undefined for non-integer input", () => {
    expect(parseIntegerParam("12.5")).toBeUndefined();
    expect(parseIntegerParam("ten")).toBeUndefined();
  });
});
