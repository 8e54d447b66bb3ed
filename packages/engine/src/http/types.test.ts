import { describe, expect, it } from "vitest";
import {
  formatMethod,
  formatVersion,
  getHeader,
  METHODS,
  parseMethod,
  parseVersion,
  pathResource,
  resourceEquals,
} from "./types.js";

describe("parseMethod", () => {
  it("recognizes every standard method", () => {
    for (const method of METHODS) {
      expect(parseMethod(method)).toBe(method);
    }
  });

  it("falls back for lowercase, unknown and empty tokens", () => {
    expect(parseMethod("get")).toBe("UNINITIALIZED");
    expect(parseMethod("PROPFIND")).toBe("UNINITIALIZED");
    expect(parseMethod("")).toBe("UNINITIALIZED");
  });
});

describe("parseVersion", () => {
  it("maps the two known literals", () => {
    expect(parseVersion("HTTP/1.1")).toBe("V1_1");
    expect(parseVersion("HTTP/2.0")).toBe("V2_0");
  });

  it("falls back for anything else", () => {
    expect(parseVersion("321dshaui")).toBe("UNINITIALIZED");
    expect(parseVersion("HTTP/1.0")).toBe("UNINITIALIZED");
    expect(parseVersion("HTTP/2")).toBe("UNINITIALIZED");
  });
});

describe("formatting", () => {
  it("formats methods as their wire token", () => {
    expect(formatMethod("PATCH")).toBe("PATCH");
    expect(formatMethod("UNINITIALIZED")).toBe("UNINITIALIZED");
  });

  it("formats versions back to the status-line token", () => {
    expect(formatVersion("V1_1")).toBe("HTTP/1.1");
    expect(formatVersion("V2_0")).toBe("HTTP/2.0");
    expect(formatVersion("UNINITIALIZED")).toBe("");
  });
});

describe("resourceEquals", () => {
  it("compares paths by value", () => {
    expect(resourceEquals(pathResource("/a"), pathResource("/a"))).toBe(true);
    expect(resourceEquals(pathResource("/a"), pathResource("/b"))).toBe(false);
  });
});

describe("getHeader", () => {
  it("looks up keys case-insensitively", () => {
    const headers = new Map([["Content-Length", "12"]]);
    expect(getHeader(headers, "content-length")).toBe("12");
    expect(getHeader(headers, "Host")).toBeUndefined();
  });

  it("prefers the later key when two differ only in case", () => {
    const headers = new Map([
      ["host", "first"],
      ["Host", "second"],
    ]);
    expect(getHeader(headers, "HOST")).toBe("second");
  });
});
