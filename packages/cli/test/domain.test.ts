import { describe, expect, it } from "vitest";
import { getBaseDomain, normalizeApiUrl } from "../src/domain.js";

describe("getBaseDomain", () => {
  it("strips the api. label from a full API URL", () => {
    expect(getBaseDomain("http://api.example.com")).toBe("example.com");
    expect(getBaseDomain("https://api.sys.example.com/")).toBe("sys.example.com");
  });

  it("strips the api. label from a bare host", () => {
    expect(getBaseDomain("api.example.com")).toBe("example.com");
  });

  it("keeps a host without a leading api. label", () => {
    expect(getBaseDomain("example.com")).toBe("example.com");
    expect(getBaseDomain("https://cf.example.com")).toBe("cf.example.com");
  });

  it("only strips a leading label", () => {
    expect(getBaseDomain("https://myapi.example.com")).toBe("myapi.example.com");
  });
});

describe("normalizeApiUrl", () => {
  it("keeps URLs with a scheme and drops trailing slashes", () => {
    expect(normalizeApiUrl("http://api.example.com/")).toBe("http://api.example.com");
  });

  it("adds https to an api. host", () => {
    expect(normalizeApiUrl("api.example.com")).toBe("https://api.example.com");
  });

  it("expands a bare base domain", () => {
    expect(normalizeApiUrl(" example.com ")).toBe("https://api.example.com");
  });

  it("leaves an empty value empty", () => {
    expect(normalizeApiUrl("")).toBe("");
  });
});
