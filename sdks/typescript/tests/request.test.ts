import { describe, expect, it } from "vitest";
import { buildUrl, filterParams, formatQueryValue, toSearchParams } from "../src/request";

describe("buildUrl", () => {
  it("appends a relative path to a base ending in a slash", () => {
    expect(buildUrl("https://agsi.gie.eu/api/", "unavailability").toString()).toBe(
      "https://agsi.gie.eu/api/unavailability",
    );
  });

  it("uses the base unchanged without a path", () => {
    expect(buildUrl("https://agsi.gie.eu/api/").toString()).toBe("https://agsi.gie.eu/api/");
  });

  it("replaces the last segment of a base without a trailing slash", () => {
    expect(buildUrl("https://alsi.gie.eu/api", "news").toString()).toBe("https://alsi.gie.eu/news");
  });
});

describe("filterParams", () => {
  it("drops every falsy value", () => {
    expect(filterParams({ a: "x", b: "", c: 0, d: null, e: false, f: "y" })).toEqual({ a: "x", f: "y" });
  });

  it("drops undefined and NaN", () => {
    expect(filterParams({ page: Number.NaN, size: undefined, country: "DE" })).toEqual({ country: "DE" });
  });

  it("keeps dates, true and non-zero numbers", () => {
    const day = new Date(Date.UTC(2023, 0, 1));
    expect(filterParams({ from: day, reverse: true, page: -1 })).toEqual({ from: day, reverse: true, page: -1 });
  });

  it("returns an empty mapping without parameters", () => {
    expect(filterParams()).toEqual({});
  });
});

describe("query encoding", () => {
  it("formats each value kind", () => {
    expect(formatQueryValue(new Date(2023, 11, 31, 23, 30))).toBe("2023-12-31");
    expect(formatQueryValue(true)).toBe("true");
    expect(formatQueryValue(30)).toBe("30");
    expect(formatQueryValue("ABC Corp")).toBe("ABC Corp");
  });

  it("writes dates as the local calendar day", () => {
    expect(formatQueryValue(new Date(2023, 0, 1))).toBe("2023-01-01");
    expect(formatQueryValue(new Date(2024, 1, 29, 0, 15))).toBe("2024-02-29");
  });

  it("converts a filtered mapping to strings", () => {
    expect(toSearchParams({ page: 1, reverse: true, from: new Date(2023, 0, 1) })).toEqual({
      page: "1",
      reverse: "true",
      from: "2023-01-01",
    });
  });
});
