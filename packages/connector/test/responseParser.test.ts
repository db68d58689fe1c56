import { describe, expect, it } from "vitest";

import { parseObservationsPage } from "../src/api/responseParser";

describe("parseObservationsPage", () => {
  it("parses valid response payload", () => {
    const parsed = parseObservationsPage({
      observations: [{ observed_at: "2026-01-01T00:00:00Z", temperature_c: 4.5 }],
      next_page_token: "page-2",
      watermark: "2026-01-02T00:00:00Z"
    });

    expect(parsed.records).toEqual([
      { observed_at: "2026-01-01T00:00:00Z", temperature_c: 4.5 }
    ]);
    expect(parsed.continuationToken).toBe("page-2");
    expect(parsed.watermark).toBe("2026-01-02T00:00:00.000Z");
  });

  it("accepts data arrays with nested pagination", () => {
    const parsed = parseObservationsPage({
      data: [{ time: 1767225600 }],
      pagination: { nextPageToken: "next-nested" }
    });

    expect(parsed.records).toHaveLength(1);
    expect(parsed.continuationToken).toBe("next-nested");
    expect(parsed.watermark).toBeNull();
  });

  it("treats an empty token as the end of the window", () => {
    const parsed = parseObservationsPage({ observations: [], next_page_token: "" });

    expect(parsed.continuationToken).toBeNull();
  });

  it("keeps malformed records raw for the mapper", () => {
    const parsed = parseObservationsPage({ observations: ["oops", null] });

    expect(parsed.records).toEqual(["oops", null]);
  });

  it("reads complete_through as the watermark", () => {
    const parsed = parseObservationsPage({
      observations: [],
      complete_through: 1767225600000
    });

    expect(parsed.watermark).toBe("2026-01-01T00:00:00.000Z");
  });

  it("throws for invalid response shape", () => {
    expect(() => parseObservationsPage(null)).toThrow(
      "Invalid observations response: expected object"
    );
    expect(() => parseObservationsPage({ observations: {} })).toThrow(
      "observations must be an array"
    );
    expect(() => parseObservationsPage({ observations: [], next_page_token: 7 })).toThrow(
      "next_page_token must be string or null"
    );
    expect(() => parseObservationsPage({ observations: [], watermark: "soon" })).toThrow(
      'Invalid observations response: unparseable timestamp "soon" in watermark'
    );
  });
});
