import { describe, expect, it } from "vitest";
import { filterListings, matches } from "../src/filter.js";
import type { SaleStatus } from "../src/types.js";
import { criteria, listing } from "./helpers.js";

describe("matches", () => {
  it("accepts a listing meeting every criterion", () => {
    expect(matches(listing(), criteria)).toBe(true);
  });

  it("accepts the boundary values", () => {
    expect(matches(listing({ price: 1_800_000, sizeSqft: 740 }), criteria)).toBe(true);
  });

  it("rejects a price above the ceiling even if otherwise matching", () => {
    expect(matches(listing({ price: 1_900_000 }), criteria)).toBe(false);
  });

  it("rejects a size below the floor", () => {
    expect(matches(listing({ sizeSqft: 739.99 }), criteria)).toBe(false);
  });

  it("requires the exact bedroom count", () => {
    expect(matches(listing({ bedrooms: 2 }), criteria)).toBe(false);
    expect(matches(listing({ bedrooms: 0 }), criteria)).toBe(false);
    expect(matches(listing({ bedrooms: null }), criteria)).toBe(false);
  });

  it("fails closed on Unknown and OffPlan status", () => {
    expect(matches(listing({ saleStatus: "Unknown" }), criteria)).toBe(false);
    expect(matches(listing({ saleStatus: "OffPlan" }), criteria)).toBe(false);
  });

  it("matches the location case-insensitively in the title or the location line", () => {
    expect(matches(listing({ title: "1BR CREEK HARBOUR view", location: null }), criteria)).toBe(true);
    expect(matches(listing({ title: "1BR sea view", location: "Dubai Creek Harbour, Dubai" }), criteria)).toBe(true);
    expect(matches(listing({ title: "1BR sea view", location: "Dubai Marina, Dubai" }), criteria)).toBe(false);
  });

  it("rejects non-finite numbers", () => {
    expect(matches(listing({ price: Number.NaN }), criteria)).toBe(false);
    expect(matches(listing({ sizeSqft: Number.POSITIVE_INFINITY }), criteria)).toBe(false);
    expect(matches(listing({ sizeSqft: Number.NaN }), criteria)).toBe(false);
  });
});

describe("filterListings", () => {
  it("keeps only listings for which matches() holds, in order", () => {
    const statuses: SaleStatus[] = ["Ready", "OffPlan", "Unknown"];
    const records = statuses.flatMap((saleStatus, i) =>
      [1_700_000, 1_900_000].flatMap((price, j) =>
        [1, 2].map((bedrooms, k) => listing({ id: `${i}-${j}-${k}`, saleStatus, price, bedrooms }))
      )
    );

    const kept = filterListings(records, criteria);

    expect(kept.map((r) => r.id)).toEqual(["0-0-0"]);
    for (const r of records) {
      expect(kept.includes(r)).toBe(matches(r, criteria));
    }
  });
});
