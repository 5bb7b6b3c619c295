import { describe, expect, it } from "vitest";
import { diff } from "../src/differ.js";
import type { SeenEntry, SeenSet } from "../src/types.js";
import { listing } from "./helpers.js";

const now = new Date("2026-03-01T08:30:00.000Z");

function seenOf(...ids: string[]): SeenSet {
  return new Map<string, SeenEntry>(ids.map((id) => [id, { firstSeenAt: "2026-01-01T00:00:00.000Z" }]));
}

describe("diff", () => {
  it("reports everything as new against an empty set", () => {
    const a = listing({ id: "A" });

    const { newRecords, updatedSeenSet } = diff([a], seenOf(), now);

    expect(newRecords).toEqual([a]);
    expect([...updatedSeenSet.keys()]).toEqual(["A"]);
    expect(updatedSeenSet.get("A")).toEqual({ firstSeenAt: "2026-03-01T08:30:00.000Z" });
  });

  it("does not report an already-notified listing again", () => {
    const a = listing({ id: "A" });
    const b = listing({ id: "B" });

    const { newRecords, updatedSeenSet } = diff([a, b], seenOf("A"), now);

    expect(newRecords.map((r) => r.id)).toEqual(["B"]);
    expect([...updatedSeenSet.keys()]).toEqual(["A", "B"]);
    expect(updatedSeenSet.get("A")).toEqual({ firstSeenAt: "2026-01-01T00:00:00.000Z" });
  });

  it("keeps discovery order and reports a repeated id once", () => {
    const records = ["C", "A", "B", "A"].map((id) => listing({ id }));

    expect(diff(records, seenOf(), now).newRecords.map((r) => r.id)).toEqual(["C", "A", "B"]);
  });

  it("gives the same answer when run twice without persisting", () => {
    const records = ["A", "B", "C"].map((id) => listing({ id }));
    const seen = seenOf("B");

    expect(diff(records, seen, now).newRecords).toEqual(diff(records, seen, now).newRecords);
  });

  it("never removes entries and leaves the input set untouched", () => {
    const seen = seenOf("X", "Y");

    const { updatedSeenSet } = diff([listing({ id: "Z" })], seen, now);

    expect([...seen.keys()]).toEqual(["X", "Y"]);
    for (const id of seen.keys()) expect(updatedSeenSet.has(id)).toBe(true);
    expect(updatedSeenSet.size).toBe(3);
  });

  it("returns the seen set unchanged for an empty input", () => {
    const { newRecords, updatedSeenSet } = diff([], seenOf("A"), now);

    expect(newRecords).toEqual([]);
    expect([...updatedSeenSet.keys()]).toEqual(["A"]);
  });
});
