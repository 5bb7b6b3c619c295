import type { FilterCriteria, ListingRecord } from "./types.js";

/**
 * Whether a listing satisfies every criterion. Pure and total.
 * Unknown sale status and a missing bedroom count never match.
 */
export function matches(record: ListingRecord, criteria: FilterCriteria): boolean {
  if (record.bedrooms == null || record.bedrooms !== criteria.bedrooms) return false;
  if (!Number.isFinite(record.price) || record.price > criteria.maxPrice) return false;
  if (!Number.isFinite(record.sizeSqft) || record.sizeSqft < criteria.minSizeSqft) return false;
  if (record.saleStatus !== criteria.saleStatus) return false;
  const needle = criteria.location.trim().toLowerCase();
  const haystacks = [record.title, record.location ?? ""].map((s) => s.toLowerCase());
  return haystacks.some((h) => h.includes(needle));
}

export function filterListings(records: readonly ListingRecord[], criteria: FilterCriteria): ListingRecord[] {
  return records.filter((r) => matches(r, criteria));
}
