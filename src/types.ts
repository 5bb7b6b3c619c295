/** Sale status as advertised on the card. Ready = resale / secondary market. */
export type SaleStatus = "Ready" | "OffPlan" | "Unknown";

/** Single listing as scraped from the search results (one property card). */
export interface ListingRecord {
  /** Dedup key; stable across fetches of the same listing. */
  id: string;
  title: string;
  /** AED, integer. */
  price: number;
  sizeSqft: number;
  /** Studio = 0; null when the card shows no bedroom count. */
  bedrooms: number | null;
  saleStatus: SaleStatus;
  url: string;
  scrapedAt: Date;
  bathrooms: number | null;
  /** Address line from the card, e.g. "Creek Gate, Dubai Creek Harbour, Dubai". */
  location: string | null;
  building: string | null;
  imageUrl: string | null;
  /** Price and size text exactly as shown on the card. */
  priceDisplay: string;
  sizeDisplay: string;
}

/** Search filter. Loaded once per run and never mutated. */
export interface FilterCriteria {
  location: string;
  bedrooms: number;
  maxPrice: number;
  minSizeSqft: number;
  saleStatus: "Ready";
}

/** What the Fetcher needs to build result page URLs. */
export interface SearchQuery {
  baseUrl: string;
  criteria: FilterCriteria;
}

export interface SeenEntry {
  /** ISO timestamp of the run that first notified this id. Diagnostic only. */
  firstSeenAt: string | null;
}

/** Ids already notified, keyed by listing id. Treated as an immutable value. */
export type SeenSet = ReadonlyMap<string, SeenEntry>;

export type DeliveryOutcome =
  | { kind: "sent"; listingId: string | null; attempts: number }
  | { kind: "skipped"; listingId: string | null; attempts: number; error: string };

export type RunStage =
  | "Idle"
  | "Fetching"
  | "Extracting"
  | "Filtering"
  | "Diffing"
  | "Notifying"
  | "Persisting";

export type RunState = RunStage | "Done" | "Failed";
