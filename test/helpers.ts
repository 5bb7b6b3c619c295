import type { BrowserHandle, BrowserLauncher, PageSession } from "../src/browser.js";
import type { FilterCriteria, ListingRecord } from "../src/types.js";

export const BASE_URL = "https://www.propertyfinder.ae/en/search";

export const criteria: FilterCriteria = {
  location: "Creek Harbour",
  bedrooms: 1,
  maxPrice: 1_800_000,
  minSizeSqft: 740,
  saleStatus: "Ready",
};

export interface CardSpec {
  listingId?: string;
  href: string;
  title: string;
  price: string;
  area: string;
  beds?: string;
  baths?: string;
  location?: string;
  status?: string;
  image?: string;
}

export function cardHtml(c: CardSpec): string {
  const optional = (testid: string, value?: string) =>
    value == null ? "" : `<span data-testid="${testid}">${value}</span>`;
  return `
<article data-testid="property-card"${c.listingId ? ` data-listing-id="${c.listingId}"` : ""}>
  <a data-testid="property-card-link" href="${c.href}">${c.image ? `<img src="${c.image}" alt="">` : ""}</a>
  <h2 data-testid="property-card-title">${c.title}</h2>
  <div data-testid="property-card-price">${c.price}</div>
  <span data-testid="property-card-spec-area">${c.area}</span>
  ${optional("property-card-spec-bedroom", c.beds)}
  ${optional("property-card-spec-bathroom", c.baths)}
  ${optional("property-card-location", c.location)}
  ${optional("property-card-completion-status", c.status)}
</article>`;
}

export function pageHtml(cards: string[], extraBody = ""): string {
  return `<!DOCTYPE html><html><head><title>Search</title></head><body><div id="results">${cards.join("\n")}</div>${extraBody}</body></html>`;
}

export const EMPTY_PAGE = pageHtml([], '<div data-testid="no-results">No properties found</div>');

/** A card that passes the default criteria unless overridden. */
export function matchingCard(listingId: string, overrides: Partial<CardSpec> = {}): string {
  return cardHtml({
    listingId,
    href: `/en/plp/buy/apartment-for-sale-dubai-creek-harbour-${listingId.toLowerCase()}.html`,
    title: `1BR | Creek Gate | Dubai Creek Harbour`,
    price: "AED 1,700,000",
    area: "750 sqft",
    beds: "1",
    status: "Ready",
    ...overrides,
  });
}

export function listing(overrides: Partial<ListingRecord> = {}): ListingRecord {
  return {
    id: "A",
    title: "1BR in Creek Harbour",
    price: 1_700_000,
    sizeSqft: 750,
    bedrooms: 1,
    saleStatus: "Ready",
    url: "https://www.propertyfinder.ae/en/plp/buy/apartment-a.html",
    scrapedAt: new Date("2026-01-01T00:00:00.000Z"),
    bathrooms: 1,
    location: "Creek Gate, Dubai Creek Harbour, Dubai",
    building: null,
    imageUrl: null,
    priceDisplay: "",
    sizeDisplay: "",
    ...overrides,
  };
}

export interface FakeResponse {
  status?: number | null;
  html: string;
  /** Where the navigation ends up; defaults to the requested URL. */
  landedUrl?: string;
}

/** Either a response, an error to throw from goto(), or "hang" for a goto that never settles. */
export type FakePageEntry = FakeResponse | Error | "hang";

export interface FakeSession extends PageSession {
  visited: string[];
  wheels: number[];
  closed: boolean;
}

/** A page session serving entries keyed by the `page` query parameter (1 when absent). */
export function fakeSession(pages: Record<number, FakePageEntry>): FakeSession {
  let current: FakeResponse | null = null;
  let currentUrl = "about:blank";
  const session: FakeSession = {
    visited: [],
    wheels: [],
    closed: false,
    async goto(url) {
      session.visited.push(url);
      const n = Number(new URL(url).searchParams.get("page") ?? "1");
      const entry = pages[n] ?? { status: 200, html: EMPTY_PAGE };
      if (entry === "hang") return new Promise<never>(() => undefined);
      if (entry instanceof Error) throw entry;
      current = entry;
      currentUrl = entry.landedUrl ?? url;
      return { status: entry.status === undefined ? 200 : entry.status };
    },
    async wheel(deltaY) {
      session.wheels.push(deltaY);
    },
    async content() {
      return current?.html ?? "";
    },
    url() {
      return currentUrl;
    },
    async close() {
      session.closed = true;
    },
  };
  return session;
}

/** Hands out the given sessions in order, one per openSession() call. */
export function sessionQueue(...sessions: FakeSession[]): { open: () => Promise<PageSession>; opened: FakeSession[] } {
  const opened: FakeSession[] = [];
  return {
    opened,
    async open() {
      const next = sessions[opened.length];
      if (!next) throw new Error("no more fake sessions");
      opened.push(next);
      return next;
    },
  };
}

export interface FakeBrowser {
  launcher: BrowserLauncher;
  launched: number;
  closed: number;
}

export function fakeBrowser(open: () => Promise<PageSession>): FakeBrowser {
  const state: FakeBrowser = {
    launched: 0,
    closed: 0,
    launcher: async () => {
      state.launched++;
      const handle: BrowserHandle = {
        openSession: open,
        close: async () => {
          state.closed++;
        },
      };
      return handle;
    },
  };
  return state;
}
