import { createHash } from "crypto";
import * as cheerio from "cheerio";
import type { CheerioAPI, Cheerio } from "cheerio";
import type { Element } from "domhandler";
import { ExtractionSchemaError } from "./errors.js";
import type { ListingRecord, SaleStatus } from "./types.js";

export const SITE_BASE_URL = "https://www.propertyfinder.ae";

/** Listing card shapes seen on the results page, newest layout first. */
export const CARD_SELECTORS = [
  'article[data-testid="property-card"]',
  '[data-testid="property-card"]',
  'li[data-testid="list-item"]',
  "div.property-card",
];

/** Markers of a legitimately empty result page (as opposed to an unknown layout). */
const EMPTY_RESULTS_SELECTORS = [
  '[data-testid="no-results"]',
  '[data-testid="search-no-results"]',
  ".no-results",
];
const EMPTY_RESULTS_TEXT = /no (?:properties|results|listings) (?:found|match)/i;

const TITLE_SELECTORS = ['[data-testid="property-card-title"]', '[data-testid="property-title"]', "h2", "h3"];
const PRICE_SELECTORS = ['[data-testid="property-card-price"]', '[data-testid="property-price"]', ".property-card__price"];
const AREA_SELECTORS = ['[data-testid="property-card-spec-area"]', '[data-testid="property-area"]', ".property-card__area"];
const BEDS_SELECTORS = ['[data-testid="property-card-spec-bedroom"]', '[data-testid="property-beds"]'];
const BATHS_SELECTORS = ['[data-testid="property-card-spec-bathroom"]', '[data-testid="property-baths"]'];
const LOCATION_SELECTORS = ['[data-testid="property-card-location"]', '[data-testid="property-location"]', "address"];
const STATUS_SELECTORS = [
  '[data-testid="property-card-completion-status"]',
  '[data-testid="property-completion-status"]',
  '[data-testid="property-status"]',
];
const LINK_SELECTORS = ['a[data-testid="property-card-link"]', 'a[href*="/plp/"]', "a[href]"];
const ID_ATTRIBUTES = ["data-listing-id", "data-property-id", "data-id"];

/** Buildings in Dubai Creek Harbour, matched case-insensitively against the title. */
export const KNOWN_BUILDINGS = [
  "17 Icon Bay",
  "Harbour Gate",
  "Dubai Creek Residences",
  "Creek Horizon",
  "The Cove",
  "Summer",
  "Creek Edge",
  "Palace Residences",
  "Creek Beach",
  "Grove",
  "Lotus",
  "Orchid",
  "Bayshore",
];

const SQM_TO_SQFT = 10.7639;

export interface ExtractOptions {
  /** Base for relative listing links. */
  baseUrl?: string;
  /** Clock for scrapedAt; injected so repeated extraction is deterministic. */
  now?: () => Date;
  buildings?: readonly string[];
}

function normalizeSpaces(s: string): string {
  return s.replace(/[\u00a0\u202f\u2009]/g, " ").replace(/\s+/g, " ").trim();
}

/** "AED 1,750,000", "1 750 000 AED", "1.75M" → integer; null when no positive amount is present. */
export function parsePrice(text: string): number | null {
  const m = normalizeSpaces(text).match(/(\d{1,3}(?:[, ]\d{3})+|\d+)(\.\d+)?\s*([km])?(?![a-z])/i);
  if (!m) return null;
  const whole = m[1].replace(/[, ]/g, "");
  let value = parseFloat(whole + (m[2] ?? ""));
  const suffix = m[3]?.toLowerCase();
  if (suffix === "k") value *= 1_000;
  if (suffix === "m") value *= 1_000_000;
  const rounded = Math.round(value);
  return Number.isFinite(rounded) && rounded > 0 ? rounded : null;
}

/** "750 sqft", "1,024 sq. ft.", "69.68 sqm" → square feet (2 decimals); null when no positive area is present. */
export function parseSizeSqft(text: string): number | null {
  const m = normalizeSpaces(text).match(
    /(\d{1,3}(?:[, ]\d{3})+|\d+)(\.\d+)?\s*(sq\.?\s*ft\.?|sqft|ft²|ft2|sq\.?\s*m\.?|sqm|m²|m2)?/i
  );
  if (!m) return null;
  let value = parseFloat(m[1].replace(/[, ]/g, "") + (m[2] ?? ""));
  const unit = (m[3] ?? "").toLowerCase().replace(/[\s.]/g, "");
  if (unit === "sqm" || unit === "m²" || unit === "m2") value *= SQM_TO_SQFT;
  const rounded = Math.round(value * 100) / 100;
  return Number.isFinite(rounded) && rounded > 0 ? rounded : null;
}

/** "1", "2 Beds", "Studio" → count; null when absent. */
export function parseBedrooms(text: string): number | null {
  const t = normalizeSpaces(text);
  if (/\bstudio\b/i.test(t)) return 0;
  const m = t.match(/(\d+)/);
  return m ? parseInt(m[1], 10) : null;
}

function bedroomsFromTitle(title: string): number | null {
  if (/\bstudio\b/i.test(title)) return 0;
  const m = title.match(/(\d+)\s*(?:br|bhk|beds?|bedrooms?)\b/i);
  return m ? parseInt(m[1], 10) : null;
}

export function parseSaleStatus(text: string): SaleStatus {
  const t = normalizeSpaces(text).toLowerCase();
  if (!t) return "Unknown";
  if (/off[\s-]?plan|under construction|completion\b|handover/.test(t)) return "OffPlan";
  if (/\bready\b|\bcompleted\b|secondary|resale/.test(t)) return "Ready";
  return "Unknown";
}

export function extractBuilding(title: string, buildings: readonly string[] = KNOWN_BUILDINGS): string | null {
  const lower = title.toLowerCase();
  const known = buildings.find((b) => lower.includes(b.toLowerCase()));
  if (known) return known;
  const words = normalizeSpaces(title).split(" ").filter(Boolean).slice(0, 3);
  return words.length > 0 ? words.join(" ") : null;
}

/** Absolute URL without query string, fragment or trailing slash; host lowercased. */
export function normalizeListingUrl(href: string, baseUrl: string = SITE_BASE_URL): string | null {
  try {
    const u = new URL(href, baseUrl);
    const path = u.pathname.replace(/\/+$/, "");
    return `${u.protocol}//${u.host}${path}`;
  } catch {
    return null;
  }
}

function shortHash(input: string): string {
  return createHash("sha1").update(input).digest("hex").slice(0, 16);
}

/**
 * Dedup key for a card, first available of:
 * 1. the card's own id attribute,
 * 2. the numeric id in the listing URL ("...-12345678.html"),
 * 3. "u:" + hash of the normalized URL,
 * 4. "h:" + hash of (title, price, size).
 */
export function deriveListingId(input: {
  attributeId?: string | null;
  url?: string | null;
  title: string;
  price: number;
  sizeSqft: number;
}): string {
  const attr = input.attributeId?.trim();
  if (attr) return attr;
  if (input.url) {
    const m = input.url.match(/-(\d+)\.html$/);
    if (m) return m[1];
    const normalized = normalizeListingUrl(input.url);
    if (normalized) return `u:${shortHash(normalized)}`;
  }
  const title = normalizeSpaces(input.title).toLowerCase();
  return `h:${shortHash(`${title}|${input.price}|${input.sizeSqft}`)}`;
}

function firstText(card: Cheerio<Element>, selectors: readonly string[]): string {
  for (const sel of selectors) {
    const text = normalizeSpaces(card.find(sel).first().text());
    if (text) return text;
  }
  return "";
}

function firstAttr(card: Cheerio<Element>, selectors: readonly string[], attr: string): string | null {
  for (const sel of selectors) {
    const value = card.find(sel).first().attr(attr)?.trim();
    if (value) return value;
  }
  return null;
}

function findCards($: CheerioAPI): Element[] {
  for (const sel of CARD_SELECTORS) {
    const cards = $<Element, string>(sel).toArray();
    if (cards.length > 0) return cards;
  }
  return [];
}

function hasEmptyResultsMarker($: CheerioAPI): boolean {
  if (EMPTY_RESULTS_SELECTORS.some((sel) => $(sel).length > 0)) return true;
  return EMPTY_RESULTS_TEXT.test($("body").text());
}

export interface PageShape {
  listingCount: number;
  /** The site's own "no results" marker is present. */
  emptyResults: boolean;
}

/** Card count and empty-results marker of a rendered page. Never throws; used by the fetcher's stop and block checks. */
export function classifyPage(html: string): PageShape {
  const $ = cheerio.load(html);
  return { listingCount: findCards($).length, emptyResults: hasEmptyResultsMarker($) };
}

type CardResult = { record: ListingRecord } | { dropped: string };

function parseCard(
  card: Cheerio<Element>,
  baseUrl: string,
  scrapedAt: Date,
  buildings: readonly string[]
): CardResult {
  const href = firstAttr(card, LINK_SELECTORS, "href");
  const url = href ? normalizeListingUrl(href, baseUrl) : null;
  if (!url) return { dropped: "no listing link" };

  const title = firstText(card, TITLE_SELECTORS) || (firstAttr(card, LINK_SELECTORS, "title") ?? "");

  const priceDisplay = firstText(card, PRICE_SELECTORS);
  const price = parsePrice(priceDisplay);
  if (price == null) return { dropped: `unparseable price "${priceDisplay}"` };

  const sizeDisplay = firstText(card, AREA_SELECTORS);
  const sizeSqft = parseSizeSqft(sizeDisplay);
  if (sizeSqft == null) return { dropped: `unparseable size "${sizeDisplay}"` };

  const bedsText = firstText(card, BEDS_SELECTORS);
  const bedrooms = (bedsText ? parseBedrooms(bedsText) : null) ?? bedroomsFromTitle(title);
  const bathsText = firstText(card, BATHS_SELECTORS);
  const bathrooms = bathsText ? parseBedrooms(bathsText) : null;

  const statusText = firstText(card, STATUS_SELECTORS) || (card.attr("data-completion-status") ?? "");
  const attributeId = ID_ATTRIBUTES.map((a) => card.attr(a)).find((v) => v != null && v.trim() !== "") ?? null;
  const img = card.find("img").first();
  const imageUrl = img.attr("src")?.trim() || img.attr("data-src")?.trim() || null;

  return {
    record: {
      id: deriveListingId({ attributeId, url, title, price, sizeSqft }),
      title: title || `Listing ${url}`,
      price,
      sizeSqft,
      bedrooms,
      saleStatus: parseSaleStatus(statusText),
      url,
      scrapedAt,
      bathrooms,
      location: firstText(card, LOCATION_SELECTORS) || null,
      building: extractBuilding(title, buildings),
      imageUrl,
      priceDisplay,
      sizeDisplay,
    },
  };
}

/**
 * Parse one rendered results page into listing records, in document order.
 * Cards with an unparseable price, size or link are dropped and logged.
 * Throws ExtractionSchemaError when the page has neither listing cards nor an empty-results marker.
 */
export function extractListings(html: string, options: ExtractOptions = {}): ListingRecord[] {
  const baseUrl = options.baseUrl ?? SITE_BASE_URL;
  const scrapedAt = (options.now ?? (() => new Date()))();
  const buildings = options.buildings ?? KNOWN_BUILDINGS;
  const $ = cheerio.load(html);

  const cards = findCards($);
  if (cards.length === 0) {
    if (hasEmptyResultsMarker($)) return [];
    throw new ExtractionSchemaError(
      `No listing cards found (tried ${CARD_SELECTORS.join(", ")}) and no empty-results marker; the page layout may have changed.`
    );
  }

  const records: ListingRecord[] = [];
  const seenIds = new Set<string>();
  cards.forEach((el, i) => {
    const result = parseCard($(el), baseUrl, scrapedAt, buildings);
    if ("dropped" in result) {
      console.warn(`[extract] Dropped card #${i + 1}: ${result.dropped}`);
      return;
    }
    if (seenIds.has(result.record.id)) return;
    seenIds.add(result.record.id);
    records.push(result.record);
  });
  return records;
}
