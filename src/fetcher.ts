import type { PageSession } from "./browser.js";
import {
  AbortedError,
  FetchBlockedError,
  FetchNetworkError,
  FetchTimeoutError,
  ListingWatchError,
  errorMessage,
  isTransientFetchError,
} from "./errors.js";
import { classifyPage, type PageShape } from "./extractor.js";
import type { DelayPolicy } from "./humanDelay.js";
import type { SearchQuery } from "./types.js";

/** Block markers that only appear on challenge pages. */
const CHALLENGE_MARKERS = [
  /id=["']px-captcha["']/i,
  /captcha-delivery\.com/i,
  /cf-chl-/i,
  /Attention Required! \| Cloudflare/i,
  /Pardon Our Interruption/i,
];

/**
 * Phrases that also appear in ordinary pages (footers, scripts); a block only on a page
 * with neither listings nor the site's empty-results marker.
 */
const SOFT_BLOCK_MARKERS = [
  /captcha/i,
  /access denied/i,
  /verify (?:that )?you(?: are|'re) (?:a )?human/i,
  /are you a robot/i,
  /too many requests/i,
  /unusual traffic/i,
  /just a moment\.\.\./i,
];

export interface FetcherOptions {
  delays: DelayPolicy;
  /** Upper bound for one fetch() call, the retry and its backoff included. */
  stageTimeoutMs: number;
  /** Card count and empty-results check for the stop and block decisions. */
  classifyPage?: (html: string) => PageShape;
}

export interface FetchOptions {
  signal?: AbortSignal;
}

/** Result page URL. Page 1 carries no page parameter. */
export function buildSearchUrl(query: SearchQuery, page: number): string {
  const { criteria } = query;
  const url = new URL(query.baseUrl);
  url.searchParams.set("c", "1");
  url.searchParams.set("t", "1");
  url.searchParams.set("beds_in", String(criteria.bedrooms));
  url.searchParams.set("fu", "0");
  url.searchParams.set("ob", "mr");
  url.searchParams.set("pf", String(criteria.minSizeSqft));
  url.searchParams.set("pr", String(criteria.maxPrice));
  url.searchParams.set("q", `"${criteria.location}"`);
  url.searchParams.set("rp", "y");
  if (page > 1) url.searchParams.set("page", String(page));
  return url.toString();
}

/** Reason string when the response looks like a block, else null. */
export function detectBlockSignal(input: {
  status: number | null;
  html: string;
  landedUrl: string;
  targetHost: string;
  listingCount: number;
  emptyResults: boolean;
}): string | null {
  if (input.status === 403 || input.status === 429) return `HTTP ${input.status}`;
  let landedHost: string;
  try {
    landedHost = new URL(input.landedUrl).host;
  } catch {
    return `navigation ended on an unparseable URL "${input.landedUrl}"`;
  }
  if (landedHost !== input.targetHost) return `redirected off-site to ${landedHost}`;
  const challenge = CHALLENGE_MARKERS.find((re) => re.test(input.html));
  if (challenge) return `challenge page (${challenge.source})`;
  if (input.listingCount === 0 && !input.emptyResults) {
    const soft = SOFT_BLOCK_MARKERS.find((re) => re.test(input.html));
    if (soft) return `block page (${soft.source})`;
  }
  return null;
}

function throwIfAborted(signal: AbortSignal): void {
  if (!signal.aborted) return;
  throw signal.reason instanceof ListingWatchError ? signal.reason : new AbortedError();
}

/**
 * Retrieves rendered result pages with human-like pacing. Blocks fail the call
 * immediately; a timeout or network failure is retried once after a long backoff.
 */
export class Fetcher {
  private readonly classifyPage: (html: string) => PageShape;

  constructor(
    private readonly openSession: () => Promise<PageSession>,
    private readonly options: FetcherOptions
  ) {
    this.classifyPage = options.classifyPage ?? classifyPage;
  }

  /** Raw HTML of pages 1..pageLimit, stopping at the first page without listings. */
  fetch(query: SearchQuery, pageLimit: number, fetchOptions: FetchOptions = {}): Promise<string[]> {
    const { stageTimeoutMs } = this.options;
    const controller = new AbortController();
    const outer = fetchOptions.signal;

    return new Promise<string[]>((resolve, reject) => {
      const timer = setTimeout(() => {
        const err = new FetchTimeoutError(`Fetch stage exceeded ${stageTimeoutMs} ms`);
        controller.abort(err);
        reject(err);
      }, stageTimeoutMs);
      const onOuterAbort = () => {
        const err = new AbortedError();
        controller.abort(err);
        reject(err);
      };
      if (outer?.aborted) onOuterAbort();
      else outer?.addEventListener("abort", onOuterAbort, { once: true });

      void this.fetchWithRetry(query, pageLimit, controller.signal)
        .then(resolve, reject)
        .finally(() => {
          clearTimeout(timer);
          outer?.removeEventListener("abort", onOuterAbort);
        });
    });
  }

  private async fetchWithRetry(query: SearchQuery, pageLimit: number, signal: AbortSignal): Promise<string[]> {
    try {
      return await this.fetchOnce(query, pageLimit, signal);
    } catch (e) {
      if (!isTransientFetchError(e) || signal.aborted) throw e;
      console.warn(`[fetch] ${e.message}; retrying once after backoff.`);
      await this.options.delays.beforeRetry(signal);
      throwIfAborted(signal);
      return this.fetchOnce(query, pageLimit, signal);
    }
  }

  private async fetchOnce(query: SearchQuery, pageLimit: number, signal: AbortSignal): Promise<string[]> {
    const { delays } = this.options;
    const targetHost = new URL(query.baseUrl).host;
    const session = await this.openSession();
    const pages: string[] = [];
    try {
      for (let n = 1; n <= pageLimit; n++) {
        await delays.beforePageLoad(signal);
        throwIfAborted(signal);

        const url = buildSearchUrl(query, n);
        console.log(`[fetch] Loading page ${n}/${pageLimit}: ${url}`);
        const { status } = await this.navigate(session, url);
        throwIfAborted(signal);

        for (const deltaY of delays.scrollSteps()) {
          await session.wheel(deltaY);
          await delays.betweenScrolls(signal);
          throwIfAborted(signal);
        }

        const html = await session.content();
        const { listingCount, emptyResults } = this.classifyPage(html);
        const blocked = detectBlockSignal({
          status,
          html,
          landedUrl: session.url(),
          targetHost,
          listingCount,
          emptyResults,
        });
        if (blocked) throw new FetchBlockedError(`Blocked on page ${n}: ${blocked}`);
        if (status != null && status >= 500) throw new FetchNetworkError(`HTTP ${status} on page ${n}`);

        if (listingCount === 0 && n > 1) {
          console.log(`[fetch] Page ${n} has no listings; stopping.`);
          break;
        }
        pages.push(html);
        console.log(`[fetch] Page ${n}: ${listingCount} listing card(s).`);
        if (listingCount === 0) break;
      }
      return pages;
    } finally {
      await session.close().catch((e: unknown) => console.warn(`[fetch] Could not close page: ${errorMessage(e)}`));
    }
  }

  private async navigate(session: PageSession, url: string): Promise<{ status: number | null }> {
    try {
      return await session.goto(url);
    } catch (e) {
      if (e instanceof ListingWatchError) throw e;
      throw new FetchNetworkError(`Failed to load ${url}: ${errorMessage(e)}`, { cause: e });
    }
  }
}
