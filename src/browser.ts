import puppeteer, { TimeoutError, type Browser, type Page } from "puppeteer-core";
import { FetchNetworkError, FetchTimeoutError, errorMessage } from "./errors.js";

/** What the Fetcher needs from a browser tab. */
export interface PageSession {
  /** Navigate and wait for the page to settle. Resolves with the HTTP status of the main document. */
  goto(url: string): Promise<{ status: number | null }>;
  /** Mouse-wheel scroll by deltaY pixels. */
  wheel(deltaY: number): Promise<void>;
  content(): Promise<string>;
  url(): string;
  close(): Promise<void>;
}

/** A browser scoped to one run. close() must be called on every exit path. */
export interface BrowserHandle {
  openSession(): Promise<PageSession>;
  close(): Promise<void>;
}

export type BrowserLauncher = () => Promise<BrowserHandle>;

export interface BrowserOptions {
  headless: boolean;
  executablePath: string | null;
  navigationTimeoutMs: number;
}

const VIEWPORT = { width: 1920, height: 1080 };
const TIMEZONE = "Asia/Dubai";
const ACCEPT_LANGUAGE = "en-US,en;q=0.9";
const DUBAI = { latitude: 25.2048, longitude: 55.2708 };

// Desktop Chrome builds that match the navigator overrides below
const USER_AGENTS = [
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36",
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36",
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/123.0.0.0 Safari/537.36",
];

const LAUNCH_ARGS = [
  "--disable-blink-features=AutomationControlled",
  "--disable-dev-shm-usage",
  "--no-sandbox",
  "--disable-setuid-sandbox",
  "--disable-accelerated-2d-canvas",
  `--window-size=${VIEWPORT.width},${VIEWPORT.height}`,
  "--lang=en-US",
];

// Runs in the page before any site script
const STEALTH_SCRIPT = `
  Object.defineProperty(navigator, 'webdriver', { get: () => undefined });
  Object.defineProperty(navigator, 'plugins', {
    get: () => [
      { name: 'Chrome PDF Plugin', filename: 'internal-pdf-viewer' },
      { name: 'Chrome PDF Viewer', filename: 'mhjfbmdgcfjbbpaeojofohoefgiehjai' },
      { name: 'Native Client', filename: 'internal-nacl-plugin' },
    ],
  });
  Object.defineProperty(navigator, 'languages', { get: () => ['en-US', 'en'] });
  window.chrome = { runtime: {} };
  const originalQuery = navigator.permissions && navigator.permissions.query
    ? navigator.permissions.query.bind(navigator.permissions)
    : null;
  if (originalQuery) {
    navigator.permissions.query = (parameters) =>
      parameters.name === 'notifications'
        ? Promise.resolve({ state: Notification.permission })
        : originalQuery(parameters);
  }
`;

export function pickUserAgent(random: () => number = Math.random): string {
  return USER_AGENTS[Math.floor(random() * USER_AGENTS.length)];
}

async function openStealthPage(browser: Browser, userAgent: string): Promise<Page> {
  const page = await browser.newPage();
  await page.setUserAgent(userAgent);
  await page.setViewport(VIEWPORT);
  await page.emulateTimezone(TIMEZONE);
  await page.setExtraHTTPHeaders({ "Accept-Language": ACCEPT_LANGUAGE });
  await page.setGeolocation(DUBAI);
  await page.evaluateOnNewDocument(STEALTH_SCRIPT);
  return page;
}

/** Adapt a puppeteer page; navigation failures become typed fetch errors. */
export function puppeteerSession(page: Page, navigationTimeoutMs: number): PageSession {
  return {
    async goto(url) {
      try {
        const response = await page.goto(url, { waitUntil: "networkidle2", timeout: navigationTimeoutMs });
        return { status: response?.status() ?? null };
      } catch (e) {
        if (e instanceof TimeoutError) {
          throw new FetchTimeoutError(`Timed out after ${navigationTimeoutMs} ms loading ${url}`, { cause: e });
        }
        throw new FetchNetworkError(`Failed to load ${url}: ${errorMessage(e)}`, { cause: e });
      }
    },
    wheel: (deltaY) => page.mouse.wheel({ deltaY }),
    content: () => page.content(),
    url: () => page.url(),
    close: () => page.close(),
  };
}

/**
 * Launch Chrome with automation indicators disabled. One user agent is kept for
 * every tab of the browser so the fingerprint stays consistent within a run.
 */
export async function launchStealthBrowser(options: BrowserOptions): Promise<BrowserHandle> {
  const browser = await puppeteer.launch({
    headless: options.headless,
    ...(options.executablePath ? { executablePath: options.executablePath } : { channel: "chrome" as const }),
    args: LAUNCH_ARGS,
    ignoreDefaultArgs: ["--enable-automation"],
    defaultViewport: VIEWPORT,
  });
  const userAgent = pickUserAgent();
  await browser
    .defaultBrowserContext()
    .overridePermissions("https://www.propertyfinder.ae", ["geolocation"]);
  console.log(`[browser] Launched (${options.headless ? "headless" : "visible"}).`);

  return {
    async openSession() {
      const page = await openStealthPage(browser, userAgent);
      return puppeteerSession(page, options.navigationTimeoutMs);
    },
    async close() {
      await browser.close();
      console.log("[browser] Closed.");
    },
  };
}
