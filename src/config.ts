import "dotenv/config";
import type { FilterCriteria } from "./types.js";
import type { DelayRanges } from "./humanDelay.js";

type Env = Record<string, string | undefined>;

function requireEnv(env: Env, name: string): string {
  const v = env[name];
  if (v == null || v.trim() === "") throw new Error(`Missing required env: ${name}`);
  return v.trim();
}

function optionalEnv(env: Env, name: string, defaultValue: string): string {
  const v = env[name];
  return v == null || v.trim() === "" ? defaultValue : v.trim();
}

function intEnv(env: Env, name: string, defaultValue: number, min: number, max: number): number {
  const n = parseInt(optionalEnv(env, name, String(defaultValue)), 10);
  return Number.isFinite(n) ? Math.min(max, Math.max(min, n)) : defaultValue;
}

function boolEnv(env: Env, name: string, defaultValue: boolean): boolean {
  const v = optionalEnv(env, name, String(defaultValue)).toLowerCase();
  return v === "true" || v === "1" || v === "yes";
}

export type TelegramSettings = { transport: "telegram"; botToken: string; chatId: string };

export type EmailSettings = {
  transport: "email";
  host: string;
  port: number;
  // Port 587 uses STARTTLS (secure: false); 465 uses implicit TLS (secure: true)
  secure: boolean;
  user: string;
  pass: string;
  sender: string;
  receiver: string;
};

export type NotificationSettings = TelegramSettings | EmailSettings | { transport: "dry-run" };

export interface AppConfig {
  criteria: Readonly<FilterCriteria>;
  search: {
    baseUrl: string;
    pageLimit: number;
  };
  notifyOnEmpty: boolean;
  notification: NotificationSettings;
  paths: {
    seenListings: string;
    listingsLog: string;
    lock: string;
  };
  browser: {
    /** Run with a visible window when false (HEADLESS=false or --visible). */
    headless: boolean;
    /** Chrome/Chromium binary; when unset the installed stable Chrome channel is used. */
    executablePath: string | null;
    navigationTimeoutMs: number;
  };
  delays: DelayRanges;
  /** Upper bound for the whole fetch stage, retry included. */
  fetchStageTimeoutMs: number;
  /** A lock older than this is considered abandoned. */
  lockStaleMs: number;
}

export interface LoadConfigOptions {
  /** Suppresses delivery; transport secrets are not required. */
  testMode?: boolean;
  /** Command-line override of HEADLESS. */
  headless?: boolean;
}

function loadNotification(env: Env, testMode: boolean): NotificationSettings {
  if (testMode) return { transport: "dry-run" };
  const transport = optionalEnv(env, "NOTIFY_TRANSPORT", "telegram").toLowerCase();
  if (transport === "email") {
    return {
      transport: "email",
      host: requireEnv(env, "SMTP_HOST"),
      port: intEnv(env, "SMTP_PORT", 587, 1, 65535),
      secure: boolEnv(env, "SMTP_SECURE", false),
      user: requireEnv(env, "SMTP_USER"),
      pass: requireEnv(env, "SMTP_PASS"),
      sender: requireEnv(env, "NOTIFICATION_SENDER"),
      receiver: requireEnv(env, "NOTIFICATION_RECEIVER"),
    };
  }
  if (transport !== "telegram") {
    throw new Error(`Unknown NOTIFY_TRANSPORT "${transport}" (expected telegram or email)`);
  }
  return {
    transport: "telegram",
    botToken: requireEnv(env, "TELEGRAM_BOT_TOKEN"),
    chatId: requireEnv(env, "TELEGRAM_CHAT_ID"),
  };
}

export function loadConfig(env: Env = process.env, options: LoadConfigOptions = {}): AppConfig {
  const testMode = options.testMode ?? false;
  const criteria: FilterCriteria = Object.freeze({
    location: optionalEnv(env, "SEARCH_LOCATION", "Creek Harbour"),
    bedrooms: intEnv(env, "SEARCH_BEDROOMS", 1, 0, 10),
    maxPrice: intEnv(env, "SEARCH_MAX_PRICE", 1_800_000, 1, Number.MAX_SAFE_INTEGER),
    minSizeSqft: intEnv(env, "SEARCH_MIN_SIZE_SQFT", 740, 0, 1_000_000),
    saleStatus: "Ready",
  });

  return {
    criteria,
    search: {
      baseUrl: optionalEnv(env, "SEARCH_BASE_URL", "https://www.propertyfinder.ae/en/search"),
      pageLimit: intEnv(env, "SEARCH_PAGE_LIMIT", 3, 1, 20),
    },
    notifyOnEmpty: boolEnv(env, "NOTIFY_ON_EMPTY", false),
    notification: loadNotification(env, testMode),
    paths: {
      seenListings: optionalEnv(env, "SEEN_LISTINGS_PATH", "seen_listings.json"),
      listingsLog: optionalEnv(env, "LISTINGS_LOG_PATH", "listings.log"),
      lock: optionalEnv(env, "LOCK_PATH", ".listing-watch.lock"),
    },
    browser: {
      headless: options.headless ?? optionalEnv(env, "HEADLESS", "true").toLowerCase() !== "false",
      executablePath: env["CHROME_EXECUTABLE_PATH"]?.trim() || null,
      navigationTimeoutMs: intEnv(env, "NAVIGATION_TIMEOUT_MS", 60_000, 5_000, 300_000),
    },
    delays: {
      beforePageLoad: {
        minMs: intEnv(env, "THINK_TIME_MIN_MS", 2000, 0, 60_000),
        maxMs: intEnv(env, "THINK_TIME_MAX_MS", 8000, 0, 60_000),
      },
      betweenScrolls: { minMs: 500, maxMs: 1500 },
      beforeRetry: {
        minMs: intEnv(env, "FETCH_RETRY_BACKOFF_MIN_MS", 180_000, 0, 3_600_000),
        maxMs: intEnv(env, "FETCH_RETRY_BACKOFF_MAX_MS", 300_000, 0, 3_600_000),
      },
    },
    fetchStageTimeoutMs: intEnv(env, "FETCH_STAGE_TIMEOUT_MS", 900_000, 10_000, 7_200_000),
    lockStaleMs: intEnv(env, "LOCK_STALE_MS", 7_200_000, 60_000, 86_400_000),
  };
}
