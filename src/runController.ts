import type { BrowserHandle, BrowserLauncher } from "./browser.js";
import { diff } from "./differ.js";
import {
  AbortedError,
  ListingWatchError,
  PersistenceError,
  errorMessage,
  type ListingWatchErrorCode,
} from "./errors.js";
import { extractListings } from "./extractor.js";
import { Fetcher } from "./fetcher.js";
import { filterListings } from "./filter.js";
import type { DelayPolicy } from "./humanDelay.js";
import { logNewListings } from "./listingLog.js";
import type { Notifier } from "./notifier.js";
import type { SeenStore } from "./seenStore.js";
import type { DeliveryOutcome, ListingRecord, RunStage, RunState, SearchQuery } from "./types.js";

export interface RunSettings {
  query: SearchQuery;
  pageLimit: number;
  /** Send a "no new listings" summary when nothing is new. */
  emptyRunPolicy: boolean;
  fetchStageTimeoutMs: number;
  /** Where new listings are appended before delivery; null disables the log. */
  listingsLogPath: string | null;
}

export interface RunDependencies {
  launchBrowser: BrowserLauncher;
  store: SeenStore;
  notifier: Notifier;
  delays: DelayPolicy;
  extract?: (html: string) => ListingRecord[];
  now?: () => Date;
}

export type RunResult =
  | {
      state: "Done";
      transitions: RunState[];
      newRecords: ListingRecord[];
      outcomes: DeliveryOutcome[];
      /** False when saving the seen set failed; those listings may be notified again next run. */
      persisted: boolean;
    }
  | {
      state: "Failed";
      transitions: RunState[];
      stage: RunStage;
      code: ListingWatchErrorCode | "UNEXPECTED";
      reason: string;
    };

function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) throw new AbortedError();
}

/**
 * One pass: Fetching → Extracting → Filtering → Diffing → Notifying → Persisting → Done,
 * or Failed from whichever stage raised. The browser lives only through Fetching and is
 * closed on every path. The stop signal is honoured up to Notifying; once messages go
 * out the pass completes so the seen set records them.
 */
export async function runOnce(
  settings: RunSettings,
  deps: RunDependencies,
  signal?: AbortSignal
): Promise<RunResult> {
  const now = deps.now ?? (() => new Date());
  const extract = deps.extract ?? ((html: string) => extractListings(html, { now }));
  const transitions: RunState[] = ["Idle"];
  let stage: RunStage = "Idle";
  const enter = (next: RunStage) => {
    stage = next;
    transitions.push(next);
    console.log(`[run] ${next}`);
  };

  let browser: BrowserHandle | null = null;
  const closeBrowser = async () => {
    if (!browser) return;
    const handle = browser;
    browser = null;
    try {
      await handle.close();
    } catch (e) {
      console.warn(`[run] Failed to close browser: ${errorMessage(e)}`);
    }
  };

  try {
    const seen = await deps.store.load();
    console.log(`[run] ${seen.size} listing(s) already notified.`);
    throwIfAborted(signal);

    enter("Fetching");
    const handle = await deps.launchBrowser();
    browser = handle;
    const fetcher = new Fetcher(() => handle.openSession(), {
      delays: deps.delays,
      stageTimeoutMs: settings.fetchStageTimeoutMs,
    });
    const pages = await fetcher.fetch(settings.query, settings.pageLimit, { signal });
    await closeBrowser();
    throwIfAborted(signal);

    enter("Extracting");
    const records = pages.flatMap((html) => extract(html));
    console.log(`[run] Extracted ${records.length} listing(s) from ${pages.length} page(s).`);
    throwIfAborted(signal);

    enter("Filtering");
    const filtered = filterListings(records, settings.query.criteria);
    console.log(`[run] ${filtered.length} listing(s) match the criteria.`);

    enter("Diffing");
    const { newRecords, updatedSeenSet } = diff(filtered, seen, now());
    console.log(`[run] ${newRecords.length} new listing(s).`);
    throwIfAborted(signal);

    enter("Notifying");
    if (settings.listingsLogPath) await logNewListings(settings.listingsLogPath, newRecords, now());
    const outcomes = await deps.notifier.notify(newRecords, settings.emptyRunPolicy);

    enter("Persisting");
    let persisted = true;
    if (newRecords.length > 0) {
      try {
        await deps.store.save(updatedSeenSet);
      } catch (e) {
        if (!(e instanceof PersistenceError)) throw e;
        persisted = false;
        console.error(
          `[run] ${e.message}. ${newRecords.length} notified listing(s) are not recorded and may be notified again next run.`
        );
      }
    }

    transitions.push("Done");
    console.log("[run] Done.");
    return { state: "Done", transitions, newRecords, outcomes, persisted };
  } catch (e) {
    const code = e instanceof ListingWatchError ? e.code : "UNEXPECTED";
    const reason = errorMessage(e);
    transitions.push("Failed");
    console.error(`[run] Failed during ${stage} (${code}): ${reason}`);
    return { state: "Failed", transitions, stage, code, reason };
  } finally {
    await closeBrowser();
  }
}
