#!/usr/bin/env node
import { launchStealthBrowser } from "./browser.js";
import { loadConfig, type AppConfig, type NotificationSettings } from "./config.js";
import { createEmailTransport } from "./email.js";
import { errorMessage } from "./errors.js";
import { humanDelayPolicy } from "./humanDelay.js";
import { Notifier, createDryRunTransport, type NotificationTransport } from "./notifier.js";
import { acquireRunLock } from "./runLock.js";
import { runOnce } from "./runController.js";
import { createFileSeenStore, readOnlySeenStore } from "./seenStore.js";
import { createTelegramTransport } from "./telegram.js";

const args = process.argv.slice(2);
const isTest = args.includes("--test");
const headlessFlag = args.includes("--visible") ? false : args.includes("--headless") ? true : undefined;

function createTransport(settings: NotificationSettings): { transport: NotificationTransport; recipient: string } {
  switch (settings.transport) {
    case "telegram":
      return { transport: createTelegramTransport({ botToken: settings.botToken }), recipient: settings.chatId };
    case "email":
      return { transport: createEmailTransport(settings), recipient: settings.receiver };
    case "dry-run":
      return { transport: createDryRunTransport(), recipient: "test" };
  }
}

async function run(config: AppConfig): Promise<number> {
  const lock = await acquireRunLock(config.paths.lock, { staleMs: config.lockStaleMs });
  if (!lock) return 0;

  const controller = new AbortController();
  const onSignal = (signal: NodeJS.Signals) => {
    console.warn(`[run] Received ${signal}; stopping after the browser is released.`);
    controller.abort();
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);

  try {
    const { transport, recipient } = createTransport(config.notification);
    const fileStore = createFileSeenStore(config.paths.seenListings);
    const result = await runOnce(
      {
        query: { baseUrl: config.search.baseUrl, criteria: config.criteria },
        pageLimit: config.search.pageLimit,
        emptyRunPolicy: config.notifyOnEmpty,
        fetchStageTimeoutMs: config.fetchStageTimeoutMs,
        listingsLogPath: isTest ? null : config.paths.listingsLog,
      },
      {
        launchBrowser: () => launchStealthBrowser(config.browser),
        store: isTest ? readOnlySeenStore(fileStore) : fileStore,
        notifier: new Notifier(transport, { recipient, area: config.criteria.location }),
        delays: humanDelayPolicy(config.delays),
      },
      controller.signal
    );
    return result.state === "Done" ? 0 : 1;
  } finally {
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
    await lock.release();
  }
}

async function main(): Promise<number> {
  const config = loadConfig(process.env, { testMode: isTest, headless: headlessFlag });
  const { criteria } = config;
  console.log(
    `Checking for ${criteria.bedrooms}BR in "${criteria.location}", max ${criteria.maxPrice} AED, min ${criteria.minSizeSqft} sqft, ready only${isTest ? " (test mode: no delivery)" : ""}.`
  );
  return run(config);
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((e) => {
    console.error(`Fatal: ${errorMessage(e)}`);
    process.exit(1);
  });
