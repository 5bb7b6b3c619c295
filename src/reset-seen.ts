import { loadConfig } from "./config.js";
import { createFileSeenStore } from "./seenStore.js";

async function main(): Promise<void> {
  const { paths } = loadConfig(process.env, { testMode: true });
  await createFileSeenStore(paths.seenListings).reset();
  console.log(`Seen listings cleared (${paths.seenListings}).`);
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
