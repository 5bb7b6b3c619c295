import { appendFile } from "fs/promises";
import { errorMessage } from "./errors.js";
import { formatThousands } from "./messages.js";
import type { ListingRecord } from "./types.js";

/**
 * Append new listings to a log file so they are recorded even if delivery fails.
 * Failure to write is logged, never thrown.
 */
export async function logNewListings(path: string, records: readonly ListingRecord[], now: Date = new Date()): Promise<void> {
  if (records.length === 0) return;
  const header = `\n--- ${now.toISOString()} (${records.length} new listing(s)) ---\n`;
  const lines = records
    .map(
      (r) =>
        `- [${r.id}] ${r.title}\n  ${formatThousands(r.price)} AED | ${formatThousands(r.sizeSqft)} sqft | ${r.bedrooms ?? "?"} BR\n  ${r.url}`
    )
    .join("\n");
  try {
    await appendFile(path, header + lines + "\n", "utf-8");
  } catch (e) {
    console.error(`[run] Failed to write listings log ${path}: ${errorMessage(e)}`);
  }
}
