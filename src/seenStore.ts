import { readFile, rename, rm, writeFile } from "fs/promises";
import { z } from "zod";
import { PersistenceError, errorMessage } from "./errors.js";
import type { SeenEntry, SeenSet } from "./types.js";

/**
 * On-disk shape. `listings` is authoritative; `meta` is diagnostics only and
 * absent from files written by older versions.
 */
const SeenFileSchema = z.object({
  listings: z.array(z.union([z.string(), z.number()]).transform((v) => String(v))),
  meta: z.record(z.object({ firstSeenAt: z.string().nullable().optional() })).optional(),
  updated_at: z.string().optional(),
});

export type SeenFile = z.infer<typeof SeenFileSchema>;

export interface SeenStore {
  /** Never throws: missing, unreadable or corrupt state loads as an empty set. */
  load(): Promise<SeenSet>;
  /** Throws PersistenceError. */
  save(seen: SeenSet): Promise<void>;
  /** Operator reset: removes the file. */
  reset(): Promise<void>;
}

function isMissingFile(e: unknown): boolean {
  return e instanceof Error && "code" in e && e.code === "ENOENT";
}

export function parseSeenFile(raw: string): SeenSet {
  const parsed = SeenFileSchema.parse(JSON.parse(raw));
  const seen = new Map<string, SeenEntry>();
  for (const id of parsed.listings) {
    seen.set(id, { firstSeenAt: parsed.meta?.[id]?.firstSeenAt ?? null });
  }
  return seen;
}

export function serializeSeenSet(seen: SeenSet, now: Date = new Date()): string {
  const meta: Record<string, { firstSeenAt: string }> = {};
  for (const [id, entry] of seen) {
    if (entry.firstSeenAt) meta[id] = { firstSeenAt: entry.firstSeenAt };
  }
  const file = {
    listings: [...seen.keys()],
    meta,
    updated_at: now.toISOString(),
  };
  return JSON.stringify(file, null, 2) + "\n";
}

/** Seen-set kept as a JSON file, replaced atomically (temp file + rename) on save. */
export function createFileSeenStore(path: string, now: () => Date = () => new Date()): SeenStore {
  return {
    async load() {
      let raw: string;
      try {
        raw = await readFile(path, "utf-8");
      } catch (e) {
        if (!isMissingFile(e)) {
          console.warn(`[store] Could not read ${path} (${errorMessage(e)}); starting with an empty seen set.`);
        }
        return new Map();
      }
      try {
        return parseSeenFile(raw);
      } catch (e) {
        console.warn(
          `[store] ${path} is corrupt (${errorMessage(e)}); starting with an empty seen set. Listings seen before may be notified once more.`
        );
        return new Map();
      }
    },

    async save(seen) {
      const tmp = `${path}.${process.pid}.tmp`;
      try {
        await writeFile(tmp, serializeSeenSet(seen, now()), "utf-8");
        await rename(tmp, path);
      } catch (e) {
        await rm(tmp, { force: true }).catch((cleanupError: unknown) =>
          console.warn(`[store] Could not remove ${tmp}: ${errorMessage(cleanupError)}`)
        );
        throw new PersistenceError(`Failed to save seen listings to ${path}: ${errorMessage(e)}`, { cause: e });
      }
    },

    async reset() {
      try {
        await rm(path, { force: true });
      } catch (e) {
        throw new PersistenceError(`Failed to remove ${path}: ${errorMessage(e)}`, { cause: e });
      }
    },
  };
}

/** In-memory store for tests. */
export function createMemorySeenStore(initial: Iterable<string> = []): SeenStore & { saved: SeenSet[] } {
  let current: SeenSet = new Map([...initial].map((id) => [id, { firstSeenAt: null }] as const));
  const saved: SeenSet[] = [];
  return {
    saved,
    async load() {
      return current;
    },
    async save(seen) {
      current = seen;
      saved.push(seen);
    },
    async reset() {
      current = new Map();
    },
  };
}

/** Loads through `inner` but never writes; test-mode runs must not mark listings as notified. */
export function readOnlySeenStore(inner: SeenStore): SeenStore {
  return {
    load: () => inner.load(),
    async save(seen) {
      console.log(`[store] Test mode: not saving ${seen.size} id(s).`);
    },
    async reset() {
      console.log("[store] Test mode: reset skipped.");
    },
  };
}
