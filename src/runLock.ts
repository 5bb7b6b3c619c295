import { link, open, readFile, rename, rm } from "fs/promises";
import { errorMessage } from "./errors.js";

export interface RunLock {
  release(): Promise<void>;
}

export interface AcquireLockOptions {
  /** A lock older than this is taken over even if its pid looks alive. */
  staleMs: number;
  now?: () => Date;
  /** Whether a process id is still running. */
  isAlive?: (pid: number) => boolean;
}

interface LockContent {
  pid: number;
  startedAt: string;
}

function hasCode(e: unknown, code: string): boolean {
  return e instanceof Error && "code" in e && e.code === code;
}

function processIsAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (e) {
    // EPERM: the process exists but belongs to another user
    return hasCode(e, "EPERM");
  }
}

function parseLock(raw: string): LockContent | null {
  try {
    const value: unknown = JSON.parse(raw);
    if (typeof value !== "object" || value === null) return null;
    const pid = "pid" in value ? value.pid : undefined;
    const startedAt = "startedAt" in value ? value.startedAt : undefined;
    if (typeof pid !== "number" || typeof startedAt !== "string") return null;
    return { pid, startedAt };
  } catch {
    return null;
  }
}

async function readLockFile(path: string): Promise<string> {
  try {
    return await readFile(path, "utf-8");
  } catch (e) {
    if (hasCode(e, "ENOENT")) return "";
    throw e;
  }
}

/**
 * Move the lock aside and drop it only if it is still the abandoned one that was read.
 * A lock another run created in the meantime is put back and false is returned.
 */
async function removeIfUnchanged(path: string, abandoned: string): Promise<boolean> {
  const aside = `${path}.${process.pid}.${Math.random().toString(36).slice(2)}.stale`;
  try {
    await rename(path, aside);
  } catch (e) {
    if (hasCode(e, "ENOENT")) return true;
    throw e;
  }
  const moved = await readFile(aside, "utf-8");
  if (moved !== abandoned) {
    try {
      await link(aside, path);
    } catch (e) {
      if (!hasCode(e, "EEXIST")) throw e;
    }
  }
  await rm(aside, { force: true });
  return moved === abandoned;
}

async function tryCreate(path: string, content: LockContent): Promise<boolean> {
  try {
    const handle = await open(path, "wx");
    try {
      await handle.writeFile(JSON.stringify(content), "utf-8");
    } finally {
      await handle.close();
    }
    return true;
  } catch (e) {
    if (hasCode(e, "EEXIST")) return false;
    throw e;
  }
}

/**
 * Create the lock file exclusively. Returns null when another live run holds it;
 * an abandoned lock (dead pid, unreadable, or older than staleMs) is replaced.
 */
export async function acquireRunLock(path: string, options: AcquireLockOptions): Promise<RunLock | null> {
  const now = options.now ?? (() => new Date());
  const isAlive = options.isAlive ?? processIsAlive;
  const content: LockContent = { pid: process.pid, startedAt: now().toISOString() };

  if (!(await tryCreate(path, content))) {
    const raw = await readLockFile(path);
    const existing = parseLock(raw);
    const age = existing ? now().getTime() - Date.parse(existing.startedAt) : Infinity;
    if (existing && isAlive(existing.pid) && age < options.staleMs) {
      console.log(`[lock] Another run (pid ${existing.pid}, started ${existing.startedAt}) holds ${path}; skipping.`);
      return null;
    }
    console.warn(`[lock] Replacing abandoned lock ${path}${existing ? ` (pid ${existing.pid})` : ""}.`);
    if (!(await removeIfUnchanged(path, raw)) || !(await tryCreate(path, content))) {
      console.log(`[lock] ${path} was taken by another run; skipping.`);
      return null;
    }
  }

  return {
    async release() {
      try {
        await rm(path, { force: true });
      } catch (e) {
        console.warn(`[lock] Could not remove ${path}: ${errorMessage(e)}`);
      }
    },
  };
}
