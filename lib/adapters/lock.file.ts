import fs from "node:fs/promises";
import path from "node:path";
import { hasErrorCode } from "../errors";
import { createLogger } from "../logger";

const log = createLogger("file-lock");

const STALE_LOCK_MS = 10_000;
const ACQUIRE_TIMEOUT_MS = 5_000;

function lockPath(lockDir: string, name: string) {
  return path.join(lockDir, `${name}.lock`);
}

export type FileLockOptions = {
  // a lock file older than this is taken over
  staleMs?: number;
  acquireTimeoutMs?: number;
};

async function removeIfStale(p: string, staleMs: number): Promise<boolean> {
  const stats = await fs.stat(p).catch(() => null);
  if (!stats || Date.now() - stats.mtimeMs <= staleMs) return false;
  await fs.rm(p, { force: true });
  log.warn(`Removed stale lock: ${path.basename(p)}`);
  return true;
}

/** Runs `fn` while holding an exclusive lock file in `lockDir`. */
export async function withFileLock<T>(
  lockDir: string,
  name: string,
  fn: () => Promise<T>,
  options: FileLockOptions = {},
): Promise<T> {
  const staleMs = options.staleMs ?? STALE_LOCK_MS;
  const acquireTimeoutMs = options.acquireTimeoutMs ?? ACQUIRE_TIMEOUT_MS;
  await fs.mkdir(lockDir, { recursive: true });
  const p = lockPath(lockDir, name);
  const start = Date.now();

  while (true) {
    try {
      await fs.writeFile(p, String(process.pid), { flag: "wx" });
      break;
    } catch (error) {
      if (!hasErrorCode(error, "EEXIST")) throw error;
      const wasStale = await removeIfStale(p, staleMs);
      if (!wasStale && Date.now() - start > acquireTimeoutMs) {
        throw new Error(`Lock timeout: ${name}`);
      }
      await new Promise((r) => setTimeout(r, 25 + Math.random() * 25));
    }
  }

  try {
    return await fn();
  } finally {
    await fs.rm(p, { force: true });
  }
}
