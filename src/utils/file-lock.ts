import * as lockfile from "proper-lockfile";

export interface FileLockOptions {
  /** Attempts after the first before giving up on a held lock. */
  readonly retries?: number;
  readonly retryDelayMs?: number;
  /** A lock older than this is considered abandoned and taken over. */
  readonly staleMs?: number;
}

/**
 * Run `fn` while holding an advisory lock on `filePath`. The file itself does
 * not have to exist; the lock lives in a sibling `<file>.lock` directory.
 */
export async function withFileLock<T>(
  filePath: string,
  fn: () => T | Promise<T>,
  opts: FileLockOptions = {},
): Promise<T> {
  const release = await lockfile.lock(filePath, {
    retries: { retries: opts.retries ?? 5, minTimeout: opts.retryDelayMs ?? 50 },
    realpath: false,
    stale: opts.staleMs ?? 10_000,
  });
  try {
    return await fn();
  } finally {
    await release();
  }
}
