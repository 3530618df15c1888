import { randomBytes } from "node:crypto";
import { rename, writeFile, unlink, mkdir } from "node:fs/promises";
import { dirname } from "node:path";
import * as lockfile from "proper-lockfile";
import { KeyedMutex } from "./keyed-mutex.js";

const inProcess = new KeyedMutex();

/**
 * Exclusive access to `filePath`: queued behind other callers in this process,
 * then held against other processes with a lock directory beside the file.
 */
export async function withFileLock<T>(
  filePath: string,
  fn: () => T | Promise<T>,
): Promise<T> {
  return inProcess.run(filePath, async () => {
    await mkdir(dirname(filePath), { recursive: true });
    let release: (() => Promise<void>) | undefined;
    try {
      release = await lockfile.lock(filePath, {
        retries: { retries: 5, minTimeout: 100 },
        realpath: false,
      });
      return await fn();
    } finally {
      await release?.();
    }
  });
}

/** Replaces `filePath` with `content` through a rename, so readers never see a partial file. */
export async function writeFileAtomic(filePath: string, content: string): Promise<void> {
  const tmp = `${filePath}.${randomBytes(6).toString("hex")}.tmp`;
  try {
    await writeFile(tmp, content, "utf-8");
    await rename(tmp, filePath);
  } catch (err) {
    await unlink(tmp).catch(() => undefined);
    throw err;
  }
}
