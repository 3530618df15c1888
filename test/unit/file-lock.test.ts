import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, readdirSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { withFileLock, writeFileAtomic } from "../../src/utils/file-lock.js";
import { KeyedMutex } from "../../src/utils/keyed-mutex.js";

describe("withFileLock", () => {
  let tempDir: string;
  let filePath: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), "cairn-lock-"));
    filePath = join(tempDir, "doc.md");
    writeFileSync(filePath, "# Doc\n");
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it("executes function and returns result", async () => {
    expect(await withFileLock(filePath, () => 42)).toBe(42);
  });

  it("releases lock even on error", async () => {
    await expect(
      withFileLock(filePath, () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");
    expect(await withFileLock(filePath, () => "after-error")).toBe("after-error");
  });

  it("queues many concurrent writers instead of failing them", async () => {
    const order: number[] = [];
    await Promise.all(
      Array.from({ length: 8 }, (_, i) =>
        withFileLock(filePath, async () => {
          await new Promise((r) => setTimeout(r, 5));
          order.push(i);
        }),
      ),
    );
    expect(order).toEqual([0, 1, 2, 3, 4, 5, 6, 7]);
  });

  it("locks files that do not exist yet", async () => {
    const fresh = join(tempDir, "nested", "new.md");
    await withFileLock(fresh, () => writeFileAtomic(fresh, "hello"));
    expect(readFileSync(fresh, "utf-8")).toBe("hello");
  });
});

describe("writeFileAtomic", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), "cairn-atomic-"));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it("replaces content and leaves no temp files behind", async () => {
    const path = join(tempDir, "a.md");
    writeFileSync(path, "old");
    await writeFileAtomic(path, "new");
    expect(readFileSync(path, "utf-8")).toBe("new");
    expect(readdirSync(tempDir)).toEqual(["a.md"]);
  });

  it("removes the temp file when the write fails", async () => {
    const path = join(tempDir, "missing-dir", "a.md");
    await expect(writeFileAtomic(path, "x")).rejects.toThrow();
    expect(readdirSync(tempDir)).toEqual([]);
  });
});

describe("KeyedMutex", () => {
  it("serializes work per key", async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];
    const job = (name: string, ms: number) =>
      mutex.run("doc", async () => {
        events.push(`start ${name}`);
        await new Promise((r) => setTimeout(r, ms));
        events.push(`end ${name}`);
      });

    await Promise.all([job("a", 20), job("b", 1)]);
    expect(events).toEqual(["start a", "end a", "start b", "end b"]);
    expect(mutex.isLocked("doc")).toBe(false);
  });

  it("lets different keys run concurrently", async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];
    await Promise.all([
      mutex.run("one", async () => {
        events.push("start one");
        await new Promise((r) => setTimeout(r, 20));
        events.push("end one");
      }),
      mutex.run("two", async () => {
        events.push("start two");
      }),
    ]);
    expect(events).toEqual(["start one", "start two", "end one"]);
  });

  it("keeps the queue going after a failure", async () => {
    const mutex = new KeyedMutex();
    const failed = mutex.run("k", async () => {
      throw new Error("first failed");
    });
    const second = mutex.run("k", async () => "second ran");
    await expect(failed).rejects.toThrow("first failed");
    await expect(second).resolves.toBe("second ran");
  });
});
