import { readFile, readdir } from "node:fs/promises";
import { join } from "node:path";
import type { Logger } from "../logging/logger.js";
import { PersistenceError } from "../utils/errors.js";
import { withFileLock, writeFileAtomic } from "../utils/file-lock.js";
import {
  ensureSection,
  findSection,
  formatDate,
  formatEntryLine,
  formatTime,
  type MarkdownDocument,
  parseDocument,
  parseEntryLine,
  renderDocument,
  toTimestamp,
} from "./markdown.js";
import { keywords, relevance } from "./relevance.js";
import { dailyTemplate, LONG_TERM_TEMPLATE } from "./templates.js";
import type { LongTermCategory, MemoryEntry, ScoredEntry } from "./types.js";

export interface LongTermSearchOptions {
  readonly includeDaily?: boolean;
  readonly dailyDays?: number;
  readonly now?: number;
}

const DAILY_FILE = /^(\d{4}-\d{2}-\d{2})\.md$/;
const DAY_MS = 24 * 60 * 60 * 1000;

async function readIfExists(path: string): Promise<string | null> {
  try {
    return await readFile(path, "utf-8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return null;
    throw err;
  }
}

/**
 * Curated facts in `MEMORY.md` plus per-day logs under `daily/`. Every write
 * takes the document's lock and replaces the file atomically.
 */
export class LongTermMemory {
  private readonly memoryPath: string;
  private readonly dailyDir: string;
  private readonly logger: Logger;

  constructor(dir: string, logger: Logger) {
    this.memoryPath = join(dir, "MEMORY.md");
    this.dailyDir = join(dir, "daily");
    this.logger = logger.child({ component: "long-term-memory" });
  }

  get path(): string {
    return this.memoryPath;
  }

  async append(
    category: LongTermCategory,
    text: string,
    opts?: { sourceChannel?: string; timestamp?: number },
  ): Promise<MemoryEntry> {
    const ts = opts?.timestamp ?? Date.now();
    const stamp = `${formatDate(ts)} ${formatTime(ts)}`;
    await this.mutate(this.memoryPath, LONG_TERM_TEMPLATE, (doc) => {
      ensureSection(doc, category).lines.push(formatEntryLine(text, stamp, opts?.sourceChannel));
    });
    this.logger.debug({ category }, "Long-term entry appended");
    return {
      layer: "long-term",
      key: category,
      text,
      timestamp: toTimestamp(formatDate(ts), formatTime(ts)),
      personal: true,
      ...(opts?.sourceChannel ? { sourceChannel: opts.sourceChannel } : {}),
    };
  }

  async replaceSection(category: LongTermCategory, text: string, timestamp = Date.now()): Promise<void> {
    const stamp = `${formatDate(timestamp)} ${formatTime(timestamp)}`;
    await this.mutate(this.memoryPath, LONG_TERM_TEMPLATE, (doc) => {
      ensureSection(doc, category).lines = [formatEntryLine(text, stamp)];
    });
  }

  /** Deletes entries in `category` whose text contains `match`, case-insensitively. */
  async remove(category: LongTermCategory, match: string): Promise<number> {
    const needle = match.toLowerCase();
    let removed = 0;
    await this.mutate(this.memoryPath, LONG_TERM_TEMPLATE, (doc) => {
      const section = findSection(doc, category);
      if (!section) return;
      const kept = section.lines.filter((line) => {
        const entry = parseEntryLine(line);
        return !entry || !entry.text.toLowerCase().includes(needle);
      });
      removed = section.lines.length - kept.length;
      section.lines = kept;
    });
    return removed;
  }

  async appendDaily(text: string, timestamp = Date.now()): Promise<MemoryEntry> {
    const date = formatDate(timestamp);
    const time = formatTime(timestamp);
    await this.mutate(join(this.dailyDir, `${date}.md`), dailyTemplate(date), (doc) => {
      ensureSection(doc, "Entries").lines.push(formatEntryLine(text, time));
    });
    return {
      layer: "long-term",
      key: `daily:${date}`,
      text,
      timestamp: toTimestamp(date, time),
      personal: true,
    };
  }

  async entries(category?: LongTermCategory): Promise<MemoryEntry[]> {
    const content = await readIfExists(this.memoryPath);
    if (content === null) return [];
    const doc = parseDocument(content);
    const result: MemoryEntry[] = [];
    for (const section of doc.sections) {
      if (category && section.heading.toLowerCase() !== category.toLowerCase()) continue;
      for (const line of section.lines) {
        const parsed = parseEntryLine(line);
        if (!parsed) continue;
        result.push({
          layer: "long-term",
          key: section.heading,
          text: parsed.text,
          timestamp: parsed.date ? toTimestamp(parsed.date, parsed.time) : 0,
          personal: true,
          ...(parsed.source ? { sourceChannel: parsed.source } : {}),
        });
      }
    }
    return result;
  }

  /** Entries from the most recent `days` daily logs, `now` included. */
  async dailyEntries(days: number, now = Date.now()): Promise<MemoryEntry[]> {
    if (days <= 0) return [];
    let files: string[];
    try {
      files = await readdir(this.dailyDir);
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") return [];
      throw err;
    }

    const oldest = formatDate(now - (days - 1) * DAY_MS);
    const newest = formatDate(now);
    const result: MemoryEntry[] = [];
    for (const file of files.sort()) {
      const date = DAILY_FILE.exec(file)?.[1];
      if (!date || date < oldest || date > newest) continue;
      const content = await readIfExists(join(this.dailyDir, file));
      if (content === null) continue;
      for (const section of parseDocument(content).sections) {
        for (const line of section.lines) {
          const parsed = parseEntryLine(line);
          if (!parsed) continue;
          result.push({
            layer: "long-term",
            key: `daily:${date}`,
            text: parsed.text,
            timestamp: toTimestamp(date, parsed.time),
            personal: true,
          });
        }
      }
    }
    return result;
  }

  /** Entries relevant to `query`, best first; equal scores favour newer entries. */
  async search(query: string, opts?: LongTermSearchOptions): Promise<ScoredEntry[]> {
    const words = keywords(query);
    if (words.length === 0) return [];

    const pool = await this.entries();
    if (opts?.includeDaily) {
      pool.push(...(await this.dailyEntries(opts.dailyDays ?? 3, opts.now)));
    }

    return pool
      .map((entry) => ({ entry, score: relevance(words, `${entry.key} ${entry.text}`) }))
      .filter((s) => s.score > 0)
      .sort((a, b) => b.score - a.score || b.entry.timestamp - a.entry.timestamp);
  }

  private async mutate(
    path: string,
    template: string,
    change: (doc: MarkdownDocument) => void,
  ): Promise<void> {
    try {
      await withFileLock(path, async () => {
        const current = (await readIfExists(path)) ?? template;
        const doc = parseDocument(current);
        change(doc);
        await writeFileAtomic(path, renderDocument(doc));
      });
    } catch (err) {
      this.logger.error({ err, path }, "Memory document write failed");
      throw new PersistenceError(path, err);
    }
  }
}
