import { readFile, stat } from "node:fs/promises";
import { join } from "node:path";
import type { Logger } from "../logging/logger.js";
import { PersistenceError } from "../utils/errors.js";
import { withFileLock, writeFileAtomic } from "../utils/file-lock.js";
import { ensureSection, parseDocument, renderDocument } from "./markdown.js";
import { keywords, relevance } from "./relevance.js";
import { PROFILE_FILES, PROFILE_TEMPLATES } from "./templates.js";
import {
  PROFILE_DOCUMENTS,
  type MemoryEntry,
  type ProfileDocument,
  type ScoredEntry,
  type WriteMode,
} from "./types.js";

// Guidelines stay eligible for recall even when no keyword matches.
const GUIDELINE_BASELINE = 0.1;

function isContentLine(line: string): boolean {
  const trimmed = line.trim();
  return trimmed !== "" && !trimmed.startsWith("<!--");
}

/**
 * USER.md, SOUL.md and TOOLS.md: structured documents split into `## Section`
 * blocks. Only USER.md holds personal data.
 */
export class ProfileStore {
  private readonly logger: Logger;

  constructor(
    private readonly dir: string,
    logger: Logger,
  ) {
    this.logger = logger.child({ component: "profile" });
  }

  pathOf(document: ProfileDocument): string {
    return join(this.dir, PROFILE_FILES[document]);
  }

  async ensureDefaults(): Promise<void> {
    for (const document of PROFILE_DOCUMENTS) {
      const path = this.pathOf(document);
      try {
        await withFileLock(path, async () => {
          if ((await this.readRaw(document)) === null) {
            await writeFileAtomic(path, PROFILE_TEMPLATES[document]);
            this.logger.info({ document }, "Created profile document");
          }
        });
      } catch (err) {
        throw new PersistenceError(path, err);
      }
    }
  }

  async update(
    document: ProfileDocument,
    section: string,
    text: string,
    mode: WriteMode = "append",
  ): Promise<void> {
    const path = this.pathOf(document);
    try {
      await withFileLock(path, async () => {
        const doc = parseDocument((await this.readRaw(document)) ?? PROFILE_TEMPLATES[document]);
        const target = ensureSection(doc, section);
        const lines = text
          .split(/\r?\n/)
          .filter((l) => l.trim() !== "")
          .map((l) => (l.startsWith("- ") ? l : `- ${l.trim()}`));
        target.lines = mode === "replace" ? lines : [...target.lines, ...lines];
        await writeFileAtomic(path, renderDocument(doc));
      });
    } catch (err) {
      this.logger.error({ err, document, section }, "Profile update failed");
      throw new PersistenceError(path, err);
    }
  }

  async sections(document?: ProfileDocument): Promise<MemoryEntry[]> {
    const documents = document ? [document] : PROFILE_DOCUMENTS;
    const result: MemoryEntry[] = [];
    for (const doc of documents) {
      const content = (await this.readRaw(doc)) ?? PROFILE_TEMPLATES[doc];
      const timestamp = await this.modifiedAt(doc);
      for (const section of parseDocument(content).sections) {
        const body = section.lines.filter(isContentLine).join("\n");
        if (!body) continue;
        result.push({
          layer: "profile",
          key: `${doc}:${section.heading}`,
          text: body,
          timestamp,
          personal: doc === "user",
        });
      }
    }
    return result;
  }

  async search(query: string, opts: { includePersonal: boolean }): Promise<ScoredEntry[]> {
    const words = keywords(query);
    const pool = await this.sections();
    return pool
      .filter((entry) => opts.includePersonal || !entry.personal)
      .map((entry) => {
        const score = relevance(words, `${entry.key} ${entry.text}`);
        const floor = entry.key.startsWith("soul:") ? GUIDELINE_BASELINE : 0;
        return { entry, score: Math.max(score, floor) };
      })
      .filter((s) => s.score > 0)
      .sort((a, b) => b.score - a.score || b.entry.timestamp - a.entry.timestamp);
  }

  private async readRaw(document: ProfileDocument): Promise<string | null> {
    try {
      return await readFile(this.pathOf(document), "utf-8");
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") return null;
      throw err;
    }
  }

  private async modifiedAt(document: ProfileDocument): Promise<number> {
    try {
      return (await stat(this.pathOf(document))).mtimeMs;
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") return 0;
      throw err;
    }
  }
}
