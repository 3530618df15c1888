import { describe, it, expect } from "vitest";
import {
  ensureSection,
  findSection,
  formatDate,
  formatEntryLine,
  formatTime,
  parseDocument,
  parseEntryLine,
  renderDocument,
  toTimestamp,
} from "../../src/memory/markdown.js";

describe("markdown documents", () => {
  const source = [
    "# Long-term memory",
    "",
    "Curated facts.",
    "",
    "## Preferences",
    "",
    "- [2026-01-05 14:30] Prefers short answers",
    "",
    "## Decisions",
    "",
  ].join("\n");

  it("parses title, preamble and sections", () => {
    const doc = parseDocument(source);
    expect(doc.title).toBe("Long-term memory");
    expect(doc.preamble).toEqual(["Curated facts."]);
    expect(doc.sections.map((s) => s.heading)).toEqual(["Preferences", "Decisions"]);
    expect(doc.sections[0]?.lines).toEqual(["- [2026-01-05 14:30] Prefers short answers"]);
    expect(doc.sections[1]?.lines).toEqual([]);
  });

  it("renders back to a normalized document", () => {
    expect(renderDocument(parseDocument(source))).toBe(
      "# Long-term memory\n\nCurated facts.\n\n## Preferences\n- [2026-01-05 14:30] Prefers short answers\n\n## Decisions\n",
    );
  });

  it("finds sections case-insensitively and creates missing ones", () => {
    const doc = parseDocument(source);
    expect(findSection(doc, "preferences")?.heading).toBe("Preferences");
    const notes = ensureSection(doc, "Notes");
    notes.lines.push("- [2026-01-06 09:00] hello");
    expect(doc.sections.map((s) => s.heading)).toEqual(["Preferences", "Decisions", "Notes"]);
    expect(ensureSection(doc, "NOTES")).toBe(notes);
  });
});

describe("entry lines", () => {
  it("parses a dated entry with a source", () => {
    expect(parseEntryLine("- [2026-01-05 14:30] Use Postgres <!-- source:cli -->")).toEqual({
      date: "2026-01-05",
      time: "14:30",
      text: "Use Postgres",
      source: "cli",
    });
  });

  it("parses a time-only daily entry", () => {
    expect(parseEntryLine("- [09:15] standup moved")).toEqual({
      date: null,
      time: "09:15",
      text: "standup moved",
    });
  });

  it("rejects lines that are not entries", () => {
    expect(parseEntryLine("plain text")).toBeNull();
    expect(parseEntryLine("- no stamp")).toBeNull();
  });

  it("flattens multi-line text when formatting", () => {
    expect(formatEntryLine("first\n  second", "2026-01-05 14:30", "telegram")).toBe(
      "- [2026-01-05 14:30] first second <!-- source:telegram -->",
    );
  });

  it("formats UTC stamps and reads them back", () => {
    const ts = Date.UTC(2026, 0, 5, 14, 30);
    expect(formatDate(ts)).toBe("2026-01-05");
    expect(formatTime(ts)).toBe("14:30");
    expect(toTimestamp("2026-01-05", "14:30")).toBe(ts);
    expect(toTimestamp("2026-01-05", null)).toBe(Date.UTC(2026, 0, 5));
  });
});
