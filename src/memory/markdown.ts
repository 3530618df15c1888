export interface MarkdownSection {
  heading: string;
  lines: string[];
}

export interface MarkdownDocument {
  title: string;
  preamble: string[];
  sections: MarkdownSection[];
}

const ENTRY_PATTERN =
  /^- \[(\d{4}-\d{2}-\d{2})?(?: ?(\d{2}:\d{2}))?\] (.*?)(?: <!-- source:(\S+) -->)?$/;

export interface ParsedEntry {
  /** `YYYY-MM-DD`, or `null` when the line carries only a time. */
  readonly date: string | null;
  readonly time: string | null;
  readonly text: string;
  readonly source?: string;
}

export function parseDocument(content: string): MarkdownDocument {
  const doc: MarkdownDocument = { title: "", preamble: [], sections: [] };
  let current: MarkdownSection | null = null;

  for (const line of content.split(/\r?\n/)) {
    if (line.startsWith("## ")) {
      current = { heading: line.slice(3).trim(), lines: [] };
      doc.sections.push(current);
    } else if (line.startsWith("# ") && !doc.title && !current) {
      doc.title = line.slice(2).trim();
    } else if (current) {
      current.lines.push(line);
    } else {
      doc.preamble.push(line);
    }
  }

  for (const section of doc.sections) trimBlank(section.lines);
  trimBlank(doc.preamble);
  return doc;
}

export function renderDocument(doc: MarkdownDocument): string {
  const parts: string[] = [`# ${doc.title}`];
  if (doc.preamble.length > 0) parts.push(doc.preamble.join("\n"));
  for (const section of doc.sections) {
    const body = section.lines.length > 0 ? `\n${section.lines.join("\n")}` : "";
    parts.push(`## ${section.heading}${body}`);
  }
  return `${parts.join("\n\n")}\n`;
}

export function findSection(doc: MarkdownDocument, heading: string): MarkdownSection | undefined {
  const wanted = heading.toLowerCase();
  return doc.sections.find((s) => s.heading.toLowerCase() === wanted);
}

export function ensureSection(doc: MarkdownDocument, heading: string): MarkdownSection {
  const existing = findSection(doc, heading);
  if (existing) return existing;
  const section: MarkdownSection = { heading, lines: [] };
  doc.sections.push(section);
  return section;
}

export function parseEntryLine(line: string): ParsedEntry | null {
  const match = ENTRY_PATTERN.exec(line.trim());
  if (!match) return null;
  const [, date, time, text, source] = match;
  if (!text) return null;
  return {
    date: date ?? null,
    time: time ?? null,
    text,
    ...(source ? { source } : {}),
  };
}

export function formatEntryLine(
  text: string,
  stamp: string,
  source?: string,
): string {
  const flat = text.replace(/\s*\n\s*/g, " ").trim();
  const suffix = source ? ` <!-- source:${source} -->` : "";
  return `- [${stamp}] ${flat}${suffix}`;
}

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

export function formatDate(ts: number): string {
  const d = new Date(ts);
  return `${d.getUTCFullYear()}-${pad(d.getUTCMonth() + 1)}-${pad(d.getUTCDate())}`;
}

export function formatTime(ts: number): string {
  const d = new Date(ts);
  return `${pad(d.getUTCHours())}:${pad(d.getUTCMinutes())}`;
}

export function toTimestamp(date: string, time: string | null): number {
  const [y = 1970, m = 1, d = 1] = date.split("-").map(Number);
  const [hh = 0, mm = 0] = (time ?? "00:00").split(":").map(Number);
  return Date.UTC(y, m - 1, d, hh, mm);
}

function trimBlank(lines: string[]): void {
  while (lines.length > 0 && lines[0]?.trim() === "") lines.shift();
  while (lines.length > 0 && lines[lines.length - 1]?.trim() === "") lines.pop();
}
