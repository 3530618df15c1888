const HISTORY_CUES = [
  "summarize",
  "summary",
  "what happened",
  "what did",
  "discussed",
  "talking about",
  "mentioned",
  "last 24 hours",
  "yesterday",
  "this week",
  "last week",
  "recent",
  "find",
  "search",
  "look for",
  "any mention",
  "channel",
];

const CHANNEL_REFERENCE = /(?:^|\s)#[\w-]+|<#[A-Z0-9]+(?:\|[^>]*)?>/;

/** Cheap check, run before any embedding call, for turns that ask about past messages. */
export function needsRetrieval(text: string): boolean {
  const lower = text.toLowerCase();
  return HISTORY_CUES.some((cue) => lower.includes(cue)) || CHANNEL_REFERENCE.test(text);
}
