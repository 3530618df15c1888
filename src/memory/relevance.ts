const STOPWORDS = new Set([
  "a", "am", "an", "as", "at", "be", "by", "do", "he", "i", "if", "in", "is",
  "it", "me", "my", "no", "of", "on", "or", "so", "to", "up", "us", "we",
  "about", "all", "also", "and", "any", "are", "but", "can", "could", "did",
  "does", "for", "from", "had", "has", "have", "her", "his", "how", "into",
  "its", "just", "not", "our", "out", "she", "should", "some", "than", "that",
  "the", "their", "them", "then", "there", "these", "they", "this", "those",
  "was", "were", "what", "when", "where", "which", "who", "why", "will",
  "with", "would", "you", "your",
]);

// Longest first; "e" last so decide, decided and decision share "decid"/"decis".
const SUFFIXES = ["ions", "ion", "ing", "ed", "es", "s", "e"];

export function stem(word: string): string {
  for (const suffix of SUFFIXES) {
    if (word.endsWith(suffix) && word.length - suffix.length >= 3) {
      return word.slice(0, -suffix.length);
    }
  }
  return word;
}

function tokens(text: string): string[] {
  return text.toLowerCase().split(/[^\p{L}\p{N}]+/u).filter(Boolean);
}

/**
 * Short stems must match exactly. Longer ones also match when they differ
 * only in their last letter ("decid" and "decis").
 */
function sameStem(a: string, b: string): boolean {
  if (a === b) return true;
  const shorter = Math.min(a.length, b.length);
  if (shorter < 5) return false;
  let common = 0;
  while (common < shorter && a[common] === b[common]) common++;
  return common >= shorter - 1;
}

export function keywords(text: string): string[] {
  return [...new Set(tokens(text).filter((w) => !STOPWORDS.has(w)))];
}

/** Fraction of query keywords found as whole words in `text`, matching on a crude stem. */
export function relevance(queryKeywords: readonly string[], text: string): number {
  if (queryKeywords.length === 0) return 0;
  const stems = new Set(tokens(text).map(stem));
  let hits = 0;
  for (const word of queryKeywords) {
    const wanted = stem(word);
    for (const candidate of stems) {
      if (sameStem(wanted, candidate)) {
        hits++;
        break;
      }
    }
  }
  return hits / queryKeywords.length;
}
