import stopwordList from "./data/stopwords.json";

const STOPWORDS = new Set<string>(stopwordList);

export function isStopword(word: string) {
  return STOPWORDS.has(word.toLowerCase());
}

export function stripHtml(html: string) {
  return html
    .replace(/<script[\s\S]*?(<\/script>|$)/gi, " ")
    .replace(/<style[\s\S]*?(<\/style>|$)/gi, " ")
    .replace(/<!--[\s\S]*?(-->|$)/g, " ")
    .replace(/<\/?[^>]+(>|$)/g, " ");
}

export function normalizeWhitespace(text: string) {
  return text.replace(/\s+/g, " ").trim();
}

export function countWords(text: string) {
  return (text.match(/\S+/g) || []).length;
}

export function escapeRegExp(str: string) {
  return str.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

// Whole-phrase match: the phrase may not be glued to a letter, digit or underscore on either side.
function phrasePattern(phrase: string) {
  const body = phrase.trim().split(/\s+/).map(escapeRegExp).join("\\s+");
  return new RegExp(`(?<![\\p{L}\\p{N}_])${body}(?![\\p{L}\\p{N}_])`, "giu");
}

export function countOccurrences(text: string, term: string) {
  if (!term.trim()) return 0;
  return (text.match(phrasePattern(term)) || []).length;
}

export function containsIgnoreCase(haystack: string, needle: string) {
  const n = needle.trim().toLowerCase();
  if (!n) return false;
  return haystack.toLowerCase().includes(n);
}

export function wordFrequency(text: string, minLength = 4) {
  const freq = new Map<string, number>();
  const words = text.toLowerCase().match(/[a-z]+/g) || [];
  for (const w of words) {
    if (w.length < minLength || STOPWORDS.has(w)) continue;
    freq.set(w, (freq.get(w) || 0) + 1);
  }
  return Array.from(freq.entries())
    .sort((a, b) => b[1] - a[1])
    .map(([term, count]) => ({ term, count }));
}

export function truncateWithEllipsis(text: string, maxLength: number) {
  if (text.length <= maxLength) return text;
  return `${text.slice(0, maxLength - 3)}...`;
}
