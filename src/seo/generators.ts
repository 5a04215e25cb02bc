import slugify from "slugify";
import { containsIgnoreCase, isStopword, truncateWithEllipsis, wordFrequency } from "./nlp";
import { SLUG_MAX_LENGTH, TITLE_LENGTH } from "./scoring";

const SECONDARY_PATTERNS = [
  "{kw} tutorial",
  "{kw} guide",
  "{kw} tips",
  "learn {kw}",
  "{kw} best practices",
  "{kw} examples",
  "how to {kw}",
  "{kw} for beginners",
];

function titleCase(word: string) {
  return word.charAt(0).toUpperCase() + word.slice(1);
}

/** Longest non-stopword of three or more letters in the title. */
export function extractPrimaryKeyword(title: string) {
  const words = (title.toLowerCase().match(/[a-z]{3,}/g) || []).filter((w) => !isStopword(w));
  if (!words.length) return "";
  const longest = words.reduce((best, w) => (w.length > best.length ? w : best));
  return titleCase(longest);
}

export function generateSecondaryKeywords(primaryKeyword: string, plainText = "", count = 5) {
  const kw = primaryKeyword.trim();
  if (!kw) return [];

  const phrases = SECONDARY_PATTERNS.map((p) => p.replace("{kw}", kw));
  const related = wordFrequency(plainText)
    .map((w) => w.term)
    .filter((term) => term !== kw.toLowerCase())
    .slice(0, 3);
  for (const term of related) {
    phrases.push(`${kw} ${term}`, `${term} ${kw}`);
  }
  return phrases.slice(0, count);
}

export function generateMetaTitle(title: string, keyword = "", maxLength = TITLE_LENGTH.max) {
  let result = title.trim();
  if (!result) return "";

  const kw = keyword.trim();
  if (kw && !containsIgnoreCase(result, kw)) {
    if (result.length + kw.length + 9 <= maxLength) result = `${result} - ${kw} Guide`;
    else if (result.length + kw.length + 3 <= maxLength) result = `${result} - ${kw}`;
  }

  if (result.length > maxLength) {
    const head = result.slice(0, maxLength + 1);
    const cut = head.lastIndexOf(" ");
    result = (cut > 0 ? head.slice(0, cut) : result.slice(0, maxLength)).trimEnd();
  }
  return result;
}

export function generateSlug(title: string) {
  const slug = slugify(title, { lower: true, strict: true });
  return slug.slice(0, SLUG_MAX_LENGTH).replace(/-+$/, "");
}

export function generateSocialTags(title: string, description: string) {
  const source = description.trim() || title;
  return {
    ogTitle: truncateWithEllipsis(title, 100),
    ogDescription: truncateWithEllipsis(source, 300),
    twitterTitle: truncateWithEllipsis(title, 70),
    twitterDescription: truncateWithEllipsis(source, 200),
  };
}
